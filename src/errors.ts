/**
 * Base class for every error the organizer raises or records.
 * `path` is the file, folder or config the error is about.
 */
export class OrganizerError extends Error {
	readonly path: string;

	constructor(message: string, path: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
		this.path = path;
	}
}

// Fatal: raised before anything is moved
export class ConfigurationError extends OrganizerError {}

// Fatal: the source directory is missing or cannot be listed
export class SourceNotFoundError extends OrganizerError {}

export class PermissionDeniedError extends OrganizerError {}

/** The target path appeared between the conflict check and the move. */
export class RaceConditionError extends OrganizerError {}

/** The target exists and conflict handling is turned off. */
export class DestinationExistsError extends OrganizerError {}

/** The destination directory is absent and `create_directories` is off. */
export class DestinationMissingError extends OrganizerError {}

export class ConflictLimitError extends OrganizerError {}

export function isErrnoException(
	error: unknown,
): error is NodeJS.ErrnoException {
	return error instanceof Error && "code" in error;
}

/**
 * Wraps a failure from a filesystem call into the matching organizer error.
 * Errors that already are organizer errors pass through untouched.
 */
export function toOrganizerError(
	error: unknown,
	path: string,
): OrganizerError {
	if (error instanceof OrganizerError) return error;
	if (isErrnoException(error)) {
		if (error.code === "EACCES" || error.code === "EPERM") {
			return new PermissionDeniedError(`Permission denied: ${path}`, path, {
				cause: error,
			});
		}
	}
	const message = error instanceof Error ? error.message : String(error);
	return new OrganizerError(message, path, { cause: error });
}
