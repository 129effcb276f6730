import fs from "node:fs";
import path from "node:path";
import {
	DestinationExistsError,
	DestinationMissingError,
	RaceConditionError,
	isErrnoException,
	toOrganizerError,
} from "./errors";
import type { MoveOptions, MoveOutcome } from "./types";
import { resolveConflict } from "./utils";

// Hard links are not available on every filesystem (FAT, some network mounts)
const LINK_UNSUPPORTED = new Set(["EPERM", "ENOTSUP", "EOPNOTSUPP", "ENOSYS"]);

function raceError(target: string, cause?: unknown) {
	return new RaceConditionError(
		`Destination appeared before the move completed: ${target}`,
		target,
		{ cause },
	);
}

/**
 * Moves a file without ever replacing an existing target. Same device: hard
 * link then unlink, where the link fails atomically on an existing target.
 * Cross-device: exclusive copy then unlink, which is not atomic.
 */
function relocateFile(source: string, target: string) {
	try {
		fs.linkSync(source, target);
	} catch (error) {
		if (!isErrnoException(error)) throw error;
		if (error.code === "EEXIST") throw raceError(target, error);
		if (error.code === "EXDEV") {
			copyFileThenRemove(source, target);
			return;
		}
		if (error.code && LINK_UNSUPPORTED.has(error.code)) {
			// Racy: rename replaces a file created after this check
			if (fs.existsSync(target)) throw raceError(target);
			fs.renameSync(source, target);
			return;
		}
		throw error;
	}
	try {
		fs.unlinkSync(source);
	} catch (error) {
		discardTarget(target, error);
	}
}

/**
 * Removes what a failed move left at `target` so the source stays the only
 * copy, then rethrows the failure that stopped the move.
 */
function discardTarget(target: string, cause: unknown): never {
	try {
		fs.rmSync(target, { recursive: true, force: true });
	} catch (cleanupError) {
		throw new AggregateError(
			[cause, cleanupError],
			`Move failed and the partial copy could not be removed: ${target}`,
		);
	}
	throw cause;
}

function copyFileThenRemove(source: string, target: string) {
	try {
		fs.copyFileSync(source, target, fs.constants.COPYFILE_EXCL);
	} catch (error) {
		// EEXIST: the target belongs to whoever created it, leave it alone
		if (isErrnoException(error) && error.code === "EEXIST") {
			throw raceError(target, error);
		}
		discardTarget(target, error);
	}
	try {
		fs.unlinkSync(source);
	} catch (error) {
		discardTarget(target, error);
	}
}

/**
 * Moves a folder with a single rename. A rename over an existing non-empty
 * directory fails, which surfaces the race; an empty directory created in
 * between would be replaced.
 */
function relocateFolder(source: string, target: string) {
	if (fs.existsSync(target)) throw raceError(target);
	try {
		fs.renameSync(source, target);
	} catch (error) {
		if (!isErrnoException(error)) throw error;
		if (error.code === "EEXIST" || error.code === "ENOTEMPTY") {
			throw raceError(target, error);
		}
		if (error.code !== "EXDEV") throw error;
		// Cross-device: not atomic, the source is removed only after a full copy
		try {
			fs.cpSync(source, target, {
				recursive: true,
				errorOnExist: true,
				force: false,
			});
		} catch (copyError) {
			if (isErrnoException(copyError) && copyError.code === "EEXIST") {
				throw raceError(target, copyError);
			}
			discardTarget(target, copyError);
		}
		try {
			fs.rmSync(source, { recursive: true, force: true });
		} catch (removeError) {
			discardTarget(target, removeError);
		}
	}
}

/**
 * Moves a file or folder into `destinationDir`, keeping its name or taking a
 * " (n)" suffixed one. Never throws: failures come back as an error outcome.
 */
export function moveEntry(
	source: string,
	destinationDir: string,
	kind: "file" | "folder",
	options: MoveOptions,
): MoveOutcome {
	let target = path.join(destinationDir, path.basename(source));
	try {
		if (!fs.existsSync(destinationDir)) {
			if (!options.createDirectories) {
				throw new DestinationMissingError(
					`Destination directory does not exist: ${destinationDir}`,
					destinationDir,
				);
			}
			if (!options.dryRun) fs.mkdirSync(destinationDir, { recursive: true });
		}

		let conflictResolved = false;
		if (options.handleConflicts) {
			const resolved = resolveConflict(target, kind);
			target = resolved.path;
			conflictResolved = resolved.renamed;
		} else if (fs.existsSync(target)) {
			throw new DestinationExistsError(
				`Destination already exists: ${target}`,
				target,
			);
		}

		if (!options.dryRun) {
			if (kind === "file") {
				relocateFile(source, target);
			} else {
				relocateFolder(source, target);
			}
		}

		return {
			status: "moved",
			source,
			destination: target,
			conflictResolved,
			dryRun: options.dryRun,
		};
	} catch (error) {
		return { status: "error", source, error: toOrganizerError(error, source) };
	}
}
