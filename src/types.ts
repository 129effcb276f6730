import type { OrganizerError } from "./errors";

export type Options = {
	/** include folder organization (compressed and regular folders) */
	folders: boolean;
	/** preview moves without touching the filesystem */
	dryRun: boolean;
	/** path to the YAML configuration file */
	config: string;
	/** DEBUG level logging */
	verbose: boolean;
	/** keep watching the source directory after the first pass */
	watch: boolean;
};

export const LOG_LEVELS = [
	"DEBUG",
	"INFO",
	"WARNING",
	"ERROR",
	"CRITICAL",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type Category = {
	name: string;
	/** lowercase, dot-prefixed */
	extensions: readonly string[];
	/** directory name under the base destination */
	destination: string;
};

export type FolderSettings = {
	enabled: boolean;
	compressedDestination: string;
	regularDestination: string;
	compressedExtensions: readonly string[];
};

export type LoggingSettings = {
	level: LogLevel;
	logToConsole: boolean;
	logToFile: boolean;
	logFile: string;
};

export type Settings = {
	dryRun: boolean;
	createDirectories: boolean;
	handleConflicts: boolean;
	skipHiddenFiles: boolean;
};

export type Config = {
	sourceDirectory: string;
	baseDestination: string;
	categories: readonly Category[];
	otherDestination: string;
	folders: FolderSettings;
	logging: LoggingSettings;
	settings: Settings;
};

export type MoveOptions = {
	dryRun: boolean;
	createDirectories: boolean;
	handleConflicts: boolean;
};

export type MoveOutcome =
	| {
			status: "moved";
			source: string;
			destination: string;
			/** a numeric suffix was needed to avoid an existing name */
			conflictResolved: boolean;
			dryRun: boolean;
	  }
	| { status: "skipped"; source: string; reason: string }
	| { status: "error"; source: string; error: OrganizerError };

export type RunStatistics = {
	filesMoved: number;
	foldersMoved: number;
	conflictsResolved: number;
	skipped: number;
	errors: number;
	/** category name -> files moved into it */
	categories: Map<string, number>;
};
