import fs from "node:fs";
import path from "node:path";
import { ExtensionClassifier, UNCATEGORIZED } from "./classifier";
import { isCompressedFolder } from "./compressedFolder";
import {
	SourceNotFoundError,
	isErrnoException,
	toOrganizerError,
} from "./errors";
import type { Logger } from "./logger";
import { moveEntry } from "./mover";
import { countCategory, createRunStatistics } from "./stats";
import type { Config, MoveOptions, MoveOutcome, RunStatistics } from "./types";
import { isHidden } from "./utils";

/** Statistics key for files no category claims. */
export const OTHER_CATEGORY = "other";

export type RunOptions = {
	includeFolders: boolean;
	dryRun: boolean;
};

type EntryKind = "file" | "folder" | "broken-link" | "other";

// Symbolic links are judged by what they point to
function kindOf(entryPath: string): EntryKind {
	let stats: fs.Stats;
	try {
		stats = fs.statSync(entryPath);
	} catch (error) {
		if (
			isErrnoException(error) &&
			(error.code === "ENOENT" || error.code === "ELOOP") &&
			fs.lstatSync(entryPath).isSymbolicLink()
		) {
			return "broken-link";
		}
		throw error;
	}
	if (stats.isFile()) return "file";
	if (stats.isDirectory()) return "folder";
	return "other";
}

/**
 * Sorts the top-level entries of the source directory into the configured
 * destinations. One instance per invocation; it owns the statistics.
 */
export class Organizer {
	readonly stats: RunStatistics = createRunStatistics();
	private readonly classifier: ExtensionClassifier;
	private readonly compressedExtensions: ReadonlySet<string>;
	private readonly moveOptions: MoveOptions;
	private readonly destinationDirs: ReadonlySet<string>;

	constructor(
		private readonly config: Config,
		private readonly logger: Logger,
		private readonly options: RunOptions,
	) {
		this.classifier = new ExtensionClassifier(config.categories);
		this.compressedExtensions = new Set(config.folders.compressedExtensions);
		this.moveOptions = {
			dryRun: options.dryRun,
			createDirectories: config.settings.createDirectories,
			handleConflicts: config.settings.handleConflicts,
		};
		this.destinationDirs = new Set(
			[
				...config.categories.map((c) => c.destination),
				config.otherDestination,
				config.folders.compressedDestination,
				config.folders.regularDestination,
			].map((name) => path.join(config.baseDestination, name)),
		);
	}

	/**
	 * One pass over the source directory. Per-entry failures are recorded in
	 * the statistics; only an unreadable source directory throws.
	 */
	run(): RunStatistics {
		const sourceDir = this.config.sourceDirectory;
		const entries = this.listSource();

		this.logger.info(`Starting organization of: ${sourceDir}`);
		if (this.options.dryRun) {
			this.logger.info("DRY RUN MODE - No files will be moved");
		}

		for (const name of entries) {
			this.organizePath(path.join(sourceDir, name));
		}

		this.logger.info("Organization completed!");
		return this.stats;
	}

	/** Organizes a single path, as watch mode does for each new file. */
	organizePath(entryPath: string): MoveOutcome {
		let kind: EntryKind;
		try {
			kind = kindOf(entryPath);
		} catch (error) {
			this.logger.error(
				`Could not inspect ${path.basename(entryPath)}: ${error}`,
			);
			return this.record(
				{
					status: "error",
					source: entryPath,
					error: toOrganizerError(error, entryPath),
				},
				"file",
			);
		}
		return this.dispatch(entryPath, kind);
	}

	private listSource(): string[] {
		const sourceDir = this.config.sourceDirectory;
		try {
			if (!fs.statSync(sourceDir).isDirectory()) {
				throw new SourceNotFoundError(
					`Source path is not a directory: ${sourceDir}`,
					sourceDir,
				);
			}
			return fs
				.readdirSync(sourceDir)
				.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
		} catch (error) {
			if (error instanceof SourceNotFoundError) throw error;
			throw new SourceNotFoundError(
				`Source directory cannot be read: ${sourceDir}`,
				sourceDir,
				{ cause: error },
			);
		}
	}

	private dispatch(entryPath: string, kind: EntryKind): MoveOutcome {
		const name = path.basename(entryPath);
		if (kind === "file") return this.organizeFile(entryPath);
		if (kind === "folder") return this.organizeFolder(entryPath);
		if (kind === "broken-link") {
			this.logger.warn(`Skipping broken symbolic link: ${name}`);
			return this.record(
				{ status: "skipped", source: entryPath, reason: "broken symbolic link" },
				"file",
			);
		}

		this.logger.debug(`Skipping (not a regular file or folder): ${name}`);
		return this.record(
			{
				status: "skipped",
				source: entryPath,
				reason: "unsupported entry type",
			},
			"file",
		);
	}

	private organizeFile(filePath: string): MoveOutcome {
		const name = path.basename(filePath);
		if (this.config.settings.skipHiddenFiles && isHidden(name)) {
			this.logger.debug(`Skipping: ${name}`);
			return this.record(
				{ status: "skipped", source: filePath, reason: "hidden file" },
				"file",
			);
		}

		const classification = this.classifier.classify(name);
		const [category, destination] =
			classification === UNCATEGORIZED
				? [OTHER_CATEGORY, this.config.otherDestination]
				: [classification.name, classification.destination];

		return this.move(filePath, destination, "file", category);
	}

	private organizeFolder(folderPath: string): MoveOutcome {
		const name = path.basename(folderPath);
		if (!this.options.includeFolders) {
			// Not counted: folders are outside this run's scope
			this.logger.debug(`Folder organization disabled, leaving: ${name}`);
			return {
				status: "skipped",
				source: folderPath,
				reason: "folders disabled",
			};
		}
		if (this.config.settings.skipHiddenFiles && isHidden(name)) {
			this.logger.debug(`Skipping folder: ${name}`);
			return this.record(
				{ status: "skipped", source: folderPath, reason: "hidden folder" },
				"folder",
			);
		}
		if (this.isDestinationFolder(folderPath)) {
			this.logger.debug(`Skipping destination folder: ${name}`);
			return this.record(
				{ status: "skipped", source: folderPath, reason: "destination folder" },
				"folder",
			);
		}

		let compressed: boolean;
		try {
			compressed = isCompressedFolder(folderPath, this.compressedExtensions);
		} catch (error) {
			const outcome: MoveOutcome = {
				status: "error",
				source: folderPath,
				error: toOrganizerError(error, folderPath),
			};
			this.logger.error(
				`Could not inspect folder ${name}: ${outcome.error.message}`,
			);
			return this.record(outcome, "folder");
		}

		const destination = compressed
			? this.config.folders.compressedDestination
			: this.config.folders.regularDestination;
		return this.move(folderPath, destination, "folder");
	}

	// The base destination itself, a folder holding it, or one of its category folders
	private isDestinationFolder(folderPath: string): boolean {
		const base = this.config.baseDestination;
		return (
			this.destinationDirs.has(folderPath) ||
			folderPath === base ||
			base.startsWith(`${folderPath}${path.sep}`)
		);
	}

	private move(
		source: string,
		destinationName: string,
		kind: "file" | "folder",
		category?: string,
	): MoveOutcome {
		const name = path.basename(source);
		const destinationDir = path.join(
			this.config.baseDestination,
			destinationName,
		);
		const prefix = this.options.dryRun ? "[DRY RUN] " : "";
		const noun = kind === "folder" ? "folder" : "file";

		this.logger.info(`${prefix}Moving ${noun}: ${name} -> ${destinationDir}`);
		const outcome = moveEntry(source, destinationDir, kind, this.moveOptions);

		if (outcome.status === "moved") {
			const renamed = outcome.conflictResolved
				? " (renamed to avoid a conflict)"
				: "";
			const verb = outcome.dryRun ? "Would move" : "Moved";
			this.logger.info(
				`${prefix}${verb} ${noun}: ${name} -> ${outcome.destination}${renamed}`,
			);
		} else if (outcome.status === "error") {
			this.logger.error(
				`${outcome.error.name} moving ${name}: ${outcome.error.message}`,
			);
		}
		return this.record(outcome, kind, category);
	}

	private record(
		outcome: MoveOutcome,
		kind: "file" | "folder",
		category?: string,
	): MoveOutcome {
		switch (outcome.status) {
			case "moved":
				if (kind === "folder") {
					this.stats.foldersMoved++;
				} else {
					this.stats.filesMoved++;
					if (category) countCategory(this.stats, category);
				}
				if (outcome.conflictResolved) this.stats.conflictsResolved++;
				break;
			case "skipped":
				this.stats.skipped++;
				break;
			case "error":
				this.stats.errors++;
				break;
		}
		return outcome;
	}
}
