import path from "node:path";
import async from "async";
import chokidar, { type FSWatcher } from "chokidar";
import type { Logger } from "./logger";
import type { Organizer } from "./organizer";

const TEMP_EXTENSIONS = new Set([".crdownload", ".tmp", ".part", ".download"]);
const TEMP_PREFIXES = ["~", "."];

/** Partial downloads and editor/OS scratch files never get organized. */
export function isTemporaryDownload(filePath: string): boolean {
	const name = path.basename(filePath);
	if (TEMP_EXTENSIONS.has(path.extname(name).toLowerCase())) return true;
	return TEMP_PREFIXES.some((prefix) => name.startsWith(prefix));
}

/**
 * Queue feeding new files into the organizer one at a time, so watch mode
 * keeps the single-entry-at-a-time model of a normal pass.
 */
export function createOrganizeQueue(organizer: Organizer, logger: Logger) {
	return async.queue<string>((filePath, callback) => {
		const name = path.basename(filePath);
		const outcome = organizer.organizePath(filePath);
		if (outcome.status === "moved") {
			logger.info(`Organized: ${name}`);
		} else if (outcome.status === "error") {
			logger.warn(`Failed to organize: ${name}`);
		}
		callback();
	}, 1);
}

export async function startWatcher(
	organizer: Organizer,
	sourceDir: string,
	logger: Logger,
): Promise<FSWatcher> {
	const queue = createOrganizeQueue(organizer, logger);

	const watcher = chokidar.watch(sourceDir, {
		persistent: true,
		ignoreInitial: true, // the first pass already handled what is there
		depth: 0, // Don't watch subdirectories
		awaitWriteFinish: {
			stabilityThreshold: 2000, // Wait for file write to complete
			pollInterval: 500,
		},
	});

	watcher
		.on("add", (filePath) => {
			if (isTemporaryDownload(filePath)) {
				logger.debug(`Ignoring temporary file: ${path.basename(filePath)}`);
				return;
			}
			logger.info(`New file detected: ${path.basename(filePath)}`);
			queue.push(filePath);
		})
		.on("error", (error) => {
			logger.error(`Watcher error for ${sourceDir}: ${error}`);
		});

	await new Promise<void>((resolve) => watcher.once("ready", () => resolve()));
	logger.info(`Watching for new files in ${sourceDir}... (Press Ctrl+C to stop)`);
	return watcher;
}
