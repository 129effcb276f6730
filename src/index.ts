#!/usr/bin/env node
// src/index.ts
import { red, yellow } from "kleur/colors";
import { parseCliOptions } from "./cli";
import { loadConfig } from "./config";
import { OrganizerError } from "./errors";
import { Logger } from "./logger";
import { Organizer } from "./organizer";
import { printSummary } from "./stats";
import type { Options } from "./types";
import { startWatcher } from "./watcher";

// Main application function
async function main() {
	// 1. Parse Command Line Options
	const options: Options = parseCliOptions();

	// 2. Load configuration (fatal before anything is touched)
	const { config, warnings } = loadConfig(options.config);

	// 3. Set up logging
	const logger = Logger.fromSettings(config.logging);
	if (options.verbose) logger.setLevel("DEBUG");
	for (const warning of warnings) logger.warn(warning);

	const dryRun = options.dryRun || config.settings.dryRun;
	const includeFolders = options.folders || config.folders.enabled;
	if (options.watch && dryRun) {
		throw new OrganizerError(
			"Watch mode cannot run in dry-run mode; unset settings.dry_run",
			options.config,
		);
	}

	// 4. One pass over the source directory
	const organizer = new Organizer(config, logger, { includeFolders, dryRun });
	organizer.run();

	if (!options.watch) {
		printSummary(organizer.stats, dryRun);
		return;
	}

	// 5. Keep organizing new downloads until interrupted
	const watcher = await startWatcher(organizer, config.sourceDirectory, logger);
	console.log(`Destination: ${yellow(config.baseDestination)}`);
	process.once("SIGINT", () => {
		watcher
			.close()
			.then(() => {
				logger.info("Watcher stopped");
				printSummary(organizer.stats);
				process.exit(0);
			})
			.catch((error: unknown) => {
				console.error(red(`Failed to stop the watcher: ${error}`));
				process.exit(1);
			});
	});
}

// Execute the main function and catch any top-level errors
main().catch((error) => {
	if (error instanceof OrganizerError) {
		console.error(red(`${error.name}: ${error.message}`));
	} else {
		console.error("An unexpected error occurred:", error);
	}
	process.exit(1);
});
