import { Command } from "commander";
import packageJson from "../package.json";
import type { Options } from "./types";
import { resolveConfigPath } from "./utils/resolveConfigPath";

export function parseCliOptions(argv: readonly string[] = process.argv): Options {
	const program = new Command();

	program
		.name("downloads-organizer")
		.version(packageJson.version)
		.description(
			"Organize your downloads folder into category folders by file type.",
		)
		.option(
			"-f, --folders",
			"Include folder organization (compressed and regular folders)",
			false,
		)
		.option(
			"--dry-run",
			"Show what would be moved without actually moving anything",
			false,
		)
		.option(
			"-c, --config <path>",
			"Path to the YAML configuration file",
			resolveConfigPath(),
		)
		.option("-v, --verbose", "Enable verbose (DEBUG level) logging", false)
		.option(
			"-w, --watch",
			"Keep watching the source directory and organize new files",
			false,
		)
		.addHelpText(
			"after",
			`
Examples:
  downloads-organizer                  Organize files only
  downloads-organizer -f               Organize files and folders
  downloads-organizer --dry-run        Preview what would be moved
  downloads-organizer -f --dry-run     Preview files and folders
  downloads-organizer -c custom.yaml   Use a custom configuration file
  downloads-organizer --watch          Organize, then keep watching`,
		);

	program.parse(argv);

	const opts = program.opts<Options>();

	if (opts.watch && opts.dryRun) {
		program.error("--watch cannot be combined with --dry-run");
	}

	return opts;
}
