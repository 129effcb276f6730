import fs from "node:fs";
import { parse } from "yaml";
import { buildExtensionIndex } from "./classifier";
import { deriveCompressedExtensions } from "./compressedFolder";
import { ConfigurationError, isErrnoException } from "./errors";
import { isLogLevel } from "./logger";
import type { Category, Config, LogLevel } from "./types";
import { deepMerge, expandPath, isObject } from "./utils";

export const DEFAULT_CONFIG_PATH = "config.yaml";
export const DEFAULT_LOG_LEVEL: LogLevel = "INFO";

// Application default configuration, in the YAML file's own key names
const appDefaults = {
	file_types: {},
	other_destination: "Other",
	folders: {
		enabled: false,
		compressed_destination: "Compressed Folders",
		regular_destination: "Folders",
	},
	logging: {
		level: DEFAULT_LOG_LEVEL,
		log_to_console: true,
		log_to_file: true,
		log_file: "downloads_organizer.log",
	},
	settings: {
		dry_run: false,
		create_directories: true,
		handle_conflicts: true,
		skip_hidden_files: true,
	},
};

export type ConfigLoadResult = {
	config: Config;
	/** problems that did not stop loading; logged once the logger exists */
	warnings: string[];
};

/**
 * Reads and validates a YAML configuration file. Every problem that would
 * stop the run is a ConfigurationError, raised before anything is moved.
 */
export function loadConfig(configPath: string): ConfigLoadResult {
	const resolved = expandPath(configPath);
	let text: string;
	try {
		text = fs.readFileSync(resolved, "utf-8");
	} catch (error) {
		if (isErrnoException(error) && error.code === "ENOENT") {
			throw new ConfigurationError(
				`Configuration file not found: ${resolved}. Create a config.yaml file or pass --config.`,
				resolved,
				{ cause: error },
			);
		}
		throw new ConfigurationError(
			`Could not read configuration file: ${resolved}`,
			resolved,
			{ cause: error },
		);
	}

	let raw: unknown;
	try {
		raw = parse(text);
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		throw new ConfigurationError(
			`Error parsing configuration file: ${reason}`,
			resolved,
			{ cause: error },
		);
	}
	return parseConfig(raw, resolved);
}

/** Validates an already parsed document and fills in defaults. */
export function parseConfig(
	raw: unknown,
	source = "configuration",
): ConfigLoadResult {
	if (!isObject(raw)) {
		throw new ConfigurationError(
			"Configuration must be a mapping of keys to values",
			source,
		);
	}
	const warnings: string[] = [];
	const merged = deepMerge(appDefaults, raw);
	const fields = new FieldReader(source);

	const categories = parseCategories(merged.file_types, fields);
	// Duplicate extensions across categories stop the run here
	buildExtensionIndex(categories, source);

	const folders = fields.section(merged.folders, "folders");
	const logging = fields.section(merged.logging, "logging");
	const settings = fields.section(merged.settings, "settings");

	const compressedExtensions =
		folders.compressed_extensions === undefined
			? deriveCompressedExtensions(categories)
			: fields
					.stringList(
						folders.compressed_extensions,
						"folders.compressed_extensions",
					)
					.map((ext) => normalizeExtension(ext, fields.source));

	let level = DEFAULT_LOG_LEVEL;
	const rawLevel = logging.level;
	const upper = typeof rawLevel === "string" ? rawLevel.toUpperCase() : "";
	if (isLogLevel(upper)) {
		level = upper;
	} else {
		warnings.push(
			`Unknown logging level "${String(rawLevel)}", falling back to ${DEFAULT_LOG_LEVEL}`,
		);
	}

	const config: Config = {
		sourceDirectory: expandPath(
			fields.string(merged.source_directory, "source_directory"),
		),
		baseDestination: expandPath(
			fields.string(merged.base_destination, "base_destination"),
		),
		categories,
		otherDestination: fields.string(
			merged.other_destination,
			"other_destination",
		),
		folders: {
			enabled: fields.boolean(folders.enabled, "folders.enabled"),
			compressedDestination: fields.string(
				folders.compressed_destination,
				"folders.compressed_destination",
			),
			regularDestination: fields.string(
				folders.regular_destination,
				"folders.regular_destination",
			),
			compressedExtensions: [...new Set(compressedExtensions)],
		},
		logging: {
			level,
			logToConsole: fields.boolean(
				logging.log_to_console,
				"logging.log_to_console",
			),
			logToFile: fields.boolean(logging.log_to_file, "logging.log_to_file"),
			logFile: expandPath(fields.string(logging.log_file, "logging.log_file")),
		},
		settings: {
			dryRun: fields.boolean(settings.dry_run, "settings.dry_run"),
			createDirectories: fields.boolean(
				settings.create_directories,
				"settings.create_directories",
			),
			handleConflicts: fields.boolean(
				settings.handle_conflicts,
				"settings.handle_conflicts",
			),
			skipHiddenFiles: fields.boolean(
				settings.skip_hidden_files,
				"settings.skip_hidden_files",
			),
		},
	};

	return { config: Object.freeze(config), warnings };
}

function parseCategories(value: unknown, fields: FieldReader): Category[] {
	const fileTypes = fields.section(value, "file_types");
	const categories: Category[] = [];

	for (const [name, info] of Object.entries(fileTypes)) {
		if (name === "other") {
			throw new ConfigurationError(
				`"other" is reserved for uncategorized files; rename that category`,
				fields.source,
			);
		}
		const entry = fields.section(info, `file_types.${name}`);
		const extensions = fields
			.stringList(entry.extensions, `file_types.${name}.extensions`)
			.map((ext) => normalizeExtension(ext, fields.source));
		const destination =
			entry.destination === undefined
				? name
				: fields.string(entry.destination, `file_types.${name}.destination`);

		categories.push(
			Object.freeze({
				name,
				extensions: Object.freeze([...new Set(extensions)]),
				destination,
			}),
		);
	}
	return categories;
}

// ".PDF", "pdf" and " .pdf " all become ".pdf"
export function normalizeExtension(value: string, source: string): string {
	const trimmed = value.trim().toLowerCase();
	const extension = trimmed.startsWith(".") ? trimmed : `.${trimmed}`;
	if (extension.length < 2) {
		throw new ConfigurationError(
			`Invalid extension "${value}"`,
			source,
		);
	}
	return extension;
}

/** Type checks for config values; every failure names the offending key. */
export class FieldReader {
	constructor(readonly source: string) {}

	section(value: unknown, key: string): Record<string, unknown> {
		if (value === undefined || value === null) return {};
		if (!isObject(value)) this.fail(key, "a mapping");
		return value;
	}

	string(value: unknown, key: string): string {
		if (value === undefined || value === null) {
			throw new ConfigurationError(
				`Missing required configuration key: ${key}`,
				this.source,
			);
		}
		if (typeof value !== "string" || value.trim() === "") {
			this.fail(key, "a non-empty string");
		}
		return value;
	}

	boolean(value: unknown, key: string): boolean {
		if (typeof value !== "boolean") this.fail(key, "true or false");
		return value;
	}

	stringList(value: unknown, key: string): string[] {
		if (value === undefined || value === null) return [];
		if (!Array.isArray(value)) this.fail(key, "a list of strings");
		const items: string[] = [];
		for (const item of value) {
			if (typeof item !== "string") this.fail(key, "a list of strings");
			items.push(item);
		}
		return items;
	}

	private fail(key: string, expected: string): never {
		throw new ConfigurationError(
			`Configuration key ${key} must be ${expected}`,
			this.source,
		);
	}
}
