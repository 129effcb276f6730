import fs from "node:fs";
import { cyan, gray, magenta, red, yellow } from "kleur/colors";
import { ConfigurationError } from "./errors";
import { LOG_LEVELS, type LogLevel, type LoggingSettings } from "./types";

export const LOGGER_NAME = "downloads-organizer";

const levelColor: Record<LogLevel, (text: string) => string> = {
	DEBUG: gray,
	INFO: cyan,
	WARNING: yellow,
	ERROR: red,
	CRITICAL: magenta,
};

// YYYY-MM-DD HH:mm:ss in local time
export function formatTimestamp(date: Date): string {
	const pad = (n: number) => String(n).padStart(2, "0");
	return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export function isLogLevel(value: string): value is LogLevel {
	return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Leveled logger writing to the console, a log file, or both.
 * One instance per invocation; components receive it explicitly.
 */
export class Logger {
	private level: LogLevel;
	private readonly toConsole: boolean;
	private filePath?: string;
	private readonly now: () => Date;

	constructor(
		settings: Pick<LoggingSettings, "level" | "logToConsole"> & {
			logFile?: string;
		},
		now: () => Date = () => new Date(),
	) {
		this.level = settings.level;
		this.toConsole = settings.logToConsole;
		this.filePath = settings.logFile;
		this.now = now;
	}

	/** Throws ConfigurationError when the log file cannot be opened for appending. */
	static fromSettings(settings: LoggingSettings): Logger {
		if (settings.logToFile) {
			try {
				fs.appendFileSync(settings.logFile, "", "utf-8");
			} catch (error) {
				throw new ConfigurationError(
					`Cannot write log file: ${settings.logFile}`,
					settings.logFile,
					{ cause: error },
				);
			}
		}
		return new Logger({
			level: settings.level,
			logToConsole: settings.logToConsole,
			logFile: settings.logToFile ? settings.logFile : undefined,
		});
	}

	setLevel(level: LogLevel) {
		this.level = level;
	}

	isEnabled(level: LogLevel): boolean {
		return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
	}

	debug(message: string) {
		this.log("DEBUG", message);
	}

	info(message: string) {
		this.log("INFO", message);
	}

	warn(message: string) {
		this.log("WARNING", message);
	}

	error(message: string) {
		this.log("ERROR", message);
	}

	critical(message: string) {
		this.log("CRITICAL", message);
	}

	log(level: LogLevel, message: string) {
		if (!this.isEnabled(level)) return;
		const timestamp = formatTimestamp(this.now());

		if (this.toConsole) {
			const line = `${gray(timestamp)} - ${LOGGER_NAME} - ${levelColor[level](level)} - ${message}`;
			if (level === "ERROR" || level === "CRITICAL") {
				console.error(line);
			} else {
				console.log(line);
			}
		}

		if (this.filePath) {
			try {
				fs.appendFileSync(
					this.filePath,
					`${timestamp} - ${LOGGER_NAME} - ${level} - ${message}\n`,
					"utf-8",
				);
			} catch (error) {
				// Warn once, then console only
				console.error(
					red(
						`Log file ${this.filePath} is not writable, file logging stopped: ${error}`,
					),
				);
				this.filePath = undefined;
			}
		}
	}
}
