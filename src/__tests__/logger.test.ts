import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ConfigurationError } from "../errors";
import { Logger, formatTimestamp, isLogLevel } from "../logger";
import { makeTempDir, removeDir } from "./helpers";

const fixedNow = () => new Date(2024, 2, 5, 9, 7, 3);

describe("Logger", () => {
	let dir: string;
	let logFile: string;

	beforeEach(() => {
		dir = makeTempDir();
		logFile = path.join(dir, "organizer.log");
	});

	afterEach(() => {
		vi.restoreAllMocks();
		removeDir(dir);
	});

	it("writes plain lines at or above its level to the log file", () => {
		const logger = new Logger(
			{ level: "INFO", logToConsole: false, logFile },
			fixedNow,
		);
		logger.debug("hidden detail");
		logger.info("Moving file: doc.pdf -> /storage/PDF");
		logger.error("PermissionDeniedError moving doc.pdf: Permission denied");

		expect(fs.readFileSync(logFile, "utf-8")).toBe(
			"2024-03-05 09:07:03 - downloads-organizer - INFO - Moving file: doc.pdf -> /storage/PDF\n" +
				"2024-03-05 09:07:03 - downloads-organizer - ERROR - PermissionDeniedError moving doc.pdf: Permission denied\n",
		);
	});

	it("lets the level be lowered for verbose runs", () => {
		const logger = new Logger(
			{ level: "WARNING", logToConsole: false, logFile },
			fixedNow,
		);
		logger.info("dropped");
		logger.setLevel("DEBUG");
		logger.debug("kept");
		expect(fs.readFileSync(logFile, "utf-8")).toBe(
			"2024-03-05 09:07:03 - downloads-organizer - DEBUG - kept\n",
		);
	});

	it("sends errors to stderr and the rest to stdout", () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => {});
		const error = vi.spyOn(console, "error").mockImplementation(() => {});
		const logger = new Logger({ level: "DEBUG", logToConsole: true });

		logger.warn("careful");
		logger.critical("broken");

		expect(log).toHaveBeenCalledTimes(1);
		expect(error).toHaveBeenCalledTimes(1);
		expect(String(log.mock.calls[0][0])).toContain("careful");
		expect(String(error.mock.calls[0][0])).toContain("broken");
	});

	it("writes no file when file logging is off", () => {
		const logger = Logger.fromSettings({
			level: "INFO",
			logToConsole: false,
			logToFile: false,
			logFile,
		});
		logger.info("nothing");
		expect(fs.existsSync(logFile)).toBe(false);
	});

	it("rejects a log file in a missing directory at startup", () => {
		const unreachable = path.join(dir, "no-such-dir", "organizer.log");
		expect(() =>
			Logger.fromSettings({
				level: "INFO",
				logToConsole: false,
				logToFile: true,
				logFile: unreachable,
			}),
		).toThrow(ConfigurationError);
	});

	it("creates the log file up front when file logging is on", () => {
		Logger.fromSettings({
			level: "INFO",
			logToConsole: false,
			logToFile: true,
			logFile,
		});
		expect(fs.readFileSync(logFile, "utf-8")).toBe("");
	});

	it("stops writing the file after a failed write and keeps logging", () => {
		const error = vi.spyOn(console, "error").mockImplementation(() => {});
		const log = vi.spyOn(console, "log").mockImplementation(() => {});
		const logger = new Logger(
			{ level: "INFO", logToConsole: true, logFile: dir },
			fixedNow,
		);

		logger.info("first");
		logger.info("second");

		expect(error).toHaveBeenCalledTimes(1);
		expect(String(error.mock.calls[0][0])).toContain("file logging stopped");
		expect(log).toHaveBeenCalledTimes(2);
	});
});

describe("log helpers", () => {
	it("pads timestamps", () => {
		expect(formatTimestamp(fixedNow())).toBe("2024-03-05 09:07:03");
	});

	it("recognizes the fixed level names only", () => {
		expect(isLogLevel("WARNING")).toBe(true);
		expect(isLogLevel("warning")).toBe(false);
		expect(isLogLevel("VERBOSE")).toBe(false);
	});
});
