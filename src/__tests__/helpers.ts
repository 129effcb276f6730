import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { Logger } from "../logger";
import type { Category, Config } from "../types";

export function makeTempDir(): string {
	return fs.mkdtempSync(path.join(os.tmpdir(), "downloads-organizer-"));
}

export function removeDir(dir: string) {
	fs.rmSync(dir, { recursive: true, force: true });
}

export function writeFile(filePath: string, content = "x") {
	fs.mkdirSync(path.dirname(filePath), { recursive: true });
	fs.writeFileSync(filePath, content);
}

export const pdf: Category = {
	name: "pdf",
	extensions: [".pdf"],
	destination: "PDF",
};

export const images: Category = {
	name: "images",
	extensions: [".jpg", ".png"],
	destination: "Images",
};

export const compressed: Category = {
	name: "compressed",
	extensions: [".zip", ".tar.gz"],
	destination: "Compressed",
};

export function makeConfig(
	root: string,
	overrides: Partial<Config> = {},
): Config {
	return {
		sourceDirectory: path.join(root, "downloads"),
		baseDestination: path.join(root, "storage"),
		categories: [pdf, images],
		otherDestination: "Other",
		folders: {
			enabled: false,
			compressedDestination: "Compressed Folders",
			regularDestination: "Folders",
			compressedExtensions: [".zip", ".rar"],
		},
		logging: {
			level: "CRITICAL",
			logToConsole: false,
			logToFile: false,
			logFile: path.join(root, "organizer.log"),
		},
		settings: {
			dryRun: false,
			createDirectories: true,
			handleConflicts: true,
			skipHiddenFiles: true,
		},
		...overrides,
	};
}

export function quietLogger(): Logger {
	return new Logger({ level: "CRITICAL", logToConsole: false });
}

/** Every path under `dir`, relative and sorted, directories with a trailing slash. */
export function listTree(dir: string): string[] {
	const result: string[] = [];
	const walk = (current: string, prefix: string) => {
		for (const entry of fs.readdirSync(current, { withFileTypes: true })) {
			const rel = `${prefix}${entry.name}`;
			if (entry.isDirectory()) {
				result.push(`${rel}/`);
				walk(path.join(current, entry.name), `${rel}/`);
			} else {
				result.push(rel);
			}
		}
	};
	walk(dir, "");
	return result.sort();
}
