import fs from "node:fs";
import path from "node:path";
import { isErrnoException } from "./errors";
import type { Category } from "./types";
import { extensionCandidates } from "./utils";

/**
 * True when a file directly inside `folderPath` has a compressed extension.
 * Only the top level is listed; subdirectories are never opened, whatever
 * their name. A symbolic link counts when it points to a file. Throws when
 * the folder cannot be read.
 */
export function isCompressedFolder(
	folderPath: string,
	compressedExtensions: ReadonlySet<string>,
): boolean {
	if (compressedExtensions.size === 0) return false;

	for (const entry of fs.readdirSync(folderPath, { withFileTypes: true })) {
		if (!isFileEntry(folderPath, entry)) continue;
		if (
			extensionCandidates(entry.name).some((ext) =>
				compressedExtensions.has(ext),
			)
		) {
			return true;
		}
	}
	return false;
}

// Helper function: Regular file, or a symbolic link to one
function isFileEntry(folderPath: string, entry: fs.Dirent): boolean {
	if (entry.isFile()) return true;
	if (!entry.isSymbolicLink()) return false;
	try {
		return fs.statSync(path.join(folderPath, entry.name)).isFile();
	} catch (error) {
		// Dangling link
		if (isErrnoException(error) && error.code === "ENOENT") return false;
		throw error;
	}
}

// Extensions of every category whose name or destination mentions "compressed"
export function deriveCompressedExtensions(
	categories: readonly Category[],
): string[] {
	const extensions = new Set<string>();
	for (const category of categories) {
		const label = `${category.name} ${category.destination}`.toLowerCase();
		if (label.includes("compressed")) {
			for (const ext of category.extensions) extensions.add(ext);
		}
	}
	return [...extensions];
}
