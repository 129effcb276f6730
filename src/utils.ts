import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { ConflictLimitError } from "./errors";

export const MAX_CONFLICT_ATTEMPTS = 10_000;

// Helper function: Expand tilde (~) and make the path absolute
export function expandPath(p: string): string {
	return path.resolve(p.replace(/^~(?=$|[\\/])/, os.homedir()));
}

// Helper function: Deep merge two objects
export function deepMerge<
	T extends Record<string, unknown>,
	U extends Record<string, unknown>,
>(target: T, source: U): T & U {
	const output: Record<string, unknown> = { ...target };
	for (const key of Object.keys(source)) {
		const sourceValue = source[key];
		const targetValue = output[key];
		if (isObject(sourceValue) && isObject(targetValue)) {
			output[key] = deepMerge(targetValue, sourceValue);
		} else if (sourceValue !== undefined && sourceValue !== null) {
			output[key] = sourceValue;
		}
	}
	return output as T & U;
}

// Helper function: Check if an item is an object
export function isObject(item: unknown): item is Record<string, unknown> {
	return Boolean(item && typeof item === "object" && !Array.isArray(item));
}

export function isHidden(name: string): boolean {
	return name.startsWith(".");
}

/**
 * Every dot-suffix of a filename, lowercased, longest first.
 * `Backup.TAR.GZ` gives `[".tar.gz", ".gz"]`; a dotfile's leading dot is not
 * an extension, so `.bashrc` gives `[]`.
 */
export function extensionCandidates(filename: string): string[] {
	const name = filename.toLowerCase();
	const candidates: string[] = [];
	let index = name.indexOf(".", 1);
	while (index !== -1) {
		if (index < name.length - 1) candidates.push(name.slice(index));
		index = name.indexOf(".", index + 1);
	}
	return candidates;
}

// `.tar.gz`, `.tar.xz`, ... stay whole so the suffix lands before `.tar`
const COMPOUND_TAR_EXTENSION = /\.tar\.[^.]+$/i;

// Helper function: Split a name into the part that gets numbered and the rest
function splitForSuffix(
	name: string,
	kind: "file" | "folder",
): [stem: string, ext: string] {
	if (kind === "folder") return [name, ""];
	const compound = COMPOUND_TAR_EXTENSION.exec(name);
	if (compound && compound.index > 0) {
		return [name.slice(0, compound.index), compound[0]];
	}
	const ext = path.extname(name);
	return [name.slice(0, name.length - ext.length), ext];
}

/**
 * Finds a free name for `desiredPath` by inserting " (1)", " (2)", ... before
 * a file's extension, or after a folder's whole name. Only a pre-check: the
 * path can still be taken before the caller moves anything into it.
 * @returns the path to use and whether it differs from `desiredPath`
 */
export function resolveConflict(
	desiredPath: string,
	kind: "file" | "folder" = "file",
): {
	path: string;
	renamed: boolean;
} {
	if (!fs.existsSync(desiredPath)) return { path: desiredPath, renamed: false };

	const dir = path.dirname(desiredPath);
	const [stem, ext] = splitForSuffix(path.basename(desiredPath), kind);

	for (let count = 1; count <= MAX_CONFLICT_ATTEMPTS; count++) {
		const candidate = path.join(dir, `${stem} (${count})${ext}`);
		if (!fs.existsSync(candidate)) return { path: candidate, renamed: true };
	}
	throw new ConflictLimitError(
		`No free name for ${path.basename(desiredPath)} after ${MAX_CONFLICT_ATTEMPTS} attempts`,
		desiredPath,
	);
}
