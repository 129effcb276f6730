import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ConflictLimitError } from "../errors";
import {
	MAX_CONFLICT_ATTEMPTS,
	deepMerge,
	expandPath,
	extensionCandidates,
	isHidden,
	resolveConflict,
} from "../utils";
import { makeTempDir, removeDir, writeFile } from "./helpers";

describe("resolveConflict", () => {
	let dir: string;

	beforeEach(() => {
		dir = makeTempDir();
	});

	afterEach(() => {
		removeDir(dir);
	});

	it("keeps a free path as it is", () => {
		const desired = path.join(dir, "report.pdf");
		expect(resolveConflict(desired)).toEqual({ path: desired, renamed: false });
	});

	it("appends (1), then (2) before the extension", () => {
		const desired = path.join(dir, "report.pdf");
		writeFile(desired);
		expect(resolveConflict(desired)).toEqual({
			path: path.join(dir, "report (1).pdf"),
			renamed: true,
		});

		writeFile(path.join(dir, "report (1).pdf"));
		expect(resolveConflict(desired).path).toBe(path.join(dir, "report (2).pdf"));
	});

	it("suffixes folders and extensionless names at the end", () => {
		fs.mkdirSync(path.join(dir, "proj"));
		expect(resolveConflict(path.join(dir, "proj"), "folder").path).toBe(
			path.join(dir, "proj (1)"),
		);
		writeFile(path.join(dir, "Makefile"));
		expect(resolveConflict(path.join(dir, "Makefile")).path).toBe(
			path.join(dir, "Makefile (1)"),
		);
	});

	it("treats a dot in a folder name as part of the name", () => {
		fs.mkdirSync(path.join(dir, "my.project"));
		expect(resolveConflict(path.join(dir, "my.project"), "folder").path).toBe(
			path.join(dir, "my.project (1)"),
		);
	});

	it("keeps a .tar compound extension together", () => {
		writeFile(path.join(dir, "archive.tar.gz"));
		expect(resolveConflict(path.join(dir, "archive.tar.gz")).path).toBe(
			path.join(dir, "archive (1).tar.gz"),
		);
		writeFile(path.join(dir, "site.backup.TAR.XZ"));
		expect(resolveConflict(path.join(dir, "site.backup.TAR.XZ")).path).toBe(
			path.join(dir, "site.backup (1).TAR.XZ"),
		);
	});

	it("gives up with ConflictLimitError when every candidate is taken", () => {
		const exists = vi.spyOn(fs, "existsSync").mockReturnValue(true);
		try {
			expect(() => resolveConflict(path.join(dir, "report.pdf"))).toThrow(
				ConflictLimitError,
			);
			expect(exists).toHaveBeenCalledTimes(MAX_CONFLICT_ATTEMPTS + 1);
		} finally {
			exists.mockRestore();
		}
	});
});

describe("extensionCandidates", () => {
	it("lists every dot suffix lowercased, longest first", () => {
		expect(extensionCandidates("Backup.TAR.GZ")).toEqual([".tar.gz", ".gz"]);
	});

	it("ignores a leading dot and a trailing dot", () => {
		expect(extensionCandidates(".bashrc")).toEqual([]);
		expect(extensionCandidates("odd.")).toEqual([]);
	});
});

describe("expandPath", () => {
	it("expands ~ to the home directory", () => {
		expect(expandPath("~/Downloads")).toBe(
			path.join(os.homedir(), "Downloads"),
		);
	});

	it("leaves a tilde inside a name alone", () => {
		expect(expandPath("/tmp/~notes")).toBe(path.resolve("/tmp/~notes"));
	});
});

describe("deepMerge", () => {
	it("merges nested mappings and skips null values", () => {
		const merged = deepMerge(
			{ settings: { dry_run: false, skip_hidden_files: true }, other: "Other" },
			{ settings: { dry_run: true }, other: null },
		);
		expect(merged).toEqual({
			settings: { dry_run: true, skip_hidden_files: true },
			other: "Other",
		});
	});
});

describe("isHidden", () => {
	it("treats dot-prefixed names as hidden", () => {
		expect(isHidden(".DS_Store")).toBe(true);
		expect(isHidden("file.txt")).toBe(false);
	});
});
