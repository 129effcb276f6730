import type { RunStatistics } from "./types";

const RULE = "=".repeat(60);

export function createRunStatistics(): RunStatistics {
	return {
		filesMoved: 0,
		foldersMoved: 0,
		conflictsResolved: 0,
		skipped: 0,
		errors: 0,
		categories: new Map(),
	};
}

export function countCategory(stats: RunStatistics, category: string) {
	stats.categories.set(category, (stats.categories.get(category) ?? 0) + 1);
}

/** The end-of-run summary block, one string per line. */
export function formatSummary(stats: RunStatistics, dryRun = false): string[] {
	const lines = [
		RULE,
		dryRun ? "ORGANIZATION SUMMARY (DRY RUN)" : "ORGANIZATION SUMMARY",
		RULE,
		`Files moved: ${stats.filesMoved}`,
		`Folders moved: ${stats.foldersMoved}`,
		`Conflicts resolved: ${stats.conflictsResolved}`,
		`Skipped: ${stats.skipped}`,
		`Errors: ${stats.errors}`,
	];

	if (stats.categories.size > 0) {
		lines.push("", "Files by category:");
		const names = [...stats.categories.keys()].sort();
		for (const name of names) {
			lines.push(`  ${name}: ${stats.categories.get(name) ?? 0}`);
		}
	}

	lines.push(RULE);
	return lines;
}

export function printSummary(stats: RunStatistics, dryRun = false) {
	console.log(`\n${formatSummary(stats, dryRun).join("\n")}`);
}
