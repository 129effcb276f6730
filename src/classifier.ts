import { ConfigurationError } from "./errors";
import type { Category } from "./types";
import { extensionCandidates } from "./utils";

export const UNCATEGORIZED = "uncategorized";

export type Classification = Category | typeof UNCATEGORIZED;

/**
 * Builds the extension -> category lookup once. An extension claimed by two
 * categories is a configuration error, never resolved at lookup time.
 * @param source - what to name in the error message, usually the config path
 */
export function buildExtensionIndex(
	categories: readonly Category[],
	source = "configuration",
): ReadonlyMap<string, Category> {
	const index = new Map<string, Category>();
	for (const category of categories) {
		for (const extension of category.extensions) {
			const owner = index.get(extension);
			if (owner && owner !== category) {
				throw new ConfigurationError(
					`Extension "${extension}" is listed in both "${owner.name}" and "${category.name}"`,
					source,
				);
			}
			index.set(extension, category);
		}
	}
	return index;
}

export class ExtensionClassifier {
	private readonly index: ReadonlyMap<string, Category>;

	constructor(categories: readonly Category[], source?: string) {
		this.index = buildExtensionIndex(categories, source);
	}

	/** Longest matching extension wins, so `.tar.gz` beats `.gz`. */
	classify(filename: string): Classification {
		for (const extension of extensionCandidates(filename)) {
			const category = this.index.get(extension);
			if (category) return category;
		}
		return UNCATEGORIZED;
	}
}
