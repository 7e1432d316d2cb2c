/**
 * Pure functions for deciding which files make it into the compressed diff.
 */

import type { FileBlock } from "./types";

/**
 * Suffixes of files that are either non-reviewable (binary, generated)
 * or noise-heavy. Compound suffixes are allowed so minified assets match
 * even though their final suffix is an ordinary source extension.
 */
export const DEFAULT_EXCLUDED_EXTENSIONS: readonly string[] = [
	// Lock files
	".lock",
	".sum",
	// Structured data
	".json",
	".csv",
	".tsv",
	".svg",
	// Images and documents
	".png",
	".jpg",
	".jpeg",
	".gif",
	".ico",
	".webp",
	".bmp",
	".pdf",
	// Build output
	".map",
	".min.js",
	".min.css",
	".pyc",
	".pyo",
	".class",
	// Fonts
	".woff",
	".woff2",
	".ttf",
	".eot",
	// Docs
	".md",
];

/**
 * Normalize a configured extension to a lower-case dotted suffix.
 */
export function normalizeExtension(extension: string): string {
	const trimmed = extension.trim().toLowerCase();
	if (trimmed === "") return "";
	return trimmed.startsWith(".") ? trimmed : `.${trimmed}`;
}

/**
 * Check if a filename ends in one of the excluded extensions.
 */
export function isExcludedFile(
	filename: string,
	excludedExtensions: readonly string[],
): boolean {
	const lower = filename.toLowerCase();
	return excludedExtensions.some((ext) => {
		const suffix = normalizeExtension(ext);
		return suffix !== "" && lower.endsWith(suffix);
	});
}

/**
 * Split file blocks into those kept and the names of those dropped.
 * Both lists keep document order.
 */
export function filterFiles(
	files: FileBlock[],
	excludedExtensions: readonly string[],
): { included: FileBlock[]; excluded: string[] } {
	const included: FileBlock[] = [];
	const excluded: string[] = [];

	for (const file of files) {
		if (isExcludedFile(file.filename, excludedExtensions)) {
			excluded.push(file.filename);
		} else {
			included.push(file);
		}
	}

	return { included, excluded };
}
