/**
 * Compression defaults and the ways to override them: code, DIFF_*
 * environment variables and CLI flags all resolve through here.
 */

import { DEFAULT_EXCLUDED_EXTENSIONS } from "./core/filters";
import { CompressionOptionsSchema, formatIssues } from "./core/schemas";
import type { CompressionOptions } from "./core/types";
import { ConfigError } from "./errors";

// =============================================================================
// Defaults
// =============================================================================

/** Global character ceiling for the compressed diff */
export const DEFAULT_MAX_CHARS = 24000;

/** Unchanged lines kept at each end of a collapsed context run */
export const DEFAULT_CONTEXT_LINES = 3;

/** Added lines kept (head + tail) before a run is collapsed */
export const DEFAULT_MAX_ADDED_LINES = 30;

/** Removed lines kept (head + tail) before a run is collapsed */
export const DEFAULT_MAX_REMOVED_LINES = 30;

/** Hunks kept per file, in document order */
export const DEFAULT_MAX_HUNKS_PER_FILE = 12;

export type DefaultCompressionOptions = Readonly<
	Omit<CompressionOptions, "excludedExtensions" | "rescuePatterns">
> & {
	readonly excludedExtensions: readonly string[];
	readonly rescuePatterns: readonly string[];
};

export const DEFAULT_COMPRESSION_OPTIONS: DefaultCompressionOptions =
	Object.freeze({
		maxChars: DEFAULT_MAX_CHARS,
		contextLines: DEFAULT_CONTEXT_LINES,
		maxAddedLines: DEFAULT_MAX_ADDED_LINES,
		maxRemovedLines: DEFAULT_MAX_REMOVED_LINES,
		maxHunksPerFile: DEFAULT_MAX_HUNKS_PER_FILE,
		excludedExtensions: Object.freeze([...DEFAULT_EXCLUDED_EXTENSIONS]),
		structuralRescue: true,
		rescuePatterns: Object.freeze([]),
	});

// =============================================================================
// Helpers
// =============================================================================

/**
 * Merge partial options over the defaults and validate the result.
 * Throws ConfigError when any value is out of range.
 */
export function resolveCompressionOptions(
	overrides: Partial<CompressionOptions> = {},
): CompressionOptions {
	// Explicit undefined must not mask a default
	const defined = Object.fromEntries(
		Object.entries(overrides).filter(([, value]) => value !== undefined),
	);

	const parsed = CompressionOptionsSchema.safeParse({
		...DEFAULT_COMPRESSION_OPTIONS,
		...defined,
	});
	if (!parsed.success) {
		throw new ConfigError(
			`Invalid compression options: ${formatIssues(parsed.error)}`,
		);
	}
	return parsed.data;
}

function readNumber(value: string | undefined): number | undefined {
	if (value === undefined || value.trim() === "") return undefined;
	return Number(value);
}

function readList(value: string | undefined): string[] | undefined {
	if (value === undefined || value.trim() === "") return undefined;
	return value
		.split(",")
		.map((item) => item.trim())
		.filter((item) => item !== "");
}

function readBoolean(value: string | undefined): boolean | undefined {
	if (value === undefined || value.trim() === "") return undefined;
	return !["false", "0", "no", "off"].includes(value.trim().toLowerCase());
}

/**
 * Build compression options from DIFF_* environment variables.
 * Unset variables fall back to the defaults.
 */
export function loadCompressionOptions(
	env: NodeJS.ProcessEnv = process.env,
): CompressionOptions {
	return resolveCompressionOptions({
		maxChars: readNumber(env.DIFF_MAX_CHARS),
		contextLines: readNumber(env.DIFF_CONTEXT_LINES),
		maxAddedLines: readNumber(env.DIFF_MAX_ADDED_LINES),
		maxRemovedLines: readNumber(env.DIFF_MAX_REMOVED_LINES),
		maxHunksPerFile: readNumber(env.DIFF_MAX_HUNKS_PER_FILE),
		excludedExtensions: readList(env.DIFF_EXCLUDED_EXTENSIONS),
		structuralRescue: readBoolean(env.DIFF_STRUCTURAL_RESCUE),
		rescuePatterns: readList(env.DIFF_RESCUE_PATTERNS),
	});
}

/**
 * Get the GitHub token used to fetch pull request diffs.
 * Public repositories can be read without one.
 */
export function getGitHubToken(): string | undefined {
	return process.env.GITHUB_TOKEN || undefined;
}
