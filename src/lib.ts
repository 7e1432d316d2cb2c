/**
 * Public library surface.
 */

export {
	DEFAULT_COMPRESSION_OPTIONS,
	loadCompressionOptions,
	resolveCompressionOptions,
} from "./config";
export { TRUNCATION_MARKER } from "./core/budget";
export { compressDiff, compressDiffWithStats } from "./core/diff";
export { parseDiff } from "./core/parser";
export type {
	CompressionOptions,
	CompressionResult,
	CompressionStats,
	FileBlock,
	Hunk,
	ParsedDiff,
	Preamble,
} from "./core/types";
export {
	ConfigError,
	DiffpressError,
	GitHubAPIError,
	InvalidPullRequestUrlError,
} from "./errors";
export {
	createGitHubClient,
	fetchPullRequestDiff,
	parsePullRequestUrl,
	type PullRequestRef,
} from "./github";
export { compressPullRequestDiff } from "./pipeline";
