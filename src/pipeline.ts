/**
 * Fetch a pull request diff and compress it for a size-limited consumer.
 */

import type { Octokit } from "@octokit/rest";
import type { Logger } from "pino";
import { compressDiffWithStats } from "./core/diff";
import type {
	CompressionOptions,
	CompressionResult,
	CompressionStats,
} from "./core/types";
import { fetchPullRequestDiff, parsePullRequestUrl } from "./github";
import { pipelineLogger } from "./logger";

export interface PipelineDeps {
	octokit: Octokit;
	options?: Partial<CompressionOptions>;
}

/**
 * Log what compression dropped so nothing disappears silently.
 */
export function logCompressionStats(
	stats: CompressionStats,
	log: Logger = pipelineLogger,
): void {
	if (stats.excludedFiles.length > 0) {
		log.debug({ files: stats.excludedFiles }, "Excluded non-reviewable files");
	}
	if (stats.truncated) {
		log.warn(
			{ inputChars: stats.inputChars, outputChars: stats.outputChars },
			"Diff truncated at size limit",
		);
	}
	log.info(
		{
			inputChars: stats.inputChars,
			outputChars: stats.outputChars,
			filesSeen: stats.filesSeen,
			filesEmitted: stats.filesEmitted,
			excluded: stats.excludedFiles.length,
			omittedHunks: stats.omittedHunks,
			collapsedLines: stats.collapsedLines,
			rescuedLines: stats.rescuedLines,
		},
		"Diff compressed",
	);
}

/**
 * Compress the diff of the pull request at `url`.
 * URL and GitHub errors propagate to the caller.
 */
export async function compressPullRequestDiff(
	url: string,
	deps: PipelineDeps,
): Promise<CompressionResult> {
	const ref = parsePullRequestUrl(url);
	const log = pipelineLogger.child({
		repo: `${ref.owner}/${ref.repo}`,
		pullNumber: ref.pullNumber,
	});

	const diff = await fetchPullRequestDiff(deps.octokit, ref);
	if (diff.length === 0) {
		log.debug("Empty diff, nothing to compress");
	}

	const result = compressDiffWithStats(diff, deps.options);
	logCompressionStats(result.stats, log);
	return result;
}
