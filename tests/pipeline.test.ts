import pino from "pino";
import { describe, expect, test } from "vitest";
import { compressDiff } from "../src/core/diff";
import { InvalidPullRequestUrlError } from "../src/errors";
import { createGitHubClient } from "../src/github";
import { compressPullRequestDiff, logCompressionStats } from "../src/pipeline";
import { loadDiffFixture } from "./fixtures/loader";
import { stubFetch } from "./helpers";

const PR_URL = "https://github.com/octo/widgets/pull/7";

function captureLogger() {
	const entries: Array<Record<string, unknown>> = [];
	const log = pino(
		{ level: "debug", base: null },
		{
			write: (line: string) => {
				entries.push(JSON.parse(line));
			},
		},
	);
	return { log, entries };
}

describe("compressPullRequestDiff", () => {
	test("fetches and compresses the pull request diff", async () => {
		const diff = loadDiffFixture("mixed-files");
		const stub = stubFetch(diff);

		const result = await compressPullRequestDiff(PR_URL, {
			octokit: createGitHubClient(undefined, stub.fetch),
		});

		expect(result.text).toBe(compressDiff(diff));
		expect(result.stats.excludedFiles).toHaveLength(4);
		expect(stub.requests[0]?.url).toBe(
			"https://api.github.com/repos/octo/widgets/pulls/7",
		);
	});

	test("passes options through to the compressor", async () => {
		const diff = loadDiffFixture("mixed-files");
		const stub = stubFetch(diff);

		const result = await compressPullRequestDiff(PR_URL, {
			octokit: createGitHubClient(undefined, stub.fetch),
			options: { maxChars: 40 },
		});

		expect(result.text).toBe(compressDiff(diff, { maxChars: 40 }));
		expect(result.stats.truncated).toBe(true);
	});

	test("returns an empty result for an empty diff", async () => {
		const stub = stubFetch("");

		const result = await compressPullRequestDiff(PR_URL, {
			octokit: createGitHubClient(undefined, stub.fetch),
		});

		expect(result.text).toBe("");
		expect(result.stats.filesSeen).toBe(0);
	});

	test("rejects invalid URLs before calling GitHub", async () => {
		const stub = stubFetch("");

		await expect(
			compressPullRequestDiff("https://example.com/pull/1", {
				octokit: createGitHubClient(undefined, stub.fetch),
			}),
		).rejects.toBeInstanceOf(InvalidPullRequestUrlError);
		expect(stub.requests).toHaveLength(0);
	});
});

describe("logCompressionStats", () => {
	const stats = {
		inputChars: 90000,
		outputChars: 24042,
		filesSeen: 30,
		filesEmitted: 12,
		excludedFiles: ["yarn.lock"],
		omittedHunks: 2,
		collapsedLines: 310,
		rescuedLines: 4,
		truncated: true,
	};

	test("logs excluded files, truncation and a summary", () => {
		const { log, entries } = captureLogger();

		logCompressionStats(stats, log);

		expect(entries.map((e) => e.msg)).toEqual([
			"Excluded non-reviewable files",
			"Diff truncated at size limit",
			"Diff compressed",
		]);
		expect(entries[0]?.files).toEqual(["yarn.lock"]);
		expect(entries[2]).toMatchObject({
			filesSeen: 30,
			filesEmitted: 12,
			excluded: 1,
			omittedHunks: 2,
		});
	});

	test("only logs the summary when nothing was dropped", () => {
		const { log, entries } = captureLogger();

		logCompressionStats(
			{ ...stats, excludedFiles: [], truncated: false },
			log,
		);

		expect(entries.map((e) => e.msg)).toEqual(["Diff compressed"]);
	});
});
