/**
 * GitHub access for pull request diffs.
 */

import { Octokit } from "@octokit/rest";
import { GitHubAPIError, InvalidPullRequestUrlError } from "./errors";
import { githubLogger } from "./logger";

export interface PullRequestRef {
	owner: string;
	repo: string;
	pullNumber: number;
}

/**
 * Parse `https://github.com/<owner>/<repo>/pull/<number>` into its parts.
 * Trailing path segments (e.g. `/files`) are ignored.
 */
export function parsePullRequestUrl(url: string): PullRequestRef {
	let parsed: URL;
	try {
		parsed = new URL(url);
	} catch {
		throw new InvalidPullRequestUrlError(url, "not a URL");
	}

	if (parsed.protocol !== "https:" || parsed.hostname !== "github.com") {
		throw new InvalidPullRequestUrlError(
			url,
			"must be an https://github.com URL",
		);
	}

	const [owner, repo, kind, number] = parsed.pathname
		.split("/")
		.filter(Boolean);
	if (!owner || !repo || kind !== "pull" || !number || !/^\d+$/.test(number)) {
		throw new InvalidPullRequestUrlError(
			url,
			"expected /<owner>/<repo>/pull/<number>",
		);
	}

	return { owner, repo, pullNumber: Number(number) };
}

/**
 * Create an Octokit client. Without a token only public repos are reachable.
 */
export function createGitHubClient(
	token?: string,
	fetchImpl?: typeof fetch,
): Octokit {
	return new Octokit({
		auth: token,
		userAgent: "diffpress",
		request: fetchImpl ? { fetch: fetchImpl } : undefined,
	});
}

function errorStatus(error: unknown): number | undefined {
	if (typeof error === "object" && error !== null && "status" in error) {
		const { status } = error;
		return typeof status === "number" ? status : undefined;
	}
	return undefined;
}

/**
 * Fetch the raw unified diff of a pull request.
 */
export async function fetchPullRequestDiff(
	octokit: Octokit,
	ref: PullRequestRef,
): Promise<string> {
	const log = githubLogger.child({
		repo: `${ref.owner}/${ref.repo}`,
		pullNumber: ref.pullNumber,
	});

	let data: unknown;
	try {
		const response = await octokit.pulls.get({
			owner: ref.owner,
			repo: ref.repo,
			pull_number: ref.pullNumber,
			mediaType: {
				format: "diff",
			},
		});
		data = response.data;
	} catch (error) {
		const status = errorStatus(error);
		log.error({ err: error, status }, "Failed to fetch pull request diff");
		throw new GitHubAPIError(
			`Failed to fetch diff for ${ref.owner}/${ref.repo}#${ref.pullNumber}`,
			status,
			error instanceof Error ? error : undefined,
		);
	}

	// When requesting diff format, response.data is the diff text
	if (typeof data !== "string") {
		log.error({ payloadType: typeof data }, "Unexpected diff payload");
		const pr = `${ref.owner}/${ref.repo}#${ref.pullNumber}`;
		throw new GitHubAPIError(`GitHub returned a non-text diff for ${pr}`);
	}

	log.info({ diffSize: data.length }, "Fetched pull request diff");
	return data;
}
