/**
 * Command-line handling: read a diff from a PR URL, a file or stdin,
 * print the compressed diff to stdout.
 */

import { readFile } from "node:fs/promises";
import { parseArgs } from "node:util";
import type { Octokit } from "@octokit/rest";
import {
	getGitHubToken,
	loadCompressionOptions,
	resolveCompressionOptions,
} from "./config";
import { compressDiffWithStats } from "./core/diff";
import type { CompressionOptions, CompressionResult } from "./core/types";
import { ConfigError } from "./errors";
import { createGitHubClient } from "./github";
import { cliLogger } from "./logger";
import { compressPullRequestDiff, logCompressionStats } from "./pipeline";

export const USAGE = `diffpress - compress a pull request diff to a bounded size

Usage:
  diffpress <pr-url>          fetch and compress a GitHub pull request diff
  diffpress <path>            compress a diff file
  diffpress -                 compress a diff read from stdin

Options:
  --max-chars <n>       Global character ceiling (default: 24000)
  --context-lines <n>   Unchanged lines kept around collapsed runs (default: 3)
  --max-hunks <n>       Hunks kept per file (default: 12)
  --stats               Print compression stats as JSON to stderr
  -h, --help            Show this help

Environment Variables:
  GITHUB_TOKEN              Token for private repositories
  DIFF_MAX_CHARS            Default for --max-chars
  DIFF_CONTEXT_LINES        Default for --context-lines
  DIFF_MAX_HUNKS_PER_FILE   Default for --max-hunks
  DIFF_MAX_ADDED_LINES      Added lines kept before a run collapses (default: 30)
  DIFF_MAX_REMOVED_LINES    Removed lines kept before a run collapses (default: 30)
  DIFF_EXCLUDED_EXTENSIONS  Comma-separated suffixes to drop (e.g. .lock,.json)
  DIFF_STRUCTURAL_RESCUE    Keep declaration lines in collapsed runs (default: true)
  DIFF_RESCUE_PATTERNS      Comma-separated extra declaration regexes
`;

export type DiffSource =
	| { kind: "pull-request"; url: string }
	| { kind: "file"; path: string }
	| { kind: "stdin" };

export interface CliArgs {
	command: "compress" | "help";
	source: DiffSource | null;
	stats: boolean;
	overrides: Partial<CompressionOptions>;
}

export interface CliIO {
	stdout: (text: string) => void;
	stderr: (text: string) => void;
	readStdin: () => Promise<string>;
	readFile: (path: string) => Promise<string>;
	octokit?: Octokit;
}

function parseCount(
	flag: string,
	value: string | undefined,
): number | undefined {
	if (value === undefined) return undefined;
	if (!/^\d+$/.test(value)) {
		throw new ConfigError(
			`--${flag} expects a non-negative integer, got "${value}"`,
		);
	}
	return Number(value);
}

export function resolveSource(input: string): DiffSource {
	if (input === "-") return { kind: "stdin" };
	if (/^https?:\/\//i.test(input)) return { kind: "pull-request", url: input };
	return { kind: "file", path: input };
}

/**
 * Parse CLI arguments (without the node and script entries).
 */
export function parseCliArgs(argv: string[]): CliArgs {
	const { values, positionals } = parseArgs({
		args: argv,
		allowPositionals: true,
		options: {
			"max-chars": { type: "string" },
			"context-lines": { type: "string" },
			"max-hunks": { type: "string" },
			stats: { type: "boolean", default: false },
			help: { type: "boolean", short: "h", default: false },
		},
	});

	if (values.help) {
		return { command: "help", source: null, stats: false, overrides: {} };
	}

	if (positionals.length > 1) {
		throw new ConfigError(
			`Expected one diff source, got ${positionals.length}`,
		);
	}
	const [input] = positionals;

	const overrides: Partial<CompressionOptions> = {};
	const maxChars = parseCount("max-chars", values["max-chars"]);
	if (maxChars !== undefined) overrides.maxChars = maxChars;
	const contextLines = parseCount("context-lines", values["context-lines"]);
	if (contextLines !== undefined) overrides.contextLines = contextLines;
	const maxHunks = parseCount("max-hunks", values["max-hunks"]);
	if (maxHunks !== undefined) overrides.maxHunksPerFile = maxHunks;

	return {
		command: input === undefined ? "help" : "compress",
		source: input === undefined ? null : resolveSource(input),
		stats: values.stats === true,
		overrides,
	};
}

async function compressSource(
	source: DiffSource,
	options: CompressionOptions,
	io: CliIO,
): Promise<CompressionResult> {
	if (source.kind === "pull-request") {
		return compressPullRequestDiff(source.url, {
			octokit: io.octokit ?? createGitHubClient(getGitHubToken()),
			options,
		});
	}

	const diff =
		source.kind === "file"
			? await io.readFile(source.path)
			: await io.readStdin();
	const result = compressDiffWithStats(diff, options);
	logCompressionStats(result.stats, cliLogger);
	return result;
}

/**
 * Run the CLI. Returns the process exit code.
 */
export async function runCli(argv: string[], io: CliIO): Promise<number> {
	const args = parseCliArgs(argv);
	if (args.command === "help" || args.source === null) {
		io.stdout(USAGE);
		return 0;
	}

	const options = resolveCompressionOptions({
		...loadCompressionOptions(),
		...args.overrides,
	});

	const result = await compressSource(args.source, options, io);
	io.stdout(result.text === "" ? "" : `${result.text}\n`);
	if (args.stats) {
		io.stderr(`${JSON.stringify(result.stats, null, 2)}\n`);
	}
	return 0;
}

async function readStdin(): Promise<string> {
	const chunks: Buffer[] = [];
	for await (const chunk of process.stdin) {
		chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
	}
	return Buffer.concat(chunks).toString("utf-8");
}

export const processIO: CliIO = {
	stdout: (text) => {
		process.stdout.write(text);
	},
	stderr: (text) => {
		process.stderr.write(text);
	},
	readStdin,
	readFile: (path) => readFile(path, "utf-8"),
};
