/**
 * Unified diff parser.
 * Single pass over the input lines, driven by an explicit three-state machine.
 */

import type { FileBlock, Hunk, LineKind, ParsedDiff, Preamble } from "./types";

type ParserState = "outside-file" | "in-file-header" | "in-hunk";

const FILE_HEADER_REGEX = /^diff --git (?:"?a\/(.+?)"? "?b\/(.+?)"?|(.+))$/;
const HUNK_HEADER_REGEX = /^@@ -\d+(?:,\d+)? \+\d+(?:,\d+)? @@/;

export function isFileHeader(line: string): boolean {
	return line.startsWith("diff --git ");
}

export function isHunkHeader(line: string): boolean {
	return HUNK_HEADER_REGEX.test(line);
}

/**
 * Extract the filename from a `diff --git a/<path> b/<path>` line.
 * Prefers the new (b/) path so renames are judged by their destination.
 */
export function parseFilename(headerLine: string): string {
	const line = headerLine.endsWith("\r") ? headerLine.slice(0, -1) : headerLine;
	const match = line.match(FILE_HEADER_REGEX);
	if (!match) return "";
	return match[2] ?? match[1] ?? match[3] ?? "";
}

/**
 * Classify a hunk body line by its prefix character.
 */
export function classifyLine(line: string): LineKind {
	switch (line[0]) {
		case " ":
			return "context";
		case "+":
			return "added";
		case "-":
			return "removed";
		default:
			return "meta";
	}
}

/**
 * Split raw diff text into lines. A single trailing newline does not
 * produce an empty last line.
 */
export function splitLines(raw: string): string[] {
	if (raw === "") return [];
	const lines = raw.split("\n");
	if (lines[lines.length - 1] === "") lines.pop();
	return lines;
}

/**
 * Parse a raw unified diff into a preamble and per-file blocks.
 * Never throws; unrecognizable input ends up in the preamble.
 */
export function parseDiff(raw: string): ParsedDiff {
	const preamble: Preamble = { headerLines: [], hunks: [] };
	const files: FileBlock[] = [];

	let state: ParserState = "outside-file";
	let block: Preamble = preamble;
	let hunk: Hunk | null = null;

	for (const line of splitLines(raw)) {
		if (isFileHeader(line)) {
			const file: FileBlock = {
				filename: parseFilename(line),
				headerLines: [line],
				hunks: [],
			};
			files.push(file);
			block = file;
			hunk = null;
			state = "in-file-header";
			continue;
		}

		if (isHunkHeader(line)) {
			hunk = { header: line, lines: [] };
			block.hunks.push(hunk);
			state = "in-hunk";
			continue;
		}

		switch (state) {
			case "outside-file":
			case "in-file-header":
				block.headerLines.push(line);
				break;
			case "in-hunk":
				hunk?.lines.push(line);
				break;
		}
	}

	return { preamble, files };
}
