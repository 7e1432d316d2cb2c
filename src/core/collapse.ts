/**
 * Line-run collapser.
 *
 * Splits a hunk body into maximal runs of same-class lines and replaces the
 * middle of long runs with a single placeholder line. Added runs can keep
 * declaration lines (function/class openers) that would otherwise be hidden.
 */

import { classifyLine } from "./parser";
import { isSignatureLine } from "./signatures";
import type { LineKind } from "./types";

export interface CollapseOptions {
	contextLines: number;
	maxAddedLines: number;
	maxRemovedLines: number;
	/** Declaration patterns for added-run rescue; empty disables rescue */
	signaturePatterns: RegExp[];
}

export interface LineRun {
	kind: LineKind;
	lines: string[];
}

export interface CollapsedLines {
	lines: string[];
	collapsed: number;
	rescued: number;
}

const RUN_LABELS: Record<Exclude<LineKind, "meta">, string> = {
	context: "unchanged",
	added: "added",
	removed: "removed",
};

export function formatCollapsedMarker(
	count: number,
	kind: Exclude<LineKind, "meta">,
): string {
	return `... [${count} ${RUN_LABELS[kind]} lines collapsed] ...`;
}

/**
 * Partition lines into maximal same-kind runs.
 * Meta lines (any other prefix) always form a run of one.
 */
export function splitRuns(lines: string[]): LineRun[] {
	const runs: LineRun[] = [];
	let current: LineRun | null = null;

	for (const line of lines) {
		const kind = classifyLine(line);
		if (current && current.kind === kind && kind !== "meta") {
			current.lines.push(line);
			continue;
		}
		current = { kind, lines: [line] };
		runs.push(current);
	}

	return runs;
}

/**
 * Keep `head` lines, a placeholder, optional rescued lines, then `tail` lines.
 */
function collapseRun(
	run: LineRun,
	kind: Exclude<LineKind, "meta">,
	head: number,
	tail: number,
	signaturePatterns: RegExp[],
): CollapsedLines {
	const { lines } = run;
	const middle = lines.slice(head, lines.length - tail);
	const rescued =
		kind === "added" && signaturePatterns.length > 0
			? middle.filter((line) => isSignatureLine(line, signaturePatterns))
			: [];
	const hidden = middle.length - rescued.length;

	const output = lines.slice(0, head);
	if (hidden > 0) output.push(formatCollapsedMarker(hidden, kind));
	output.push(...rescued, ...lines.slice(lines.length - tail));

	return { lines: output, collapsed: hidden, rescued: rescued.length };
}

function transformRun(run: LineRun, options: CollapseOptions): CollapsedLines {
	const count = run.lines.length;
	const kind = run.kind;

	switch (kind) {
		case "context": {
			const keep = options.contextLines;
			if (count <= keep * 2) break;
			return collapseRun(run, "context", keep, keep, []);
		}
		case "added":
		case "removed": {
			const max =
				kind === "added" ? options.maxAddedLines : options.maxRemovedLines;
			if (count <= max) break;
			const head = Math.floor(max / 2);
			return collapseRun(
				run,
				kind,
				head,
				max - head,
				options.signaturePatterns,
			);
		}
		case "meta":
			break;
	}

	return { lines: run.lines, collapsed: 0, rescued: 0 };
}

/**
 * Collapse long runs within a hunk body, preserving run order.
 */
export function collapseHunkLines(
	lines: string[],
	options: CollapseOptions,
): CollapsedLines {
	const result: CollapsedLines = { lines: [], collapsed: 0, rescued: 0 };

	for (const run of splitRuns(lines)) {
		const transformed = transformRun(run, options);
		result.lines.push(...transformed.lines);
		result.collapsed += transformed.collapsed;
		result.rescued += transformed.rescued;
	}

	return result;
}
