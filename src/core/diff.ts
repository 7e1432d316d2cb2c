/**
 * Pure functions for compressing git diffs.
 * Shrinks a unified diff to a bounded size before AI processing while
 * keeping file and hunk headers intact.
 *
 * Pipeline: parse → drop excluded files → cap hunks per file →
 * collapse long line runs → enforce the global character budget.
 * Nothing here performs I/O or logs; callers report the returned stats.
 */

import { resolveCompressionOptions } from "../config";
import { OutputBudget } from "./budget";
import { collapseHunkLines } from "./collapse";
import { filterFiles } from "./filters";
import { limitHunks } from "./hunks";
import { parseDiff } from "./parser";
import { signaturePatternsFor } from "./signatures";
import type {
	CompressionOptions,
	CompressionResult,
	CompressionStats,
	Hunk,
} from "./types";

interface BlockContext {
	budget: OutputBudget;
	options: CompressionOptions;
	stats: CompressionStats;
	signaturePatterns: RegExp[];
}

/**
 * Emit a hunk header and its collapsed body.
 * Returns false once the budget is spent.
 */
function emitHunk(hunk: Hunk, ctx: BlockContext): boolean {
	if (!ctx.budget.tryAppend(hunk.header)) return false;

	const collapsed = collapseHunkLines(hunk.lines, {
		contextLines: ctx.options.contextLines,
		maxAddedLines: ctx.options.maxAddedLines,
		maxRemovedLines: ctx.options.maxRemovedLines,
		signaturePatterns: ctx.signaturePatterns,
	});
	ctx.stats.collapsedLines += collapsed.collapsed;
	ctx.stats.rescuedLines += collapsed.rescued;

	for (const line of collapsed.lines) {
		if (!ctx.budget.tryAppend(line)) return false;
	}
	return true;
}

function emitBlock(
	headerLines: string[],
	hunks: Hunk[],
	trailer: string | null,
	ctx: BlockContext,
): boolean {
	for (const line of headerLines) {
		if (!ctx.budget.tryAppend(line)) return false;
	}
	for (const hunk of hunks) {
		if (!emitHunk(hunk, ctx)) return false;
	}
	if (trailer !== null) return ctx.budget.tryAppend(trailer);
	return true;
}

function compilePatterns(sources: string[]): RegExp[] {
	return sources.map((source) => new RegExp(source));
}

/**
 * Compress a raw unified diff and report what was dropped along the way.
 * Total over arbitrary input text; only invalid options throw (ConfigError).
 */
export function compressDiffWithStats(
	raw: string,
	overrides: Partial<CompressionOptions> = {},
): CompressionResult {
	const options = resolveCompressionOptions(overrides);
	const extraPatterns = compilePatterns(options.rescuePatterns);
	const budget = new OutputBudget(options.maxChars);

	const parsed = parseDiff(raw);
	const { included, excluded } = filterFiles(
		parsed.files,
		options.excludedExtensions,
	);

	const stats: CompressionStats = {
		inputChars: raw.length,
		outputChars: 0,
		filesSeen: parsed.files.length,
		filesEmitted: 0,
		excludedFiles: excluded,
		omittedHunks: 0,
		collapsedLines: 0,
		rescuedLines: 0,
		truncated: false,
	};

	const patternsFor = (filename: string | null): RegExp[] => {
		if (!options.structuralRescue) return [];
		const language = filename === null ? [] : signaturePatternsFor(filename);
		return [...language, ...extraPatterns];
	};

	// Preamble bypasses filtering and the hunk cap
	let open = emitBlock(parsed.preamble.headerLines, parsed.preamble.hunks, null, {
		budget,
		options,
		stats,
		signaturePatterns: patternsFor(null),
	});

	for (const file of included) {
		if (!open) break;

		// A file counts as emitted once its diff --git line fits in full
		const [diffLine, ...headerLines] = file.headerLines;
		if (diffLine !== undefined && !budget.tryAppend(diffLine)) break;
		stats.filesEmitted++;

		const limited = limitHunks(file, options.maxHunksPerFile);
		stats.omittedHunks += limited.omitted;

		open = emitBlock(headerLines, limited.hunks, limited.marker, {
			budget,
			options,
			stats,
			signaturePatterns: patternsFor(file.filename),
		});
	}

	const text = budget.toString();
	stats.outputChars = text.length;
	stats.truncated = budget.truncated;

	return { text, stats };
}

/**
 * Compress a raw unified diff to at most `maxChars` characters plus the
 * truncation marker.
 */
export function compressDiff(
	raw: string,
	overrides: Partial<CompressionOptions> = {},
): string {
	return compressDiffWithStats(raw, overrides).text;
}
