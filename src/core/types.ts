/**
 * Shared types for the diff compression engine.
 */

export interface Hunk {
	/** The `@@ -a,b +c,d @@` line, verbatim */
	header: string;
	lines: string[];
}

/**
 * Content that appears before the first `diff --git` line.
 * Always kept, never filtered or hunk-capped.
 */
export interface Preamble {
	headerLines: string[];
	hunks: Hunk[];
}

export interface FileBlock extends Preamble {
	filename: string;
}

export interface ParsedDiff {
	preamble: Preamble;
	files: FileBlock[];
}

export type LineKind = "context" | "added" | "removed" | "meta";

export interface CompressionOptions {
	/** Global character ceiling for the composed output */
	maxChars: number;
	/** Lines kept at each end of a collapsed unchanged run */
	contextLines: number;
	maxAddedLines: number;
	maxRemovedLines: number;
	maxHunksPerFile: number;
	/** Dotted suffixes, matched case-insensitively against the filename */
	excludedExtensions: string[];
	/** Reinsert declaration lines that fall inside a collapsed added run */
	structuralRescue: boolean;
	/** Extra regex sources treated as declaration patterns for every file */
	rescuePatterns: string[];
}

export interface CompressionStats {
	inputChars: number;
	outputChars: number;
	filesSeen: number;
	filesEmitted: number;
	excludedFiles: string[];
	omittedHunks: number;
	collapsedLines: number;
	rescuedLines: number;
	truncated: boolean;
}

export interface CompressionResult {
	text: string;
	stats: CompressionStats;
}
