/**
 * Zod schemas for compression options.
 * Options come from code, the environment or CLI flags, so they are
 * validated once before any diff is processed.
 */

import { z } from "zod";

function isValidRegex(source: string): boolean {
	try {
		new RegExp(source);
		return true;
	} catch {
		return false;
	}
}

const count = z.number().int().nonnegative();

export const CompressionOptionsSchema = z.object({
	maxChars: z.number().int().positive(),
	contextLines: count,
	maxAddedLines: count,
	maxRemovedLines: count,
	maxHunksPerFile: count,
	excludedExtensions: z.array(z.string()),
	structuralRescue: z.boolean(),
	rescuePatterns: z.array(
		z.string().min(1).refine(isValidRegex, "Invalid regular expression"),
	),
});

/**
 * Render zod issues as a single line, e.g. `maxChars: Expected number`.
 */
export function formatIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) => {
			const path = issue.path.join(".");
			return path ? `${path}: ${issue.message}` : issue.message;
		})
		.join("; ");
}
