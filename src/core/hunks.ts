import type { FileBlock, Hunk } from "./types";

export interface LimitedHunks {
	hunks: Hunk[];
	omitted: number;
	/** Trailing marker line, present only when hunks were dropped */
	marker: string | null;
}

export function formatOmittedHunksMarker(
	omitted: number,
	filename: string,
): string {
	return `... [ ${omitted} additional hunks omitted for ${filename} ]`;
}

/**
 * Keep the first `maxHunks` hunks of a file in document order.
 */
export function limitHunks(file: FileBlock, maxHunks: number): LimitedHunks {
	if (file.hunks.length <= maxHunks) {
		return { hunks: file.hunks, omitted: 0, marker: null };
	}

	const omitted = file.hunks.length - maxHunks;
	return {
		hunks: file.hunks.slice(0, maxHunks),
		omitted,
		marker: formatOmittedHunksMarker(omitted, file.filename),
	};
}
