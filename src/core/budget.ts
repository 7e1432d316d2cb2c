/**
 * Output builder that enforces the global character ceiling.
 */

export const TRUNCATION_MARKER = "... [DIFF TRUNCATED DUE TO SIZE LIMIT] ...";

export class OutputBudget {
	private readonly lines: string[] = [];
	private used = 0;
	private exhausted = false;

	constructor(
		private readonly maxChars: number,
		private readonly marker: string = TRUNCATION_MARKER,
	) {}

	/**
	 * Append a line, charging its length plus one separator.
	 * The line that reaches the ceiling is clipped to the remaining budget
	 * and followed by the truncation marker. Returns false once the budget
	 * is spent; no further lines are accepted after that.
	 */
	tryAppend(line: string): boolean {
		if (this.exhausted) return false;

		const remaining = this.maxChars - this.used;
		const cost = line.length + 1;
		if (cost < remaining) {
			this.lines.push(line);
			this.used += cost;
			return true;
		}

		let end = Math.max(0, remaining - 1);
		// Keep surrogate pairs whole
		const last = line.charCodeAt(end - 1);
		if (end > 0 && last >= 0xd800 && last <= 0xdbff) end--;
		this.lines.push(line.slice(0, end));
		this.lines.push(this.marker);
		this.used = this.maxChars;
		this.exhausted = true;
		return false;
	}

	get truncated(): boolean {
		return this.exhausted;
	}

	/** Characters charged so far, including separators */
	get charged(): number {
		return this.used;
	}

	toString(): string {
		return this.lines.join("\n");
	}
}
