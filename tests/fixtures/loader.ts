/**
 * Fixture loader utilities for diff tests.
 */

import { existsSync, readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

const FIXTURES_BASE = join(dirname(fileURLToPath(import.meta.url)), "diffs");

/**
 * Load a raw diff fixture by name (without the .diff extension).
 */
export function loadDiffFixture(name: string): string {
	const filepath = join(FIXTURES_BASE, `${name}.diff`);
	if (!existsSync(filepath)) {
		throw new Error(`Fixture not found: ${filepath}`);
	}
	return readFileSync(filepath, "utf-8");
}
