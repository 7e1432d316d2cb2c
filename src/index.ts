/**
 * diffpress - bounded-size pull request diffs for AI review
 * Entry point for the command line.
 */

import { processIO, runCli } from "./cli";
import { logger } from "./logger";

async function main() {
	const code = await runCli(process.argv.slice(2), processIO);
	process.exitCode = code;
}

// Run
main().catch((error) => {
	logger.fatal({ err: error }, "diffpress failed");
	process.exit(1);
});
