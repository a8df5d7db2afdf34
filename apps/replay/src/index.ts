/**
 * Principal-token scenario replay
 *
 * Replays a JSON scenario (holders, allowances, reserve, then a list of
 * redeem / withdraw / approve / transfer / advance steps) against an
 * in-memory principal token and logs every outcome.
 *
 * Usage:
 *   npm run replay                                — replay PT_SCENARIO or the bundled scenario
 *   npm run replay -- --scenario path/to/file.json
 *
 * Environment variables:
 *   PT_SCENARIO, LOG_LEVEL
 *
 * Exits with status 1 when a step's outcome differs from its `expect`.
 */

import { config } from "./config";
import { logger } from "./logger";
import { replayScenario } from "./replay";
import { loadScenario } from "./scenario";

async function main() {
  const pathArg = process.argv.indexOf("--scenario");
  const path = pathArg !== -1 ? process.argv[pathArg + 1] : config.scenarioPath;
  if (!path) {
    logger.error("--scenario needs a file path. Exiting.");
    process.exit(1);
  }

  logger.info(`Loading scenario: ${path}`);
  const scenario = await loadScenario(path);
  const report = replayScenario(scenario, logger);

  for (const [account, balance] of Object.entries(report.balances)) {
    logger.info(`${account}: ${balance} PT, ${report.received[account] ?? 0n} underlying received`);
  }

  if (report.failures.length > 0) {
    for (const failure of report.failures) {
      logger.error(
        `Step #${failure.index} (${failure.op}) expected ${failure.expected}, ` +
        `got ${failure.ok ? "ok" : failure.code}`
      );
    }
    process.exit(1);
  }
}

main().catch((err) => {
  logger.error(`Fatal: ${err}`);
  process.exit(1);
});
