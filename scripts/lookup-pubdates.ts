import { parseArgs, toOverrides } from "../src/lib/cli-args";
import { loadConfig } from "../src/lib/config";
import { createLogger } from "../src/lib/logger";
import { formatProgressLine } from "../src/lib/run/orchestrator";
import { lookupPublicationDates } from "../src/lib/run/lookup";

async function main() {
  const config = loadConfig(process.env, toOverrides(parseArgs(process.argv.slice(2))));
  const logger = createLogger({ level: config.logLevel, meta: { component: "pubdates" } });

  const result = await lookupPublicationDates(config, {
    logger,
    onProgress: ({ title, date }) => console.log(formatProgressLine(title, date)),
  });

  logger.info({ ...result.stats, summaryPath: result.summaryPath }, "Lookup complete");
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
