import { resolve } from "node:path";
import { createLogger } from "./logger";
import { loadConfig } from "./config";
import { createStateStore } from "./state";
import { createSinks } from "./sinks";
import { runOnce } from "./run";

const CONFIG_PATH = process.env["CONFIG_PATH"] ?? "./config.yaml";

async function main(): Promise<void> {
  const logger = createLogger();

  logger.info("feed-relay starting");

  let config;
  try {
    config = loadConfig(resolve(CONFIG_PATH));
  } catch (err) {
    logger.fatal(
      { error: err instanceof Error ? err.message : String(err) },
      "configuration error",
    );
    process.exit(1);
  }

  logger.info(
    {
      feedCount: config.feeds.length,
      stateDriver: config.state.driver,
      dedupPolicy: config.dedup.policy,
    },
    "config loaded",
  );

  const { store, close } = createStateStore(
    { ...config.state, path: resolve(config.state.path) },
    logger,
  );
  const sinks = createSinks(config.sinks, process.env["REMOTE_SINK_TOKEN"], logger);

  try {
    const summary = await runOnce({ config, store, sinks, logger });
    logger.info(
      {
        newCount: summary.newItems.length,
        sentCount: summary.sentCount,
        errors: summary.errors,
      },
      `found ${summary.newItems.length} new items, sent ${summary.sentCount}`,
    );
  } finally {
    close();
  }
}

main().catch((err) => {
  console.error("fatal run error:", err);
  process.exit(1);
});
