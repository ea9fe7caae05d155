/**
 * Entry point: loads the configured archive and publishes the first snapshot.
 *
 * The web layer that serves the snapshot is a separate collaborator; it
 * receives the holder returned by {@link start}.
 */

import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";

import { ArchiveHolder, ArchiveLoadError, openArchive } from "./archive/index.js";
import { ConfigError, loadConfig, type AppConfig } from "./config/index.js";
import { createLogger, getRunId, initRunId, type Logger } from "./logging/index.js";

export interface Application {
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly holder: ArchiveHolder;
  /** Rebuild the snapshot from disk; the old one stays published on failure. */
  reload(): Promise<void>;
}

/**
 * Load configuration and the archive.
 *
 * @throws ConfigError | ArchiveLoadError
 */
export async function start(
  config: AppConfig = loadConfig(),
  logger: Logger = createLogger({ level: config.logLevel, file: config.logFile })
): Promise<Application> {
  logger.info("Application starting", { runId: getRunId() });
  logger.info("Configuration loaded", {
    env: config.env,
    logLevel: config.logLevel,
    appName: config.appName,
    dataPath: config.dataPath,
    imagesPath: config.imagesPath,
    topicExtensions: config.topicExtensions,
  });

  const holder = new ArchiveHolder(logger);
  const load = () => openArchive(config, { logger });
  await holder.init(load);

  return {
    config,
    logger,
    holder,
    reload: async () => {
      await holder.reload(load);
    },
  };
}

async function main(): Promise<void> {
  initRunId();

  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      createLogger().error("Configuration error", { message: err.message });
      process.exit(1);
    }
    throw err;
  }

  const logger = createLogger({ level: config.logLevel, file: config.logFile });
  try {
    const app = await start(config, logger);
    const stats = app.holder.current().store.stats();
    app.logger.info("Application initialized successfully", {
      categories: stats.categories,
      topics: stats.topics,
    });
  } catch (err) {
    if (err instanceof ArchiveLoadError) {
      logger.error("Archive load failed", { report: err.format() });
      process.exit(1);
    }
    throw err;
  }
}

// Resolve symlinks: npm installs bins as links to the built file
const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(realpathSync(entry)).href) {
  await main();
}
