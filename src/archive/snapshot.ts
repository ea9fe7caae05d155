/**
 * Archive snapshots: a store and its search index, built and published
 * together so they always describe the same load.
 */

import { stat } from "node:fs/promises";

import type { AppConfig } from "../config/index.js";
import { generateLoadId, silentLogger, type Logger } from "../logging/index.js";
import { loadArchive } from "./loader.js";
import type { ArchiveDataset } from "./schema.js";
import { TitleSearchIndex } from "./search.js";
import { ArchiveStore } from "./store.js";

export interface ArchiveSnapshot {
  readonly loadId: string;
  readonly store: ArchiveStore;
  readonly search: TitleSearchIndex;
  /** Images directory for the web layer to serve; null if it does not exist */
  readonly imagesPath: string | null;
}

export interface CreateSnapshotOptions {
  loadId?: string;
  loadedAt?: Date;
  imagesPath?: string | null;
}

/**
 * Index a dataset into a frozen snapshot.
 *
 * @throws DuplicateIdError | DanglingReferenceError | CategoryCycleError
 *   if the dataset is inconsistent
 */
export function createSnapshot(
  dataset: ArchiveDataset,
  options: CreateSnapshotOptions = {}
): ArchiveSnapshot {
  const store = ArchiveStore.create(dataset, { loadedAt: options.loadedAt });
  return Object.freeze({
    loadId: options.loadId ?? generateLoadId(),
    store,
    search: TitleSearchIndex.fromStore(store),
    imagesPath: options.imagesPath ?? null,
  });
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return false;
    }
    throw err;
  }
}

export interface OpenArchiveOptions {
  logger?: Logger;
}

/**
 * Load the archive named by the configuration and index it.
 * This is the standard loader passed to ArchiveHolder.init/reload.
 *
 * @throws ArchiveLoadError if the archive cannot be loaded
 */
export async function openArchive(
  config: Pick<AppConfig, "dataPath" | "imagesPath" | "topicExtensions">,
  options: OpenArchiveOptions = {}
): Promise<ArchiveSnapshot> {
  const loadId = generateLoadId();
  const logger = (options.logger ?? silentLogger).child({ component: "loader", loadId });
  const startedAt = Date.now();

  logger.info("Loading archive", { dataPath: config.dataPath });

  const dataset = await loadArchive(config.dataPath, {
    topicExtensions: config.topicExtensions,
    imagesPath: config.imagesPath,
    logger,
  });

  const imagesPath = (await isDirectory(config.imagesPath)) ? config.imagesPath : null;
  if (imagesPath === null) {
    logger.warn("Images directory not found", { imagesPath: config.imagesPath });
  }

  const snapshot = createSnapshot(dataset, { loadId, imagesPath });
  const stats = snapshot.store.stats();

  logger.info("Archive loaded", {
    categories: stats.categories,
    topics: stats.topics,
    searchTokens: snapshot.search.size,
    durationMs: Date.now() - startedAt,
  });

  return snapshot;
}
