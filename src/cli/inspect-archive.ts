#!/usr/bin/env node
/**
 * CLI command to load an archive export and inspect it.
 *
 * Loads the archive exactly as the service does (same loader, same
 * validation), then prints:
 * - Load statistics and export totals
 * - The category tree with topic counts
 * - One category's topics, sorted and paged
 * - Title search results, optionally limited to a category
 *
 * Usage:
 *   npx tsx src/cli/inspect-archive.ts [options]
 *   archive-inspect [options]
 *
 * Options:
 *   --data <dir>          Archive root (default: ARCHIVE_DATA_PATH or ./data)
 *   --images <dir>        Images directory (default: <data>/images)
 *   --tree                Print the category tree
 *   --category <id|path>  List a category's topics ("12", "12/general" or "12-general")
 *   --recursive           Include topics of sub-categories
 *   --search <query>      Search topic titles (all words must match)
 *   --sort <key>          created | last_post | view_count | rating (default: created)
 *   --order <dir>         asc | desc (default: desc)
 *   --page <n>            Page number (default: 1)
 *   --page-size <n>       Topics per page, 1-100 (default: 20)
 *   --json                Output as JSON
 *   --verbose             Log loader progress
 *   -h, --help            Show help
 *
 * Exit codes:
 *   0 - Archive loaded and the requested view printed
 *   1 - Load failed, bad parameters, or unknown category
 */

import { resolve, join } from "node:path";
import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import { parseArgs } from "node:util";

import {
  ArchiveLoadError,
  NotFoundError,
  ValidationError,
  openArchive,
  paginateTopics,
  parsePageRequest,
  resolveEntityId,
  type ArchiveSnapshot,
  type ArchiveStore,
  type Category,
  type CategoryTreeNode,
  type Topic,
  type TopicPage,
} from "../archive/index.js";
import { ConfigError, loadConfig, type EnvSource } from "../config/index.js";
import { createLogger, initRunId } from "../logging/index.js";

// ============================================================
// Types
// ============================================================

export interface InspectOptions {
  data?: string;
  images?: string;
  tree: boolean;
  category?: string;
  recursive: boolean;
  search?: string;
  sort?: string;
  order?: string;
  page?: string;
  pageSize?: string;
  json: boolean;
  verbose: boolean;
}

export interface InspectResult {
  exitCode: number;
  /** Lines for stdout (or a single JSON document) */
  output: string[];
}

interface TopicSummary {
  id: number;
  title: string;
  categoryId: number;
  created: string;
  lastPost: string | null;
  viewCount: number;
  rating: number;
}

// ============================================================
// CLI Parsing
// ============================================================

const HELP = `
Usage: archive-inspect [options]

Options:
  --data <dir>          Archive root (default: ARCHIVE_DATA_PATH or ./data)
  --images <dir>        Images directory (default: <data>/images)
  --tree                Print the category tree
  --category <id|path>  List a category's topics ("12", "12/general" or "12-general")
  --recursive           Include topics of sub-categories
  --search <query>      Search topic titles (all words must match)
  --sort <key>          created | last_post | view_count | rating (default: created)
  --order <dir>         asc | desc (default: desc)
  --page <n>            Page number (default: 1)
  --page-size <n>       Topics per page, 1-100 (default: 20)
  --json                Output as JSON
  --verbose             Log loader progress
  -h, --help            Show this help message
`;

/**
 * Parse command-line arguments.
 *
 * @returns The options, or null when help was requested
 */
export function parseInspectArgs(args: string[]): InspectOptions | null {
  const { values } = parseArgs({
    args,
    options: {
      data: { type: "string" },
      images: { type: "string" },
      tree: { type: "boolean", default: false },
      category: { type: "string" },
      recursive: { type: "boolean", default: false },
      search: { type: "string" },
      sort: { type: "string" },
      order: { type: "string" },
      page: { type: "string" },
      "page-size": { type: "string" },
      json: { type: "boolean", default: false },
      verbose: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    return null;
  }

  return {
    data: values.data,
    images: values.images,
    tree: values.tree ?? false,
    category: values.category,
    recursive: values.recursive ?? false,
    search: values.search,
    sort: values.sort,
    order: values.order,
    page: values.page,
    pageSize: values["page-size"],
    json: values.json ?? false,
    verbose: values.verbose ?? false,
  };
}

// ============================================================
// Output Formatting
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  red: "\x1b[31m",
};

const useColors = process.stdout.isTTY === true && !process.env["NO_COLOR"];

function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

function formatDate(date: Date | null): string {
  return date === null ? "-" : date.toISOString().slice(0, 10);
}

/**
 * Load statistics and the export's own totals.
 */
export function formatStats(snapshot: ArchiveSnapshot): string[] {
  const stats = snapshot.store.stats();
  const info = snapshot.store.getExportInfo();
  const lines = [
    `Categories: ${stats.categories}`,
    `Topics:     ${stats.topics}`,
    `Load ID:    ${snapshot.loadId}`,
    `Images:     ${snapshot.imagesPath ?? "(none)"}`,
  ];
  if (info.totalTopics !== null || info.totalPosts !== null || info.totalUsers !== null) {
    lines.push(
      `Export:     ${info.totalTopics ?? "?"} topics, ${info.totalPosts ?? "?"} posts, ${info.totalUsers ?? "?"} users`
    );
  }
  return lines;
}

/**
 * One line per category, indented by depth:
 * `<name> [<id>] <direct>/<total> topics`.
 */
export function formatCategoryTree(nodes: readonly CategoryTreeNode[], depth = 0): string[] {
  const lines: string[] = [];
  for (const node of nodes) {
    lines.push(
      `${"  ".repeat(depth)}${node.category.name} [${node.category.id}] ${node.topicCount}/${node.totalTopicCount} topics`
    );
    lines.push(...formatCategoryTree(node.children, depth + 1));
  }
  return lines;
}

/**
 * Page header followed by one line per topic:
 * `#<id> <title> (<created date>, <views> views)`.
 */
export function formatTopicPage(page: TopicPage): string[] {
  const lines = [
    `Page ${page.page}/${page.totalPages} (${page.total} topics, ${page.sortBy} ${page.order})`,
  ];
  for (const topic of page.items) {
    lines.push(
      `  #${topic.id} ${topic.title} (${formatDate(topic.created)}, ${topic.viewCount} views)`
    );
  }
  return lines;
}

function summarize(topic: Topic): TopicSummary {
  return {
    id: topic.id,
    title: topic.title,
    categoryId: topic.categoryId,
    created: topic.created.toISOString(),
    lastPost: topic.lastPost?.toISOString() ?? null,
    viewCount: topic.viewCount,
    rating: topic.rating,
  };
}

function pageToJson(page: TopicPage): Record<string, unknown> {
  return {
    total: page.total,
    page: page.page,
    pageSize: page.pageSize,
    totalPages: page.totalPages,
    sortBy: page.sortBy,
    order: page.order,
    items: page.items.map(summarize),
  };
}

function treeToJson(nodes: readonly CategoryTreeNode[]): unknown[] {
  return nodes.map((node) => ({
    id: node.category.id,
    name: node.category.name,
    topicCount: node.topicCount,
    totalTopicCount: node.totalTopicCount,
    children: treeToJson(node.children),
  }));
}

// ============================================================
// Inspection
// ============================================================

/**
 * Resolve a `--category` argument to a category.
 *
 * @throws ValidationError if the argument does not start with an id
 * @throws NotFoundError if no category has that id
 */
export function resolveCategoryArg(store: ArchiveStore, arg: string): Category {
  const id = resolveEntityId(arg);
  if (id === undefined) {
    throw new ValidationError([
      { field: "category", message: `not a category id: ${arg}`, allowed: "<id>, <id>/<slug> or <id>-<slug>" },
    ]);
  }
  return store.requireCategory(id);
}

/**
 * Render the requested views of a loaded snapshot.
 *
 * @throws ValidationError | NotFoundError on bad arguments
 */
export function inspectSnapshot(snapshot: ArchiveSnapshot, options: InspectOptions): string[] {
  const { store } = snapshot;
  const request = parsePageRequest({
    page: options.page,
    page_size: options.pageSize,
    sort_by: options.sort,
    order: options.order,
  });

  const category =
    options.category !== undefined ? resolveCategoryArg(store, options.category) : undefined;

  let candidates: readonly number[] | undefined;
  if (category !== undefined) {
    candidates = store.getTopicsInCategory(category.id, options.recursive);
  }
  if (options.search !== undefined) {
    const matches = snapshot.search.search(options.search);
    candidates =
      candidates === undefined ? [...matches] : candidates.filter((id) => matches.has(id));
  }
  const page = candidates !== undefined ? paginateTopics(store, candidates, request) : undefined;

  if (options.json) {
    const stats = store.stats();
    return [
      JSON.stringify(
        {
          stats: {
            categories: stats.categories,
            topics: stats.topics,
            loadedAt: stats.loadedAt.toISOString(),
            loadId: snapshot.loadId,
          },
          ...(options.tree ? { tree: treeToJson(store.getCategoryTree()) } : {}),
          ...(category !== undefined
            ? { category: store.getCategoryPath(category.id).map((cat) => ({ id: cat.id, name: cat.name })) }
            : {}),
          ...(options.search !== undefined ? { search: options.search } : {}),
          ...(page !== undefined ? { page: pageToJson(page) } : {}),
        },
        null,
        2
      ),
    ];
  }

  const lines = formatStats(snapshot);

  if (options.tree) {
    lines.push("", "Categories", ...formatCategoryTree(store.getCategoryTree()));
  }

  if (category !== undefined) {
    const crumbs = store.getCategoryPath(category.id).map((cat) => cat.name).join(" > ");
    lines.push("", `Category: ${crumbs}${options.recursive ? " (recursive)" : ""}`);
  }
  if (options.search !== undefined) {
    lines.push("", `Search: ${options.search}`);
  }
  if (page !== undefined) {
    lines.push(...formatTopicPage(page));
  }

  if (!options.tree && page === undefined) {
    lines.push("", "Recent topics");
    for (const topic of store.getRecentTopics(5)) {
      lines.push(`  #${topic.id} ${topic.title} (${formatDate(topic.created)})`);
    }
  }

  return lines;
}

/**
 * Load the archive and inspect it. Known failures become exit code 1 with
 * a formatted report; anything else propagates.
 */
export async function runInspect(
  options: InspectOptions,
  env: EnvSource = process.env
): Promise<InspectResult> {
  try {
    const config = loadConfig(env);
    const dataPath = options.data !== undefined ? resolve(options.data) : config.dataPath;
    const imagesPath =
      options.images !== undefined
        ? resolve(options.images)
        : options.data !== undefined
          ? join(dataPath, "images")
          : config.imagesPath;

    const logger = createLogger({
      level: options.verbose ? "debug" : "warn",
      file: config.logFile,
    });
    const snapshot = await openArchive(
      { dataPath, imagesPath, topicExtensions: config.topicExtensions },
      { logger }
    );

    return { exitCode: 0, output: inspectSnapshot(snapshot, options) };
  } catch (err) {
    if (err instanceof ArchiveLoadError || err instanceof ValidationError) {
      return { exitCode: 1, output: [err.format()] };
    }
    if (err instanceof NotFoundError || err instanceof ConfigError) {
      return { exitCode: 1, output: [`${err.name}: ${err.message}`] };
    }
    throw err;
  }
}

// ============================================================
// Main
// ============================================================

async function main(): Promise<void> {
  initRunId();

  let options: InspectOptions | null;
  try {
    options = parseInspectArgs(process.argv.slice(2));
  } catch (err) {
    console.error(c("red", err instanceof Error ? err.message : String(err)));
    console.log(HELP);
    process.exit(1);
  }

  if (options === null) {
    console.log(HELP);
    process.exit(0);
  }

  const result = await runInspect(options);
  const write = result.exitCode === 0 ? console.log : console.error;
  for (const line of result.output) {
    write(line);
  }
  process.exit(result.exitCode);
}

// Resolve symlinks: npm installs bins as links to the built file
const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(realpathSync(entry)).href) {
  await main();
}
