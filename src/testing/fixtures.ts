/**
 * Test fixtures: in-memory entities and on-disk archive trees.
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";

import {
  EMPTY_EXPORT_INFO,
  type ArchiveDataset,
  type Category,
  type Topic,
} from "../archive/schema.js";
import type { LogLevel, Logger } from "../logging/index.js";
import { createLogger } from "../logging/index.js";

export function makeCategory(overrides: Partial<Category> & Pick<Category, "id">): Category {
  return {
    name: `Category ${overrides.id}`,
    slug: `category-${overrides.id}`,
    parentId: null,
    description: null,
    icon: null,
    bgColor: null,
    color: null,
    order: 0,
    disabled: false,
    postCount: 0,
    sourcePath: null,
    ...overrides,
  };
}

export function makeTopic(
  overrides: Partial<Topic> & Pick<Topic, "id" | "categoryId">
): Topic {
  return {
    title: `Topic ${overrides.id}`,
    slug: `topic-${overrides.id}`,
    authorId: 1,
    created: new Date("2024-01-01T00:00:00Z"),
    lastPost: null,
    viewCount: 0,
    rating: 0,
    postCount: 1,
    tags: [],
    deleted: false,
    locked: false,
    pinned: false,
    body: "",
    bodyHtml: "",
    sourcePath: null,
    ...overrides,
  };
}

export function makeDataset(
  categories: Category[],
  topics: Topic[] = []
): ArchiveDataset {
  return { exportInfo: EMPTY_EXPORT_INFO, categories, topics };
}

/**
 * Render a `_category.yml` descriptor. `parent_cid` is written only when
 * given, so an omitted parent exercises directory inheritance.
 */
export function categoryYaml(fields: {
  id: number;
  name: string;
  slug: string;
  parent_cid?: number | null;
  extra?: string;
}): string {
  const lines = [`id: ${fields.id}`, `name: ${fields.name}`, `slug: ${fields.slug}`];
  if (fields.parent_cid !== undefined) {
    lines.push(`parent_cid: ${fields.parent_cid === null ? "null" : fields.parent_cid}`);
  }
  if (fields.extra !== undefined) {
    lines.push(fields.extra);
  }
  return lines.join("\n") + "\n";
}

/**
 * Render a topic file: front-matter from `fields` (written verbatim, in
 * order) followed by `body`.
 */
export function topicMarkdown(fields: Record<string, string | number>, body = ""): string {
  const frontMatter = Object.entries(fields).map(([key, value]) => `${key}: ${value}`);
  return ["---", ...frontMatter, "---", "", body].join("\n");
}

export interface TempArchive {
  readonly root: string;
  /** Write (or overwrite) a file relative to the root. */
  write(relativePath: string, content: string): string;
  remove(): void;
}

/**
 * Create an archive tree in a fresh temporary directory.
 *
 * @param files - Relative path -> file content
 */
export function createTempArchive(files: Record<string, string> = {}): TempArchive {
  const root = mkdtempSync(join(tmpdir(), "forum-archive-test-"));

  const write = (relativePath: string, content: string): string => {
    const filePath = join(root, relativePath);
    mkdirSync(dirname(filePath), { recursive: true });
    writeFileSync(filePath, content, "utf-8");
    return filePath;
  };

  for (const [relativePath, content] of Object.entries(files)) {
    write(relativePath, content);
  }

  return {
    root,
    write,
    remove: () => rmSync(root, { recursive: true, force: true }),
  };
}

/**
 * Run `fn` against a temporary archive, removing it afterwards.
 */
export async function withTempArchive<T>(
  files: Record<string, string>,
  fn: (archive: TempArchive) => Promise<T> | T
): Promise<T> {
  const archive = createTempArchive(files);
  try {
    return await fn(archive);
  } finally {
    archive.remove();
  }
}

export interface CapturedLog {
  level: LogLevel;
  line: string;
}

/**
 * A logger that records its lines instead of printing them.
 */
export function captureLogger(level: LogLevel = "debug"): { logger: Logger; lines: CapturedLog[] } {
  const lines: CapturedLog[] = [];
  const logger = createLogger({
    level,
    console: false,
    sink: (entryLevel, line) => lines.push({ level: entryLevel, line }),
  });
  return { logger, lines };
}

/**
 * The end-to-end archive: categories 1 "Root" and 2 "Sub" (under 1), topics
 * 10 "Hello World" and 11 "Hello Again" in category 2, 10 created first.
 */
export const BASIC_ARCHIVE: Record<string, string> = {
  "_export.yml": "export_info:\n  total_users: 3\n  total_topics: 2\n  total_posts: 5\n",
  "1-root/_category.yml": categoryYaml({ id: 1, name: "Root", slug: "root" }),
  "1-root/2-sub/_category.yml": categoryYaml({ id: 2, name: "Sub", slug: "sub" }),
  "1-root/2-sub/10-hello-world.md": topicMarkdown(
    {
      topic_id: 10,
      title: "Hello World",
      author_id: 1,
      category_id: 2,
      created: "2024-01-01T10:00:00Z",
      view_count: 5,
    },
    "First **post**"
  ),
  "1-root/2-sub/11-hello-again.md": topicMarkdown(
    {
      topic_id: 11,
      title: "Hello Again",
      author_id: 2,
      category_id: 2,
      created: "2024-01-02T10:00:00Z",
      view_count: 3,
    },
    "Second post"
  ),
};
