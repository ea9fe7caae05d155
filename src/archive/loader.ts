/**
 * Archive content loader.
 *
 * Walks an exported forum archive and materializes every category and topic:
 *
 *   <root>/
 *     _export.yml                 optional export totals
 *     images/                     assets, never walked
 *     1-general/
 *       _category.yml             category descriptor
 *       100-welcome.md            topic: YAML front-matter + Markdown body
 *       2-announcements/          sub-category, parent inherited
 *         _category.yml
 *         101-release-notes.md
 *
 * Each file parses to a tagged {@link ParseResult}; the walk turns the first
 * failure into a load error and stops. A load either yields a dataset that
 * passed {@link assertArchiveIntegrity} or throws an {@link ArchiveLoadError}.
 *
 * Directory entries are visited in natural name order ("2-x" before
 * "10-x"). That order is the load order the store preserves for root
 * categories, children and topic lists.
 */

import type { Dirent } from "node:fs";
import { readdir, readFile, stat } from "node:fs/promises";
import { basename, extname, join, resolve } from "node:path";

import matter from "gray-matter";
import { parse as parseYaml } from "yaml";
import type { ZodError } from "zod";

import { silentLogger, type Logger } from "../logging/index.js";
import {
  ArchiveRootError,
  DuplicateIdError,
  MalformedCategoryError,
  MalformedExportInfoError,
  MalformedTopicError,
  type ArchiveIssue,
} from "./errors.js";
import { assertArchiveIntegrity } from "./integrity.js";
import { renderMarkdown } from "./markdown.js";
import {
  CategoryDescriptorSchema,
  EMPTY_EXPORT_INFO,
  ExportDescriptorSchema,
  TopicFrontMatterSchema,
  type ArchiveDataset,
  type Category,
  type ExportInfo,
  type Topic,
} from "./schema.js";

export const EXPORT_DESCRIPTOR = "_export.yml";
export const CATEGORY_DESCRIPTOR = "_category.yml";
export const DEFAULT_TOPIC_EXTENSIONS: readonly string[] = [".md"];

const TOPIC_STEM_PATTERN = /^(\d+)-(.+)$/;

/**
 * Outcome of parsing one file.
 */
export type ParseResult<T> =
  | { success: true; value: T }
  | { success: false; issues: ArchiveIssue[] };

export interface LoadArchiveOptions {
  /** Extensions (with leading dot) recognized as topic files. Default: [".md"] */
  topicExtensions?: readonly string[];
  /** Images directory to skip during the walk. Default: <root>/images */
  imagesPath?: string;
  logger?: Logger;
}

// ============================================================
// File-level parsers
// ============================================================

function zodIssues(error: ZodError): ArchiveIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.join(".") || "(file)",
    message: issue.message,
  }));
}

function syntaxIssue(err: unknown): ArchiveIssue[] {
  return [{ field: "(file)", message: err instanceof Error ? err.message : String(err) }];
}

/**
 * Match a topic file name against `<numeric-id>-<slug>.<ext>`.
 *
 * @returns The id and slug encoded in the name, or null if the file is not a topic file
 */
export function matchTopicFileName(
  fileName: string,
  extensions: readonly string[] = DEFAULT_TOPIC_EXTENSIONS
): { id: number; slug: string } | null {
  const ext = extname(fileName).toLowerCase();
  if (!extensions.includes(ext)) {
    return null;
  }
  const match = TOPIC_STEM_PATTERN.exec(basename(fileName, extname(fileName)));
  if (!match || match[1] === undefined || match[2] === undefined) {
    return null;
  }
  return { id: Number(match[1]), slug: match[2] };
}

/**
 * Parse the export descriptor. Only the `export_info` block is read.
 */
export function parseExportDescriptor(source: string): ParseResult<ExportInfo> {
  let raw: unknown;
  try {
    raw = parseYaml(source);
  } catch (err) {
    return { success: false, issues: syntaxIssue(err) };
  }

  // An empty file is an export with no recorded totals
  const result = ExportDescriptorSchema.safeParse(raw ?? {});
  if (!result.success) {
    return { success: false, issues: zodIssues(result.error) };
  }

  const info = result.data.export_info;
  return {
    success: true,
    value: Object.freeze({
      totalUsers: info?.total_users ?? null,
      totalCategories: info?.total_categories ?? null,
      totalTopics: info?.total_topics ?? null,
      totalPosts: info?.total_posts ?? null,
      exportedAt: info?.exported_at ?? null,
    }),
  };
}

/**
 * Parse a category descriptor.
 *
 * @param inheritedParentId - Category of the enclosing directory, used when
 *   the descriptor has no `parent_cid` key
 */
export function parseCategoryDescriptor(
  source: string,
  filePath: string | null,
  inheritedParentId: number | null = null
): ParseResult<Category> {
  let raw: unknown;
  try {
    raw = parseYaml(source);
  } catch (err) {
    return { success: false, issues: syntaxIssue(err) };
  }

  const result = CategoryDescriptorSchema.safeParse(raw);
  if (!result.success) {
    return { success: false, issues: zodIssues(result.error) };
  }

  const data = result.data;
  return {
    success: true,
    value: Object.freeze({
      id: data.id,
      name: data.name,
      slug: data.slug,
      parentId: data.parent_cid === undefined ? inheritedParentId : data.parent_cid,
      description: data.description ?? null,
      icon: data.icon ?? null,
      bgColor: data.bgColor ?? null,
      color: data.color ?? null,
      order: data.order,
      disabled: data.disabled,
      postCount: data.postcount,
      sourcePath: filePath,
    }),
  };
}

/**
 * Parse a topic file: YAML front-matter followed by a Markdown body.
 * The slug comes from the file name when it follows the topic naming
 * convention, otherwise from the whole file stem.
 */
export function parseTopicFile(source: string, filePath: string): ParseResult<Topic> {
  let data: unknown;
  let content: string;
  try {
    // Passing options bypasses gray-matter's process-wide content cache
    const parsed = matter(source, { excerpt: false });
    data = parsed.data;
    content = parsed.content;
  } catch (err) {
    return { success: false, issues: syntaxIssue(err) };
  }

  const result = TopicFrontMatterSchema.safeParse(data);
  if (!result.success) {
    return { success: false, issues: zodIssues(result.error) };
  }

  const fm = result.data;
  const fileName = basename(filePath);
  const slug =
    matchTopicFileName(fileName, [extname(fileName).toLowerCase()])?.slug ??
    basename(fileName, extname(fileName));
  const body = content.trim();

  return {
    success: true,
    value: Object.freeze({
      id: fm.topic_id,
      title: fm.title,
      slug,
      authorId: fm.author_id,
      categoryId: fm.category_id,
      created: fm.created,
      lastPost: fm.last_post ?? null,
      viewCount: fm.view_count,
      rating: fm.rating,
      postCount: fm.post_count,
      tags: Object.freeze([...(fm.tags ?? [])]),
      deleted: fm.deleted,
      locked: fm.locked,
      pinned: fm.pinned,
      body,
      bodyHtml: renderMarkdown(body),
      sourcePath: filePath,
    }),
  };
}

// ============================================================
// Directory walk
// ============================================================

function hasErrorCode(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}

function byNaturalName(a: Dirent, b: Dirent): number {
  return a.name.localeCompare(b.name, "en", { numeric: true });
}

/**
 * Mutable state for one load. Discarded when the load finishes.
 */
interface WalkState {
  readonly extensions: readonly string[];
  readonly imagesPath: string;
  readonly logger: Logger;
  readonly categories: Category[];
  readonly topics: Topic[];
  readonly categoryPaths: Map<number, string | null>;
  readonly topicPaths: Map<number, string | null>;
}

async function readCategory(
  filePath: string,
  enclosingCategoryId: number | null,
  state: WalkState
): Promise<Category> {
  const parsed = parseCategoryDescriptor(
    await readFile(filePath, "utf-8"),
    filePath,
    enclosingCategoryId
  );
  if (!parsed.success) {
    throw new MalformedCategoryError(filePath, parsed.issues);
  }

  const category = parsed.value;
  if (state.categoryPaths.has(category.id)) {
    throw new DuplicateIdError(
      "category",
      category.id,
      state.categoryPaths.get(category.id) ?? null,
      filePath
    );
  }
  if (enclosingCategoryId !== null && category.parentId !== enclosingCategoryId) {
    state.logger.warn("Category parent differs from enclosing directory", {
      file: filePath,
      categoryId: category.id,
      parentId: category.parentId,
      enclosingCategoryId,
    });
  }

  state.categoryPaths.set(category.id, filePath);
  state.categories.push(category);
  return category;
}

async function readTopic(
  filePath: string,
  enclosingCategoryId: number | null,
  state: WalkState
): Promise<void> {
  const parsed = parseTopicFile(await readFile(filePath, "utf-8"), filePath);
  if (!parsed.success) {
    throw new MalformedTopicError(filePath, parsed.issues);
  }

  const topic = parsed.value;
  if (state.topicPaths.has(topic.id)) {
    throw new DuplicateIdError(
      "topic",
      topic.id,
      state.topicPaths.get(topic.id) ?? null,
      filePath
    );
  }
  if (enclosingCategoryId !== null && topic.categoryId !== enclosingCategoryId) {
    state.logger.warn("Topic category differs from enclosing directory", {
      file: filePath,
      topicId: topic.id,
      categoryId: topic.categoryId,
      enclosingCategoryId,
    });
  }

  state.topicPaths.set(topic.id, filePath);
  state.topics.push(topic);
}

/**
 * Visit one directory: its descriptor first, then topic files, then
 * sub-directories with the directory's category as their context.
 */
async function walkDirectory(
  dir: string,
  enclosingCategoryId: number | null,
  state: WalkState
): Promise<void> {
  const entries = (await readdir(dir, { withFileTypes: true })).sort(byNaturalName);

  let currentCategoryId = enclosingCategoryId;
  if (entries.some((entry) => entry.isFile() && entry.name === CATEGORY_DESCRIPTOR)) {
    const category = await readCategory(
      join(dir, CATEGORY_DESCRIPTOR),
      enclosingCategoryId,
      state
    );
    currentCategoryId = category.id;
  }

  for (const entry of entries) {
    if (entry.isFile() && matchTopicFileName(entry.name, state.extensions) !== null) {
      await readTopic(join(dir, entry.name), currentCategoryId, state);
    }
  }

  for (const entry of entries) {
    if (!entry.isDirectory() || entry.name.startsWith(".")) continue;

    const subDir = join(dir, entry.name);
    if (subDir === state.imagesPath) continue;

    await walkDirectory(subDir, currentCategoryId, state);
  }
}

async function readExportInfo(rootDir: string): Promise<ExportInfo> {
  const filePath = join(rootDir, EXPORT_DESCRIPTOR);

  let source: string;
  try {
    source = await readFile(filePath, "utf-8");
  } catch (err) {
    if (hasErrorCode(err, "ENOENT")) {
      return EMPTY_EXPORT_INFO;
    }
    throw err;
  }

  const parsed = parseExportDescriptor(source);
  if (!parsed.success) {
    throw new MalformedExportInfoError(filePath, parsed.issues);
  }
  return parsed.value;
}

/**
 * Load a complete archive from disk.
 *
 * @param rootDir - Archive root directory
 * @returns Categories and topics in load order, with export totals
 * @throws ArchiveRootError if the root is missing or not a directory
 * @throws MalformedCategoryError | MalformedTopicError | MalformedExportInfoError
 *   on the first file that fails to parse
 * @throws DuplicateIdError | DanglingReferenceError | CategoryCycleError
 *   if the files parse but do not form a consistent archive
 */
export async function loadArchive(
  rootDir: string,
  options: LoadArchiveOptions = {}
): Promise<ArchiveDataset> {
  const root = resolve(rootDir);
  const logger = options.logger ?? silentLogger;

  try {
    if (!(await stat(root)).isDirectory()) {
      throw new ArchiveRootError(root, "is not a directory");
    }
  } catch (err) {
    if (hasErrorCode(err, "ENOENT")) {
      throw new ArchiveRootError(root, "does not exist");
    }
    throw err;
  }

  const state: WalkState = {
    extensions: (options.topicExtensions ?? DEFAULT_TOPIC_EXTENSIONS).map((ext) =>
      ext.toLowerCase()
    ),
    imagesPath: resolve(options.imagesPath ?? join(root, "images")),
    logger,
    categories: [],
    topics: [],
    categoryPaths: new Map(),
    topicPaths: new Map(),
  };

  const exportInfo = await readExportInfo(root);
  await walkDirectory(root, null, state);

  const dataset: ArchiveDataset = {
    exportInfo,
    categories: state.categories,
    topics: state.topics,
  };
  assertArchiveIntegrity(dataset);

  logger.debug("Archive files parsed", {
    root,
    categories: dataset.categories.length,
    topics: dataset.topics.length,
  });

  return dataset;
}
