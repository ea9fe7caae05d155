/**
 * Immutable archive store with id-indexed hierarchy.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * INDEXES
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   categoriesById   id -> Category
 *   topicsById       id -> Topic
 *   categoryTree     parent id (or ROOT_KEY) -> child category ids
 *   categoryTopics   category id -> ids of topics directly in it
 *
 * The hierarchy lives only in these id maps. Categories hold a parentId and
 * nothing else; there are no child arrays or parent pointers on the entities.
 *
 * Every list keeps load order (see loader.ts). Nothing is re-sorted, and
 * everything is frozen, timestamps included (their setters throw): a store
 * never changes after create(). Reloading
 * means building a new store and publishing it (see holder.ts).
 */

import type { ArchiveDataset, Category, ExportInfo, Topic } from "./schema.js";
import { EMPTY_EXPORT_INFO } from "./schema.js";
import { NotFoundError, ValidationError } from "./errors.js";
import { assertArchiveIntegrity } from "./integrity.js";

/** Key of root categories in the category tree. */
const ROOT_KEY = "root";
type TreeKey = number | typeof ROOT_KEY;

export interface StoreStats {
  categories: number;
  topics: number;
  loadedAt: Date;
}

/**
 * One category in the nested view returned by getCategoryTree().
 */
export interface CategoryTreeNode {
  readonly category: Category;
  /** Topics directly in this category */
  readonly topicCount: number;
  /** Topics in this category and all descendants */
  readonly totalTopicCount: number;
  readonly children: readonly CategoryTreeNode[];
}

export interface CreateStoreOptions {
  /** Load timestamp reported by stats(). Default: now */
  loadedAt?: Date;
}

/**
 * Extract the entity id from a URL path segment.
 * Accepts "20/some-slug", the older "20-some-slug", and a bare "20".
 *
 * @returns The id, or undefined if the path does not start with one
 */
export function resolveEntityId(path: string): number | undefined {
  const match = /^(\d+)(?:[/-].*)?$/s.exec(path.trim());
  if (!match || match[1] === undefined) {
    return undefined;
  }
  const id = Number(match[1]);
  return Number.isSafeInteger(id) && id > 0 ? id : undefined;
}

function pushToIndex<K, V>(index: Map<K, V[]>, key: K, value: V): void {
  const bucket = index.get(key);
  if (bucket) {
    bucket.push(value);
  } else {
    index.set(key, [value]);
  }
}

function freezeIndex<K, V>(index: Map<K, V[]>): ReadonlyMap<K, ReadonlyArray<V>> {
  const frozen = new Map<K, ReadonlyArray<V>>();
  for (const [key, value] of index) {
    frozen.set(key, Object.freeze(value));
  }
  return frozen;
}

/** A Date whose setters throw, so timestamps held by a store stay fixed. */
class FrozenDate extends Date {}

function rejectDateMutation(): never {
  throw new TypeError("Archive timestamps are read-only");
}

for (const name of Object.getOwnPropertyNames(Date.prototype)) {
  if (name.startsWith("set")) {
    Object.defineProperty(FrozenDate.prototype, name, { value: rejectDateMutation });
  }
}

function freezeDate(date: Date): Date {
  return Object.freeze(new FrozenDate(date.getTime()));
}

function freezeTopic(topic: Topic): Topic {
  return Object.freeze({
    ...topic,
    created: freezeDate(topic.created),
    lastPost: topic.lastPost === null ? null : freezeDate(topic.lastPost),
    tags: Object.freeze([...topic.tags]),
  });
}

/**
 * Immutable, indexed view of one loaded archive.
 *
 * @example
 *   const store = ArchiveStore.create(await loadArchive("data/"));
 *
 *   for (const root of store.getRootCategories()) {
 *     const ids = store.getTopicsInCategory(root.id, true);
 *   }
 *
 *   const crumbs = store.getCategoryPath(topic.categoryId).map((c) => c.name);
 */
export class ArchiveStore {
  private readonly _categories: ReadonlyArray<Category>;
  private readonly _topics: ReadonlyArray<Topic>;
  private readonly _categoriesById: ReadonlyMap<number, Category>;
  private readonly _topicsById: ReadonlyMap<number, Topic>;
  private readonly _categoryTree: ReadonlyMap<TreeKey, ReadonlyArray<number>>;
  private readonly _categoryTopics: ReadonlyMap<number, ReadonlyArray<number>>;
  private readonly _exportInfo: ExportInfo;
  private readonly _loadedAt: Date;

  private constructor(dataset: ArchiveDataset, loadedAt: Date) {
    this._categories = Object.freeze(dataset.categories.map((c) => Object.freeze({ ...c })));
    this._topics = Object.freeze(dataset.topics.map(freezeTopic));
    const { exportedAt } = dataset.exportInfo;
    this._exportInfo = Object.freeze({
      ...dataset.exportInfo,
      exportedAt: exportedAt === null ? null : freezeDate(exportedAt),
    });
    this._loadedAt = new Date(loadedAt.getTime());

    this._categoriesById = this.buildIdIndex(this._categories);
    this._topicsById = this.buildIdIndex(this._topics);
    this._categoryTree = this.buildCategoryTree(this._categories);
    this._categoryTopics = this.buildCategoryTopics(this._topics);
  }

  /**
   * Build a store from a dataset.
   *
   * @throws DuplicateIdError | DanglingReferenceError | CategoryCycleError
   *   if the dataset is inconsistent
   */
  static create(dataset: ArchiveDataset, options: CreateStoreOptions = {}): ArchiveStore {
    assertArchiveIntegrity(dataset);
    return new ArchiveStore(dataset, options.loadedAt ?? new Date());
  }

  /** A store holding nothing, e.g. for an empty export. */
  static empty(options: CreateStoreOptions = {}): ArchiveStore {
    return ArchiveStore.create(
      { exportInfo: EMPTY_EXPORT_INFO, categories: [], topics: [] },
      options
    );
  }

  // ============================================================
  // Index Builders (private)
  // ============================================================

  private buildIdIndex<T extends { readonly id: number }>(
    items: ReadonlyArray<T>
  ): ReadonlyMap<number, T> {
    const index = new Map<number, T>();
    for (const item of items) {
      index.set(item.id, item);
    }
    return index;
  }

  private buildCategoryTree(
    categories: ReadonlyArray<Category>
  ): ReadonlyMap<TreeKey, ReadonlyArray<number>> {
    const index = new Map<TreeKey, number[]>();
    for (const category of categories) {
      pushToIndex(index, category.parentId ?? ROOT_KEY, category.id);
    }
    return freezeIndex(index);
  }

  private buildCategoryTopics(
    topics: ReadonlyArray<Topic>
  ): ReadonlyMap<number, ReadonlyArray<number>> {
    const index = new Map<number, number[]>();
    for (const topic of topics) {
      pushToIndex(index, topic.categoryId, topic.id);
    }
    return freezeIndex(index);
  }

  private categoriesFor(ids: ReadonlyArray<number>): ReadonlyArray<Category> {
    const result: Category[] = [];
    for (const id of ids) {
      const category = this._categoriesById.get(id);
      if (category) result.push(category);
    }
    return Object.freeze(result);
  }

  // ============================================================
  // Categories
  // ============================================================

  /**
   * Get a category by id, or undefined if there is none.
   */
  getCategory(id: number): Category | undefined {
    return this._categoriesById.get(id);
  }

  /**
   * Get a category by id.
   *
   * @throws NotFoundError if the id is unknown
   */
  requireCategory(id: number): Category {
    const category = this._categoriesById.get(id);
    if (!category) {
      throw new NotFoundError("category", id);
    }
    return category;
  }

  /** Categories without a parent, in load order. */
  getRootCategories(): ReadonlyArray<Category> {
    return this.categoriesFor(this._categoryTree.get(ROOT_KEY) ?? []);
  }

  /**
   * Direct sub-categories, in load order.
   *
   * @throws NotFoundError if the category is unknown
   */
  getChildren(categoryId: number): ReadonlyArray<Category> {
    this.requireCategory(categoryId);
    return this.categoriesFor(this._categoryTree.get(categoryId) ?? []);
  }

  /**
   * Categories from the root down to (and including) the given one,
   * for breadcrumbs.
   *
   * @throws NotFoundError if the category is unknown
   */
  getCategoryPath(categoryId: number): ReadonlyArray<Category> {
    const path: Category[] = [];
    let current: Category | undefined = this.requireCategory(categoryId);
    // Acyclic: create() rejects parent cycles
    while (current !== undefined) {
      path.unshift(current);
      current = current.parentId === null ? undefined : this._categoriesById.get(current.parentId);
    }
    return Object.freeze(path);
  }

  /**
   * Nested view of the whole hierarchy, with topic counts.
   */
  getCategoryTree(): ReadonlyArray<CategoryTreeNode> {
    const build = (category: Category): CategoryTreeNode => {
      const children = this.getChildren(category.id).map(build);
      const topicCount = this._categoryTopics.get(category.id)?.length ?? 0;
      return Object.freeze({
        category,
        topicCount,
        totalTopicCount: children.reduce((sum, child) => sum + child.totalTopicCount, topicCount),
        children: Object.freeze(children),
      });
    };
    return Object.freeze(this.getRootCategories().map(build));
  }

  // ============================================================
  // Topics
  // ============================================================

  /**
   * Get a topic by id, or undefined if there is none.
   */
  getTopic(id: number): Topic | undefined {
    return this._topicsById.get(id);
  }

  /**
   * Get a topic by id.
   *
   * @throws NotFoundError if the id is unknown
   */
  requireTopic(id: number): Topic {
    const topic = this._topicsById.get(id);
    if (!topic) {
      throw new NotFoundError("topic", id);
    }
    return topic;
  }

  /**
   * Ids of the topics in a category.
   *
   * Non-recursive returns topics directly in the category. Recursive walks
   * the sub-tree depth-first, pre-order: a category's own topics, then each
   * child's sub-tree in load order.
   *
   * @throws NotFoundError if the category is unknown
   */
  getTopicsInCategory(categoryId: number, recursive = false): ReadonlyArray<number> {
    this.requireCategory(categoryId);
    if (!recursive) {
      return this._categoryTopics.get(categoryId) ?? Object.freeze([]);
    }

    const result: number[] = [];
    const stack: number[] = [categoryId];
    let current = stack.pop();
    while (current !== undefined) {
      result.push(...(this._categoryTopics.get(current) ?? []));
      const children = this._categoryTree.get(current) ?? [];
      stack.push(...[...children].reverse());
      current = stack.pop();
    }
    return Object.freeze(result);
  }

  /**
   * Number of topics in a category, optionally including descendants.
   *
   * @throws NotFoundError if the category is unknown
   */
  countTopics(categoryId: number, recursive = false): number {
    return this.getTopicsInCategory(categoryId, recursive).length;
  }

  /**
   * Every topic, in load order. Paging is the caller's job.
   */
  allTopics(): ReadonlyArray<Topic> {
    return this._topics;
  }

  /**
   * Newest topics by creation time, ties broken by ascending id.
   *
   * @throws ValidationError if limit is not a positive integer
   */
  getRecentTopics(limit = 10): ReadonlyArray<Topic> {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new ValidationError([
        { field: "limit", message: `limit must be a positive integer, got ${limit}`, allowed: ">= 1" },
      ]);
    }
    const sorted = [...this._topics].sort(
      (a, b) => b.created.getTime() - a.created.getTime() || a.id - b.id
    );
    return Object.freeze(sorted.slice(0, limit));
  }

  // ============================================================
  // Metadata
  // ============================================================

  getExportInfo(): ExportInfo {
    return this._exportInfo;
  }

  stats(): StoreStats {
    return {
      categories: this._categories.length,
      topics: this._topics.length,
      loadedAt: new Date(this._loadedAt.getTime()),
    };
  }
}
