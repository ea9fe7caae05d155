/**
 * Referential integrity checks over a complete dataset.
 *
 * Run by the loader after the walk and again by ArchiveStore.create, so a
 * store built from in-memory fixtures obeys the same invariants as one built
 * from disk.
 */

import type { ArchiveDataset, Category } from "./schema.js";
import {
  CategoryCycleError,
  DanglingReferenceError,
  DuplicateIdError,
} from "./errors.js";

/**
 * Throw DuplicateIdError for the first id seen twice within `items`.
 */
export function assertUniqueIds(
  kind: "category" | "topic",
  items: ReadonlyArray<{ readonly id: number; readonly sourcePath: string | null }>
): void {
  const seen = new Map<number, string | null>();
  for (const item of items) {
    if (seen.has(item.id)) {
      throw new DuplicateIdError(kind, item.id, seen.get(item.id) ?? null, item.sourcePath);
    }
    seen.set(item.id, item.sourcePath);
  }
}

/**
 * Find a parent cycle reachable from `start`, if any.
 * Returns the ids on the cycle in parent-walk order.
 */
function findCycleFrom(
  start: Category,
  byId: ReadonlyMap<number, Category>,
  cleared: Set<number>
): number[] | null {
  const chain: number[] = [];
  const onChain = new Set<number>();
  let current: Category | undefined = start;

  while (current !== undefined && !cleared.has(current.id)) {
    if (onChain.has(current.id)) {
      return chain.slice(chain.indexOf(current.id));
    }
    chain.push(current.id);
    onChain.add(current.id);
    current = current.parentId === null ? undefined : byId.get(current.parentId);
  }

  for (const id of chain) {
    cleared.add(id);
  }
  return null;
}

/**
 * Validate ids, references and the category forest.
 *
 * @throws DuplicateIdError if two categories or two topics share an id
 * @throws DanglingReferenceError if a parent or category reference does not resolve
 * @throws CategoryCycleError if the parent relation is not a forest
 */
export function assertArchiveIntegrity(dataset: ArchiveDataset): void {
  assertUniqueIds("category", dataset.categories);
  assertUniqueIds("topic", dataset.topics);

  const byId = new Map<number, Category>();
  for (const category of dataset.categories) {
    byId.set(category.id, category);
  }

  for (const category of dataset.categories) {
    if (category.parentId !== null && !byId.has(category.parentId)) {
      throw new DanglingReferenceError(
        "category",
        category.id,
        "parent_cid",
        category.parentId,
        category.sourcePath
      );
    }
  }

  for (const topic of dataset.topics) {
    if (!byId.has(topic.categoryId)) {
      throw new DanglingReferenceError(
        "topic",
        topic.id,
        "category_id",
        topic.categoryId,
        topic.sourcePath
      );
    }
  }

  const cleared = new Set<number>();
  for (const category of dataset.categories) {
    const cycle = findCycleFrom(category, byId, cleared);
    if (cycle !== null) {
      throw new CategoryCycleError(cycle, category.sourcePath);
    }
  }
}
