/**
 * Keyword search over topic titles.
 *
 * An inverted index maps each normalized title token to the ids of the
 * topics whose title contains it. Queries are AND-only: a topic matches when
 * its title holds every query token, in any order. There is no ranking; the
 * caller sorts and pages the returned id set (see pagination.ts).
 */

import type { Topic } from "./schema.js";
import type { ArchiveStore } from "./store.js";

const SEPARATOR_PATTERN = /[^\p{L}\p{M}\p{N}\s]+/gu;

/**
 * Split text into search tokens: NFKC, lowercase, anything that is not a
 * letter, mark, digit or whitespace becomes a separator. No stop-words and no
 * minimum length.
 *
 * @example
 *   tokenize("Re: Hello, World!")  // ["re", "hello", "world"]
 */
export function tokenize(text: string): string[] {
  return text
    .normalize("NFKC")
    .toLowerCase()
    .replace(SEPARATOR_PATTERN, " ")
    .split(/\s+/)
    .filter((token) => token.length > 0);
}

export class TitleSearchIndex {
  private readonly _postings: ReadonlyMap<string, ReadonlySet<number>>;

  private constructor(postings: ReadonlyMap<string, ReadonlySet<number>>) {
    this._postings = postings;
  }

  /**
   * Index the titles of the given topics.
   */
  static build(topics: Iterable<Pick<Topic, "id" | "title">>): TitleSearchIndex {
    const postings = new Map<string, Set<number>>();
    for (const topic of topics) {
      for (const token of tokenize(topic.title)) {
        const ids = postings.get(token);
        if (ids) {
          ids.add(topic.id);
        } else {
          postings.set(token, new Set([topic.id]));
        }
      }
    }
    return new TitleSearchIndex(postings);
  }

  /**
   * Index every topic of a store.
   */
  static fromStore(store: ArchiveStore): TitleSearchIndex {
    return TitleSearchIndex.build(store.allTopics());
  }

  /** Number of distinct tokens indexed. */
  get size(): number {
    return this._postings.size;
  }

  /**
   * Ids of topics whose title contains every token of `query`.
   *
   * A blank query, or any token that appears in no title, yields an empty set.
   * The result is a fresh set; it does not alias the index.
   */
  search(query: string): ReadonlySet<number> {
    const tokens = [...new Set(tokenize(query))];
    if (tokens.length === 0) {
      return new Set<number>();
    }

    const lists: ReadonlySet<number>[] = [];
    for (const token of tokens) {
      const ids = this._postings.get(token);
      if (!ids) {
        return new Set<number>();
      }
      lists.push(ids);
    }

    // Intersect starting from the rarest token
    lists.sort((a, b) => a.size - b.size);
    const [smallest, ...rest] = lists;
    const result = new Set<number>();
    for (const id of smallest ?? []) {
      if (rest.every((ids) => ids.has(id))) {
        result.add(id);
      }
    }
    return result;
  }
}
