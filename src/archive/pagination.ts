/**
 * Sorting and paging of topic id lists.
 *
 * Candidate ids come from the store (a category listing) or from the search
 * index. Ordering is total: equal sort values fall back to ascending id, so a
 * repeated request always returns the same page. Bad parameters are rejected
 * with a ValidationError, never clamped.
 */

import { z } from "zod";

import { ValidationError, type ValidationIssue } from "./errors.js";
import type { Topic } from "./schema.js";
import type { ArchiveStore } from "./store.js";

export const SORT_KEYS = ["created", "last_post", "view_count", "rating"] as const;
export type SortKey = (typeof SORT_KEYS)[number];

export const SORT_ORDERS = ["asc", "desc"] as const;
export type SortOrder = (typeof SORT_ORDERS)[number];

export const MIN_PAGE_SIZE = 1;
export const MAX_PAGE_SIZE = 100;
export const DEFAULT_PAGE_SIZE = 20;

type PageField = "sortBy" | "order" | "page" | "pageSize";

/** Accepted values per field, reported with every validation issue. */
const ALLOWED: Record<PageField, string> = {
  sortBy: SORT_KEYS.join(" | "),
  order: SORT_ORDERS.join(" | "),
  page: "integer >= 1",
  pageSize: `integer ${MIN_PAGE_SIZE}-${MAX_PAGE_SIZE}`,
};

export const PageRequestSchema = z.object({
  sortBy: z
    .enum(SORT_KEYS, { errorMap: () => ({ message: `sortBy must be one of ${ALLOWED.sortBy}` }) })
    .default("created"),
  order: z
    .enum(SORT_ORDERS, { errorMap: () => ({ message: `order must be one of ${ALLOWED.order}` }) })
    .default("desc"),
  page: z
    .number({ invalid_type_error: "page must be an integer" })
    .int("page must be an integer")
    .min(1, "page must be at least 1")
    .default(1),
  pageSize: z
    .number({ invalid_type_error: "pageSize must be an integer" })
    .int("pageSize must be an integer")
    .min(MIN_PAGE_SIZE, `pageSize must be at least ${MIN_PAGE_SIZE}`)
    .max(MAX_PAGE_SIZE, `pageSize must be at most ${MAX_PAGE_SIZE}`)
    .default(DEFAULT_PAGE_SIZE),
});

/** A validated request: every field present. */
export type PageRequest = z.output<typeof PageRequestSchema>;
/** What callers pass: every field optional. */
export type PageRequestInput = z.input<typeof PageRequestSchema>;

export interface TopicPage {
  readonly items: ReadonlyArray<Topic>;
  /** Number of candidates across all pages */
  readonly total: number;
  readonly page: number;
  readonly pageSize: number;
  /** At least 1, even when there are no candidates */
  readonly totalPages: number;
  readonly sortBy: SortKey;
  readonly order: SortOrder;
}

function isPageField(value: unknown): value is PageField {
  return typeof value === "string" && Object.hasOwn(ALLOWED, value);
}

function parseRequest(input: unknown): PageRequest {
  const result = PageRequestSchema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const issues: ValidationIssue[] = result.error.issues.map((issue) => {
    const field = issue.path[0];
    return {
      field: String(field ?? "(request)"),
      message: issue.message,
      allowed: isPageField(field) ? ALLOWED[field] : "",
    };
  });
  throw new ValidationError(issues);
}

/**
 * Validate paging parameters, applying defaults for absent fields.
 *
 * @throws ValidationError listing every offending field with its allowed range
 */
export function validatePageRequest(input: PageRequestInput = {}): PageRequest {
  return parseRequest(input);
}

/**
 * Raw query-string parameters as the web layer receives them.
 */
export interface RawPageQuery {
  page?: string;
  page_size?: string;
  sort_by?: string;
  order?: string;
}

function toInteger(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") {
    return undefined;
  }
  // NaN fails the schema's type check with the field's own message
  return /^-?\d+$/.test(value.trim()) ? Number(value) : Number.NaN;
}

function toOptionalString(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value.trim();
}

/**
 * Parse query-string parameters (`page`, `page_size`, `sort_by`, `order`)
 * through the same rules as {@link validatePageRequest}.
 *
 * @throws ValidationError on non-numeric or out-of-range values
 */
export function parsePageRequest(raw: RawPageQuery): PageRequest {
  return parseRequest({
    sortBy: toOptionalString(raw.sort_by),
    order: toOptionalString(raw.order),
    page: toInteger(raw.page),
    pageSize: toInteger(raw.page_size),
  });
}

function sortValue(topic: Topic, key: SortKey): number | null {
  switch (key) {
    case "created":
      return topic.created.getTime();
    case "last_post":
      return topic.lastPost?.getTime() ?? null;
    case "view_count":
      return topic.viewCount;
    case "rating":
      return topic.rating;
  }
}

/**
 * Comparator for a sort key and order. Topics without a value (no last
 * post) go after all others in both orders; ties fall back to ascending id.
 */
export function compareTopics(
  sortBy: SortKey,
  order: SortOrder
): (a: Topic, b: Topic) => number {
  const direction = order === "asc" ? 1 : -1;
  return (a, b) => {
    const va = sortValue(a, sortBy);
    const vb = sortValue(b, sortBy);
    if (va !== vb) {
      if (va === null) return 1;
      if (vb === null) return -1;
      return (va - vb) * direction;
    }
    return a.id - b.id;
  };
}

/**
 * Sort candidate topics and return one page.
 *
 * A page past the end is empty but still reports the real total.
 * Duplicate candidate ids are counted once.
 *
 * @throws ValidationError for out-of-range parameters
 * @throws NotFoundError if a candidate id is not in the store
 */
export function paginateTopics(
  store: ArchiveStore,
  ids: Iterable<number>,
  request: PageRequestInput = {}
): TopicPage {
  const { sortBy, order, page, pageSize } = validatePageRequest(request);

  const topics = [...new Set(ids)].map((id) => store.requireTopic(id));
  topics.sort(compareTopics(sortBy, order));

  const total = topics.length;
  const start = (page - 1) * pageSize;

  return Object.freeze({
    items: Object.freeze(topics.slice(start, start + pageSize)),
    total,
    page,
    pageSize,
    totalPages: Math.max(1, Math.ceil(total / pageSize)),
    sortBy,
    order,
  });
}
