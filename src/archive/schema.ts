/**
 * Schemas and domain types for archive content.
 *
 * Raw descriptor and front-matter shapes are validated with zod at parse time
 * and mapped onto the camel-cased domain types the store serves. Unknown keys
 * in the raw files are ignored; exports carry bookkeeping fields
 * (`topiccount`, `is_subcategory`, ...) the store recomputes or does not need.
 */

import { z } from "zod";
import { parseTimestamp } from "./timestamps.js";

// ============================================================
// Shared field schemas
// ============================================================

/**
 * Positive integer id. Quoted numeric strings are accepted because some
 * exports quote ids.
 */
export const IdSchema = z
  .union([z.number(), z.string().regex(/^\d+$/, "Expected a numeric id").transform(Number)])
  .pipe(
    z
      .number()
      .int("Id must be an integer")
      .positive("Id must be positive")
      .safe("Id is too large")
  );

const CountSchema = z.number().int().nonnegative();

/** Title text; YAML reads a title such as `1984` as a number. */
const TextSchema = z
  .union([z.string(), z.number()])
  .transform(String)
  .pipe(z.string().trim().min(1, "Must not be empty"));

export const TimestampSchema = z
  .union([z.date(), z.string(), z.number()])
  .transform((value, ctx) => {
    const parsed = parseTimestamp(value);
    if (parsed === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Unrecognized timestamp: ${String(value)}`,
      });
      return z.NEVER;
    }
    return parsed;
  });

// ============================================================
// Category descriptor (_category.yml)
// ============================================================

export const CategoryDescriptorSchema = z.object({
  id: IdSchema,
  name: TextSchema,
  slug: z.string().trim().min(1, "Must not be empty"),
  /**
   * Parent category. `0` (quoted or not) and null both mean "no explicit
   * parent"; an absent key lets the loader inherit the enclosing directory's
   * category.
   */
  parent_cid: z
    .union([z.literal(0), z.literal("0"), z.null(), IdSchema])
    .transform((value) => (value === 0 || value === "0" ? null : value))
    .optional(),
  description: z.string().nullish(),
  icon: z.string().nullish(),
  bgColor: z.string().nullish(),
  color: z.string().nullish(),
  order: z.number().int().default(0),
  disabled: z.boolean().default(false),
  postcount: CountSchema.default(0),
});
export type CategoryDescriptor = z.infer<typeof CategoryDescriptorSchema>;

// ============================================================
// Topic front-matter
// ============================================================

export const TopicFrontMatterSchema = z.object({
  topic_id: IdSchema,
  title: TextSchema,
  /** 0 is used for guest and deleted accounts */
  author_id: z.union([z.literal(0), IdSchema]),
  category_id: IdSchema,
  created: TimestampSchema,
  last_post: TimestampSchema.nullish(),
  view_count: CountSchema.default(0),
  rating: z.number().int().default(0),
  post_count: CountSchema.default(0),
  tags: z.array(z.union([z.string(), z.number()]).transform(String)).nullish(),
  deleted: z.boolean().default(false),
  locked: z.boolean().default(false),
  pinned: z.boolean().default(false),
});
export type TopicFrontMatter = z.infer<typeof TopicFrontMatterSchema>;

// ============================================================
// Export descriptor (_export.yml)
// ============================================================

export const ExportDescriptorSchema = z.object({
  export_info: z
    .object({
      total_users: CountSchema.optional(),
      total_categories: CountSchema.optional(),
      total_topics: CountSchema.optional(),
      total_posts: CountSchema.optional(),
      exported_at: TimestampSchema.optional(),
    })
    .nullish(),
});

// ============================================================
// Domain types
// ============================================================

export interface Category {
  readonly id: number;
  readonly name: string;
  readonly slug: string;
  /** null for root categories */
  readonly parentId: number | null;
  readonly description: string | null;
  readonly icon: string | null;
  readonly bgColor: string | null;
  readonly color: string | null;
  readonly order: number;
  readonly disabled: boolean;
  /** Post count as recorded by the export */
  readonly postCount: number;
  /** Descriptor file the category came from; null for in-memory fixtures */
  readonly sourcePath: string | null;
}

export interface Topic {
  readonly id: number;
  readonly title: string;
  readonly slug: string;
  readonly authorId: number;
  readonly categoryId: number;
  readonly created: Date;
  readonly lastPost: Date | null;
  readonly viewCount: number;
  readonly rating: number;
  readonly postCount: number;
  readonly tags: readonly string[];
  readonly deleted: boolean;
  readonly locked: boolean;
  readonly pinned: boolean;
  /** Raw Markdown body */
  readonly body: string;
  /** Body rendered to HTML at load time */
  readonly bodyHtml: string;
  /** Topic file the topic came from; null for in-memory fixtures */
  readonly sourcePath: string | null;
}

export interface ExportInfo {
  readonly totalUsers: number | null;
  readonly totalCategories: number | null;
  readonly totalTopics: number | null;
  readonly totalPosts: number | null;
  readonly exportedAt: Date | null;
}

export const EMPTY_EXPORT_INFO: ExportInfo = Object.freeze({
  totalUsers: null,
  totalCategories: null,
  totalTopics: null,
  totalPosts: null,
  exportedAt: null,
});

/**
 * Everything one load produces, before indexing.
 * Arrays are in load order.
 */
export interface ArchiveDataset {
  readonly exportInfo: ExportInfo;
  readonly categories: readonly Category[];
  readonly topics: readonly Topic[];
}
