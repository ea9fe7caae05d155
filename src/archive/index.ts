/**
 * Forum archive module.
 *
 * Loads an exported forum archive into an immutable, indexed store with a
 * title search index, and pages topic lists for the web layer.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * ARCHITECTURE OVERVIEW
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * 1. LOADING: loadArchive() walks the archive directory. Category
 *    descriptors and topic front-matter are validated with zod; the first
 *    malformed file aborts the load. Ids must be unique, every reference must
 *    resolve and the category parents must form a forest.
 *
 * 2. INDEXING: ArchiveStore.create() freezes the dataset and builds the id
 *    maps, the parent -> children tree and the category -> topics lists.
 *    TitleSearchIndex.fromStore() builds the inverted title index.
 *
 * 3. PUBLISHING: createSnapshot()/openArchive() bundle store and index;
 *    ArchiveHolder publishes snapshots atomically and owns reloads.
 *
 * 4. QUERYING: collaborators read holder.current(), look entities up in the
 *    store, search titles, then sort and page ids with paginateTopics().
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * EXAMPLE USAGE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   import { loadConfig } from "./config/index.js";
 *   import { ArchiveHolder, openArchive, paginateTopics, parsePageRequest } from "./archive/index.js";
 *
 *   const config = loadConfig();
 *   const holder = new ArchiveHolder();
 *   await holder.init(() => openArchive(config));
 *
 *   // Per request:
 *   const { store } = holder.current();
 *   const ids = store.getTopicsInCategory(categoryId, true);
 *   const page = paginateTopics(store, ids, parsePageRequest(query));
 */

// Schema and types
export {
  IdSchema,
  TimestampSchema,
  CategoryDescriptorSchema,
  TopicFrontMatterSchema,
  ExportDescriptorSchema,
  EMPTY_EXPORT_INFO,
  type CategoryDescriptor,
  type TopicFrontMatter,
  type Category,
  type Topic,
  type ExportInfo,
  type ArchiveDataset,
} from "./schema.js";

// Errors
export {
  ArchiveLoadError,
  ArchiveRootError,
  MalformedExportInfoError,
  MalformedCategoryError,
  MalformedTopicError,
  DuplicateIdError,
  DanglingReferenceError,
  CategoryCycleError,
  NotFoundError,
  ValidationError,
  ArchiveNotReadyError,
  type ArchiveIssue,
  type EntityKind,
  type ValidationIssue,
} from "./errors.js";

// Loading
export {
  loadArchive,
  parseCategoryDescriptor,
  parseTopicFile,
  parseExportDescriptor,
  matchTopicFileName,
  EXPORT_DESCRIPTOR,
  CATEGORY_DESCRIPTOR,
  DEFAULT_TOPIC_EXTENSIONS,
  type LoadArchiveOptions,
  type ParseResult,
} from "./loader.js";
export { assertArchiveIntegrity } from "./integrity.js";
export { parseTimestamp } from "./timestamps.js";
export { renderMarkdown } from "./markdown.js";

// Store and search
export {
  ArchiveStore,
  resolveEntityId,
  type StoreStats,
  type CategoryTreeNode,
  type CreateStoreOptions,
} from "./store.js";
export { TitleSearchIndex, tokenize } from "./search.js";

// Paging
export {
  paginateTopics,
  validatePageRequest,
  parsePageRequest,
  compareTopics,
  PageRequestSchema,
  SORT_KEYS,
  SORT_ORDERS,
  MIN_PAGE_SIZE,
  MAX_PAGE_SIZE,
  DEFAULT_PAGE_SIZE,
  type SortKey,
  type SortOrder,
  type PageRequest,
  type PageRequestInput,
  type RawPageQuery,
  type TopicPage,
} from "./pagination.js";

// Publication
export {
  createSnapshot,
  openArchive,
  type ArchiveSnapshot,
  type CreateSnapshotOptions,
  type OpenArchiveOptions,
} from "./snapshot.js";
export { ArchiveHolder, type SnapshotLoader } from "./holder.js";
