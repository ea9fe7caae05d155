/**
 * Error taxonomy for the archive.
 *
 * Load-time errors extend {@link ArchiveLoadError} and are fatal to startup:
 * a store is never published after one of them. Query-time errors
 * ({@link NotFoundError}, {@link ValidationError}) are recoverable and meant
 * to be mapped to a response by the caller.
 */

export type EntityKind = "category" | "topic";

/**
 * A single problem found while parsing a file.
 */
export interface ArchiveIssue {
  /** Field path within the file, or "(file)" for whole-file problems */
  field: string;
  /** Human-readable error message */
  message: string;
}

/**
 * Base class for every error that aborts an archive load.
 */
export class ArchiveLoadError extends Error {
  constructor(
    message: string,
    /** File the error was found in, when there is one */
    public readonly filePath: string | null,
    public readonly issues: readonly ArchiveIssue[] = []
  ) {
    super(message);
    this.name = "ArchiveLoadError";
  }

  /**
   * Format the error for display.
   */
  format(): string {
    const lines = [`${this.name}: ${this.message}`];
    if (this.filePath !== null) {
      lines.push(`  File: ${this.filePath}`);
    }
    for (const issue of this.issues) {
      lines.push(`  - ${issue.field}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

export class ArchiveRootError extends ArchiveLoadError {
  constructor(rootDir: string, reason: string) {
    super(`Archive root ${rootDir} ${reason}`, rootDir);
    this.name = "ArchiveRootError";
  }
}

export class MalformedExportInfoError extends ArchiveLoadError {
  constructor(filePath: string, issues: readonly ArchiveIssue[]) {
    super(`Malformed export descriptor ${filePath}`, filePath, issues);
    this.name = "MalformedExportInfoError";
  }
}

export class MalformedCategoryError extends ArchiveLoadError {
  constructor(filePath: string, issues: readonly ArchiveIssue[]) {
    super(`Malformed category descriptor ${filePath}`, filePath, issues);
    this.name = "MalformedCategoryError";
  }
}

export class MalformedTopicError extends ArchiveLoadError {
  constructor(filePath: string, issues: readonly ArchiveIssue[]) {
    super(`Malformed topic file ${filePath}`, filePath, issues);
    this.name = "MalformedTopicError";
  }
}

export class DuplicateIdError extends ArchiveLoadError {
  constructor(
    public readonly kind: EntityKind,
    public readonly id: number,
    public readonly firstPath: string | null,
    duplicatePath: string | null
  ) {
    super(
      `Duplicate ${kind} id ${id} (first in ${firstPath ?? "<memory>"}, again in ${duplicatePath ?? "<memory>"})`,
      duplicatePath
    );
    this.name = "DuplicateIdError";
  }
}

export class DanglingReferenceError extends ArchiveLoadError {
  constructor(
    /** Kind of the entity holding the reference */
    public readonly referrerKind: EntityKind,
    public readonly referrerId: number,
    /** Source field of the reference (parent_cid or category_id) */
    public readonly field: "parent_cid" | "category_id",
    /** The category id that does not exist */
    public readonly missingId: number,
    filePath: string | null
  ) {
    super(
      `${referrerKind} ${referrerId} references unknown category ${missingId} via ${field}`,
      filePath
    );
    this.name = "DanglingReferenceError";
  }
}

export class CategoryCycleError extends ArchiveLoadError {
  constructor(
    /** Category ids on the cycle, in parent-walk order */
    public readonly cycle: readonly number[],
    filePath: string | null
  ) {
    super(`Category parent cycle: ${[...cycle, cycle[0]].join(" -> ")}`, filePath);
    this.name = "CategoryCycleError";
  }
}

/**
 * Lookup of an id the store does not hold.
 */
export class NotFoundError extends Error {
  constructor(
    public readonly kind: EntityKind,
    public readonly id: number
  ) {
    super(`Unknown ${kind} id ${id}`);
    this.name = "NotFoundError";
  }
}

/**
 * One rejected request parameter.
 */
export interface ValidationIssue {
  field: string;
  message: string;
  /** Accepted values or range, e.g. "1-100" */
  allowed: string;
}

/**
 * Request parameters outside their accepted range. Never clamped.
 */
export class ValidationError extends Error {
  constructor(public readonly issues: readonly ValidationIssue[]) {
    super(
      `Invalid request: ${issues.map((issue) => `${issue.field} (${issue.message})`).join(", ")}`
    );
    this.name = "ValidationError";
  }

  format(): string {
    const lines = ["Request validation failed:"];
    for (const issue of this.issues) {
      lines.push(`  - ${issue.field}: ${issue.message} [allowed: ${issue.allowed}]`);
    }
    return lines.join("\n");
  }
}

/**
 * Read before the first snapshot was published.
 */
export class ArchiveNotReadyError extends Error {
  constructor() {
    super("Archive is still loading; no snapshot has been published yet");
    this.name = "ArchiveNotReadyError";
  }
}
