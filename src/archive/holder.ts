/**
 * Owner of the published archive snapshot.
 *
 * Collaborators receive an ArchiveHolder by injection and call current() once
 * per request, keeping that snapshot for the request's duration. A reload
 * builds the next snapshot completely before publishing it with a single
 * reference assignment, so a reader sees either the old snapshot or the new
 * one and never a partial store. A failed reload leaves the old snapshot in
 * place.
 *
 * @example
 *   const holder = new ArchiveHolder(logger);
 *   await holder.init(() => openArchive(config, { logger }));
 *
 *   const { store, search } = holder.current();
 *   const page = paginateTopics(store, search.search("hello"), { pageSize: 10 });
 */

import { silentLogger, type Logger } from "../logging/index.js";
import { ArchiveNotReadyError } from "./errors.js";
import type { ArchiveSnapshot } from "./snapshot.js";

export type SnapshotLoader = () => Promise<ArchiveSnapshot>;

export class ArchiveHolder {
  private _snapshot: ArchiveSnapshot | undefined;
  private _pending: Promise<ArchiveSnapshot> | undefined;
  private _reloads = 0;
  private readonly logger: Logger;

  constructor(logger: Logger = silentLogger) {
    this.logger = logger.child({ component: "holder" });
  }

  /** True once a snapshot has been published. */
  get isReady(): boolean {
    return this._snapshot !== undefined;
  }

  /**
   * The published snapshot.
   *
   * @throws ArchiveNotReadyError before the first publish
   */
  current(): ArchiveSnapshot {
    if (this._snapshot === undefined) {
      throw new ArchiveNotReadyError();
    }
    return this._snapshot;
  }

  /** The published snapshot, or undefined while not ready. */
  tryCurrent(): ArchiveSnapshot | undefined {
    return this._snapshot;
  }

  /**
   * Publish a fully built snapshot, replacing the current one.
   */
  publish(snapshot: ArchiveSnapshot): void {
    const previous = this._snapshot;
    this._snapshot = snapshot;
    this.logger.info("Snapshot published", {
      loadId: snapshot.loadId,
      replaced: previous?.loadId ?? null,
    });
  }

  /**
   * Load and publish the first snapshot.
   *
   * @throws Error if a snapshot is already published or loading; use reload() instead
   */
  async init(load: SnapshotLoader): Promise<ArchiveSnapshot> {
    if (this.isReady || this._pending !== undefined) {
      throw new Error("ArchiveHolder is already initialized");
    }
    return this.reload(load);
  }

  /**
   * Build a new snapshot and publish it. Reloads run one at a time; a reload
   * requested while another runs starts after it settles.
   *
   * @throws whatever `load` throws; the previous snapshot stays published
   */
  reload(load: SnapshotLoader): Promise<ArchiveSnapshot> {
    const ticket = ++this._reloads;
    const run = this.runReload(load, this._pending, ticket);
    this._pending = run;
    return run;
  }

  private async runReload(
    load: SnapshotLoader,
    previous: Promise<ArchiveSnapshot> | undefined,
    ticket: number
  ): Promise<ArchiveSnapshot> {
    // The earlier reload's failure was already reported to its own caller.
    // Always awaited, so the finally below runs after reload() stored `run`.
    await previous?.catch(() => undefined);
    try {
      const snapshot = await load();
      this.publish(snapshot);
      return snapshot;
    } catch (err) {
      this.logger.error("Reload failed; keeping current snapshot", {
        current: this._snapshot?.loadId ?? null,
        error: err,
      });
      throw err;
    } finally {
      if (this._reloads === ticket) this._pending = undefined;
    }
  }

  /**
   * Drop the published snapshot. The holder reports not-ready afterwards.
   */
  teardown(): void {
    if (this._snapshot !== undefined) {
      this.logger.info("Snapshot released", { loadId: this._snapshot.loadId });
    }
    this._snapshot = undefined;
  }
}
