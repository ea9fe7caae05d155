/**
 * Archive Holder and Snapshot Tests
 *
 * Run: node --import tsx src/archive/holder.test.ts
 *
 * Tests cover:
 *   1. End-to-end: load from disk, publish, query
 *   2. A failed first load leaves the holder not ready
 *   3. Reloads: atomic swap, failure keeps the old snapshot, serialization
 */

import { strict as assert } from "node:assert";
import { join } from "node:path";

import { ArchiveNotReadyError, MalformedTopicError } from "./errors.js";
import { ArchiveHolder } from "./holder.js";
import { paginateTopics } from "./pagination.js";
import { createSnapshot, openArchive, type ArchiveSnapshot } from "./snapshot.js";
import {
  BASIC_ARCHIVE,
  captureLogger,
  makeCategory,
  makeDataset,
  makeTopic,
  topicMarkdown,
  withTempArchive,
} from "../testing/fixtures.js";
import { expectRejection, expectThrows, run, section, test } from "../testing/harness.js";

function archiveConfig(root: string) {
  return { dataPath: root, imagesPath: join(root, "images"), topicExtensions: [".md"] };
}

function snapshotOf(loadId: string, topicIds: number[]): ArchiveSnapshot {
  return createSnapshot(
    makeDataset(
      [makeCategory({ id: 1 })],
      topicIds.map((id) => makeTopic({ id, categoryId: 1 }))
    ),
    { loadId }
  );
}

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

// ═══════════════════════════════════════════════════════════════════════════
// END-TO-END
// ═══════════════════════════════════════════════════════════════════════════

section("End-to-end");

test("load, publish and query the basic archive", async () => {
  await withTempArchive(BASIC_ARCHIVE, async ({ root }) => {
    const holder = new ArchiveHolder();
    await holder.init(() => openArchive(archiveConfig(root)));

    const { store, search } = holder.current();
    assert.deepEqual(store.getTopicsInCategory(1, true), [10, 11]);
    assert.deepEqual([...search.search("hello")].sort((a, b) => a - b), [10, 11]);

    const page = paginateTopics(store, store.getTopicsInCategory(1, true), {
      sortBy: "created",
      order: "desc",
      page: 1,
      pageSize: 1,
    });
    assert.deepEqual(
      page.items.map((t) => t.id),
      [11]
    );
    assert.equal(page.total, 2);

    const searchPage = paginateTopics(store, search.search("hello"), {
      sortBy: "created",
      order: "desc",
      page: 1,
      pageSize: 1,
    });
    assert.deepEqual(
      searchPage.items.map((t) => t.id),
      [11]
    );
    assert.equal(searchPage.total, 2);
  });
});

test("snapshot records the load and a missing images directory", async () => {
  await withTempArchive(BASIC_ARCHIVE, async ({ root }) => {
    const { logger, lines } = captureLogger();
    const snapshot = await openArchive(archiveConfig(root), { logger });

    assert.match(snapshot.loadId, /^load-[0-9a-f]{8}$/);
    assert.equal(snapshot.imagesPath, null);
    assert.ok(lines.some((entry) => entry.line.includes("Images directory not found")));
    assert.ok(
      lines.some(
        (entry) => entry.line.includes("Archive loaded") && entry.line.includes(`"loadId":"${snapshot.loadId}"`)
      )
    );
  });
});

test("snapshot keeps an existing images directory", async () => {
  await withTempArchive({ ...BASIC_ARCHIVE, "images/logo.png": "png" }, async ({ root }) => {
    const snapshot = await openArchive(archiveConfig(root));
    assert.equal(snapshot.imagesPath, join(root, "images"));
  });
});

test("malformed topic fails the load and nothing is published", async () => {
  const files = {
    ...BASIC_ARCHIVE,
    "1-root/2-sub/11-hello-again.md": topicMarkdown({
      topic_id: 11,
      author_id: 2,
      category_id: 2,
      created: "2024-01-02T10:00:00Z",
    }),
  };
  await withTempArchive(files, async ({ root }) => {
    const holder = new ArchiveHolder();
    const err = await expectRejection(
      holder.init(() => openArchive(archiveConfig(root))),
      MalformedTopicError
    );
    assert.equal(err.filePath, join(root, "1-root/2-sub/11-hello-again.md"));
    assert.equal(holder.isReady, false);
    expectThrows(() => holder.current(), ArchiveNotReadyError);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// HOLDER LIFECYCLE
// ═══════════════════════════════════════════════════════════════════════════

section("Holder lifecycle");

test("current() before init throws ArchiveNotReadyError", () => {
  const holder = new ArchiveHolder();
  expectThrows(() => holder.current(), ArchiveNotReadyError);
  assert.equal(holder.tryCurrent(), undefined);
});

test("init twice is rejected", async () => {
  const holder = new ArchiveHolder();
  await holder.init(async () => snapshotOf("load-a", [1]));
  await assert.rejects(holder.init(async () => snapshotOf("load-b", [2])), {
    message: "ArchiveHolder is already initialized",
  });
  assert.equal(holder.current().loadId, "load-a");
});

test("reload swaps the whole snapshot", async () => {
  const holder = new ArchiveHolder();
  await holder.init(async () => snapshotOf("load-a", [1]));
  const before = holder.current();

  await holder.reload(async () => snapshotOf("load-b", [2, 3]));
  const after = holder.current();

  assert.equal(after.loadId, "load-b");
  assert.equal(after.store.stats().topics, 2);
  assert.deepEqual([...after.search.search("topic")].sort((a, b) => a - b), [2, 3]);
  // A reader holding the old snapshot still sees the old data
  assert.equal(before.store.stats().topics, 1);
  assert.equal(before.store.getTopic(2), undefined);
});

test("failed reload keeps the old snapshot and is logged", async () => {
  const { logger, lines } = captureLogger();
  const holder = new ArchiveHolder(logger);
  await holder.init(async () => snapshotOf("load-a", [1]));

  await assert.rejects(
    holder.reload(async () => {
      throw new Error("disk gone");
    }),
    { message: "disk gone" }
  );

  assert.equal(holder.current().loadId, "load-a");
  const errors = lines.filter((entry) => entry.level === "error");
  assert.equal(errors.length, 1);
  assert.ok(errors[0]?.line.includes("Reload failed; keeping current snapshot"));
});

test("concurrent reloads run one at a time, in order", async () => {
  const holder = new ArchiveHolder();
  await holder.init(async () => snapshotOf("load-a", [1]));

  const gate = deferred<void>();
  const started: string[] = [];

  const first = holder.reload(async () => {
    started.push("b");
    await gate.promise;
    return snapshotOf("load-b", [2]);
  });
  const second = holder.reload(async () => {
    started.push("c");
    return snapshotOf("load-c", [3]);
  });

  // Let the first loader start; the second must wait for it
  await new Promise((resolve) => setImmediate(resolve));
  assert.deepEqual(started, ["b"]);
  assert.equal(holder.current().loadId, "load-a");

  gate.resolve();
  await Promise.all([first, second]);
  assert.deepEqual(started, ["b", "c"]);
  assert.equal(holder.current().loadId, "load-c");
});

test("a failed reload does not block the next one", async () => {
  const holder = new ArchiveHolder();
  await holder.init(async () => snapshotOf("load-a", [1]));

  const failing = holder.reload(async () => {
    throw new Error("bad export");
  });
  const next = holder.reload(async () => snapshotOf("load-c", [3]));

  await assert.rejects(failing, { message: "bad export" });
  await next;
  assert.equal(holder.current().loadId, "load-c");
});

test("teardown releases the snapshot", async () => {
  const holder = new ArchiveHolder();
  await holder.init(async () => snapshotOf("load-a", [1]));
  holder.teardown();
  assert.equal(holder.isReady, false);
  expectThrows(() => holder.current(), ArchiveNotReadyError);
});

await run("Archive Holder");
