/**
 * Tests for the archive inspection CLI.
 *
 * Run: node --import tsx src/cli/inspect-archive.test.ts
 *
 * Tests cover:
 *   1. Argument parsing
 *   2. Formatters for stats, the category tree and topic pages
 *   3. runInspect end to end against a temporary archive, including exit codes
 */

import { strict as assert } from "node:assert";
import { tmpdir } from "node:os";
import { join } from "node:path";

import {
  formatCategoryTree,
  formatTopicPage,
  parseInspectArgs,
  resolveCategoryArg,
  runInspect,
  type InspectOptions,
} from "./inspect-archive.js";
import { NotFoundError, ValidationError } from "../archive/errors.js";
import { paginateTopics } from "../archive/pagination.js";
import { ArchiveStore } from "../archive/store.js";
import {
  BASIC_ARCHIVE,
  makeCategory,
  makeDataset,
  makeTopic,
  withTempArchive,
} from "../testing/fixtures.js";
import { expectThrows, run, section, test } from "../testing/harness.js";

const BASE_OPTIONS: InspectOptions = {
  tree: false,
  recursive: false,
  json: false,
  verbose: false,
};

function options(overrides: Partial<InspectOptions>): InspectOptions {
  return { ...BASE_OPTIONS, ...overrides };
}

const store = ArchiveStore.create(
  makeDataset(
    [
      makeCategory({ id: 1, name: "Root" }),
      makeCategory({ id: 2, name: "Sub", parentId: 1 }),
    ],
    [
      makeTopic({ id: 10, categoryId: 2, title: "Hello World", created: new Date("2024-01-01T10:00:00Z"), viewCount: 5 }),
      makeTopic({ id: 11, categoryId: 2, title: "Hello Again", created: new Date("2024-01-02T10:00:00Z"), viewCount: 3 }),
    ]
  )
);

// ═══════════════════════════════════════════════════════════════════════════
// ARGUMENTS
// ═══════════════════════════════════════════════════════════════════════════

section("Arguments");

test("parses flags and values", () => {
  const parsed = parseInspectArgs([
    "--data",
    "/srv/export",
    "--category",
    "2",
    "--recursive",
    "--page-size",
    "5",
    "--json",
  ]);
  assert.deepEqual(parsed, {
    data: "/srv/export",
    images: undefined,
    tree: false,
    category: "2",
    recursive: true,
    search: undefined,
    sort: undefined,
    order: undefined,
    page: undefined,
    pageSize: "5",
    json: true,
    verbose: false,
  });
});

test("help returns null", () => {
  assert.equal(parseInspectArgs(["-h"]), null);
});

test("unknown flags are rejected", () => {
  assert.throws(() => parseInspectArgs(["--nope"]));
});

// ═══════════════════════════════════════════════════════════════════════════
// FORMATTERS
// ═══════════════════════════════════════════════════════════════════════════

section("Formatters");

test("category tree is indented with counts", () => {
  assert.deepEqual(formatCategoryTree(store.getCategoryTree()), [
    "Root [1] 0/2 topics",
    "  Sub [2] 2/2 topics",
  ]);
});

test("topic page header and lines", () => {
  const page = paginateTopics(store, [10, 11], { pageSize: 1 });
  assert.deepEqual(formatTopicPage(page), [
    "Page 1/2 (2 topics, created desc)",
    "  #11 Hello Again (2024-01-02, 3 views)",
  ]);
});

test("category argument accepts id paths", () => {
  assert.equal(resolveCategoryArg(store, "2-sub").name, "Sub");
  assert.equal(resolveCategoryArg(store, "2/sub").name, "Sub");
  expectThrows(() => resolveCategoryArg(store, "sub"), ValidationError);
  expectThrows(() => resolveCategoryArg(store, "9"), NotFoundError);
});

// ═══════════════════════════════════════════════════════════════════════════
// RUN
// ═══════════════════════════════════════════════════════════════════════════

section("runInspect");

test("lists a category recursively", async () => {
  await withTempArchive(BASIC_ARCHIVE, async ({ root }) => {
    const result = await runInspect(
      options({ data: root, category: "1", recursive: true, order: "asc" }),
      {}
    );
    assert.equal(result.exitCode, 0);
    assert.deepEqual(result.output.slice(0, 2), ["Categories: 2", "Topics:     2"]);
    assert.deepEqual(result.output.slice(-4), [
      "Category: Root (recursive)",
      "Page 1/1 (2 topics, created asc)",
      "  #10 Hello World (2024-01-01, 5 views)",
      "  #11 Hello Again (2024-01-02, 3 views)",
    ]);
  });
});

test("prints export totals", async () => {
  await withTempArchive(BASIC_ARCHIVE, async ({ root }) => {
    const result = await runInspect(options({ data: root, tree: true }), {});
    assert.ok(result.output.includes("Export:     2 topics, 5 posts, 3 users"));
    assert.ok(result.output.includes("  Sub [2] 2/2 topics"));
  });
});

test("search as JSON", async () => {
  await withTempArchive(BASIC_ARCHIVE, async ({ root }) => {
    const result = await runInspect(options({ data: root, search: "hello world", json: true }), {});
    assert.equal(result.exitCode, 0);
    assert.equal(result.output.length, 1);

    const parsed: unknown = JSON.parse(result.output[0] ?? "");
    assert.ok(typeof parsed === "object" && parsed !== null && "page" in parsed);
    assert.deepEqual(parsed.page, {
      total: 1,
      page: 1,
      pageSize: 20,
      totalPages: 1,
      sortBy: "created",
      order: "desc",
      items: [
        {
          id: 10,
          title: "Hello World",
          categoryId: 2,
          created: "2024-01-01T10:00:00.000Z",
          lastPost: null,
          viewCount: 5,
          rating: 0,
        },
      ],
    });
  });
});

test("search within a category", async () => {
  await withTempArchive(BASIC_ARCHIVE, async ({ root }) => {
    const result = await runInspect(
      options({ data: root, category: "2", search: "again" }),
      {}
    );
    assert.deepEqual(result.output.slice(-2), [
      "Page 1/1 (1 topics, created desc)",
      "  #11 Hello Again (2024-01-02, 3 views)",
    ]);
  });
});

test("bad page size exits 1 with the validation report", async () => {
  await withTempArchive(BASIC_ARCHIVE, async ({ root }) => {
    const result = await runInspect(options({ data: root, category: "1", pageSize: "0" }), {});
    assert.equal(result.exitCode, 1);
    assert.deepEqual(result.output, [
      "Request validation failed:\n  - pageSize: pageSize must be at least 1 [allowed: integer 1-100]",
    ]);
  });
});

test("unknown category exits 1", async () => {
  await withTempArchive(BASIC_ARCHIVE, async ({ root }) => {
    const result = await runInspect(options({ data: root, category: "9" }), {});
    assert.equal(result.exitCode, 1);
    assert.deepEqual(result.output, ["NotFoundError: Unknown category id 9"]);
  });
});

test("load failure exits 1 with the load report", async () => {
  const missing = join(tmpdir(), "forum-archive-test-missing-root");
  const result = await runInspect(options({ data: missing }), {});
  assert.equal(result.exitCode, 1);
  assert.equal(
    result.output[0],
    `ArchiveRootError: Archive root ${missing} does not exist\n  File: ${missing}`
  );
});

await run("Inspect CLI");
