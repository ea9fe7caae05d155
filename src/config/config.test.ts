/**
 * Configuration Tests
 *
 * Run: node --import tsx src/config/config.test.ts
 */

import { strict as assert } from "node:assert";
import { join, resolve } from "node:path";

import {
  ConfigError,
  loadConfig,
  optionalEnv,
  optionalEnvList,
  validateConfig,
} from "./index.js";
import { expectThrows, run, section, test } from "../testing/harness.js";

section("Environment helpers");

test("optionalEnv treats empty as unset", () => {
  assert.equal(optionalEnv("KEY", "fallback", {}), "fallback");
  assert.equal(optionalEnv("KEY", "fallback", { KEY: "" }), "fallback");
  assert.equal(optionalEnv("KEY", "fallback", { KEY: "set" }), "set");
});

test("optionalEnvList trims and drops empty entries", () => {
  assert.deepEqual(optionalEnvList("L", ["a"], {}), ["a"]);
  assert.deepEqual(optionalEnvList("L", ["a"], { L: " .md, ,.markdown ," }), [".md", ".markdown"]);
});

section("loadConfig");

test("defaults", () => {
  const config = loadConfig({});
  assert.equal(config.env, "development");
  assert.equal(config.logLevel, "info");
  assert.equal(config.logFile, null);
  assert.equal(config.appName, "forum-archive");
  assert.equal(config.dataPath, resolve("./data"));
  assert.equal(config.imagesPath, join(resolve("./data"), "images"));
  assert.deepEqual(config.topicExtensions, [".md"]);
});

test("images path follows the data path", () => {
  const config = loadConfig({ ARCHIVE_DATA_PATH: "/srv/export" });
  assert.equal(config.dataPath, "/srv/export");
  assert.equal(config.imagesPath, "/srv/export/images");
});

test("explicit images path and extensions", () => {
  const config = loadConfig({
    ARCHIVE_DATA_PATH: "/srv/export",
    ARCHIVE_IMAGES_PATH: "/srv/assets",
    ARCHIVE_TOPIC_EXTENSIONS: "MD,markdown",
  });
  assert.equal(config.imagesPath, "/srv/assets");
  assert.deepEqual(config.topicExtensions, [".md", ".markdown"]);
});

test("config is frozen", () => {
  assert.ok(Object.isFrozen(loadConfig({})));
});

test("rejects an unknown NODE_ENV", () => {
  const err = expectThrows(() => loadConfig({ NODE_ENV: "staging" }), ConfigError);
  assert.equal(err.message, "Invalid NODE_ENV: staging. Must be development, production, or test.");
});

test("rejects an unknown LOG_LEVEL", () => {
  expectThrows(() => loadConfig({ LOG_LEVEL: "verbose" }), ConfigError);
});

test("rejects an empty or invalid extension list", () => {
  expectThrows(() => loadConfig({ ARCHIVE_TOPIC_EXTENSIONS: " , " }), ConfigError);
  const err = expectThrows(() => loadConfig({ ARCHIVE_TOPIC_EXTENSIONS: ".md,.tar.gz" }), ConfigError);
  assert.equal(err.message, 'Invalid topic extension ".tar.gz". Use letters and digits only, e.g. .md');
});

test("validateConfig checks a hand-built config", () => {
  const config = { ...loadConfig({}), topicExtensions: [] };
  expectThrows(() => validateConfig(config), ConfigError);
});

await run("Configuration");
