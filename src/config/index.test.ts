import { describe, it, before, after } from "node:test";
import assert from "node:assert/strict";
import fsp from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { ConfigError, loadConfig, parseConfig } from "./index.js";

const DEFAULTS = {
  server: { host: "0.0.0.0", port: 8000, max_concurrent_uploads: 4, log_requests: true },
  storage: { shared_dir: "./shared", max_file_size: 0 },
  shutdown: { delay_ms: 1000, drain_timeout_ms: 5000 },
  browser: { open_delay_ms: 1000 },
};

describe("parseConfig", () => {
  it("fills every default for an empty document", () => {
    assert.deepEqual(parseConfig({}), DEFAULTS);
    assert.deepEqual(parseConfig(null), DEFAULTS);
    assert.deepEqual(parseConfig(undefined), DEFAULTS);
  });

  it("keeps defaults next to overridden keys", () => {
    const cfg = parseConfig({ server: { port: 9000 }, storage: { max_file_size: 1024 } });
    assert.equal(cfg.server.port, 9000);
    assert.equal(cfg.server.host, "0.0.0.0");
    assert.equal(cfg.storage.max_file_size, 1024);
    assert.equal(cfg.storage.shared_dir, "./shared");
  });

  it("ignores unknown keys", () => {
    const cfg = parseConfig({ colour: "blue", server: { port: 8001, banner: true } });
    assert.deepEqual(cfg.server, { ...DEFAULTS.server, port: 8001 });
  });

  it("names the offending key on invalid values", () => {
    assert.throws(() => parseConfig({ server: { port: "eighty" } }), (err: unknown) => {
      assert.ok(err instanceof ConfigError);
      assert.match(err.message, /server\.port/);
      return true;
    });
    assert.throws(() => parseConfig({ server: { port: 70000 } }), /server\.port/);
    assert.throws(() => parseConfig({ server: { max_concurrent_uploads: 0 } }), /server\.max_concurrent_uploads/);
    assert.throws(() => parseConfig({ shutdown: { delay_ms: -1 } }), /shutdown\.delay_ms/);
  });

  it("rejects a document that is not a mapping", () => {
    assert.throws(() => parseConfig("port: 80"), ConfigError);
  });
});

describe("loadConfig", () => {
  let dir: string;
  const cwd = process.cwd();

  before(async () => {
    dir = await fsp.mkdtemp(path.join(os.tmpdir(), "lanshare-config-"));
  });

  after(async () => {
    process.chdir(cwd);
    await fsp.rm(dir, { recursive: true, force: true });
  });

  it("reads an explicit YAML file", async () => {
    const file = path.join(dir, "custom.yaml");
    await fsp.writeFile(
      file,
      ["server:", "  port: 8123", "  log_requests: false", "storage:", "  shared_dir: /srv/drop", ""].join("\n"),
    );

    const cfg = loadConfig(file);
    assert.equal(cfg.server.port, 8123);
    assert.equal(cfg.server.log_requests, false);
    assert.equal(cfg.storage.shared_dir, "/srv/drop");
    assert.equal(cfg.shutdown.delay_ms, 1000);
  });

  it("treats an empty file as all defaults", async () => {
    const file = path.join(dir, "empty.yaml");
    await fsp.writeFile(file, "");
    assert.deepEqual(loadConfig(file), DEFAULTS);
  });

  it("fails when an explicit file is missing", () => {
    assert.throws(() => loadConfig(path.join(dir, "nope.yaml")), /Config file not found/);
  });

  it("fails on malformed YAML", async () => {
    const file = path.join(dir, "broken.yaml");
    await fsp.writeFile(file, "server: [unclosed\n");
    assert.throws(() => loadConfig(file), /Failed to read/);
  });

  it("picks up share.yaml from the working directory", async () => {
    const work = path.join(dir, "work");
    await fsp.mkdir(work);
    process.chdir(work);

    assert.deepEqual(loadConfig(), DEFAULTS);

    await fsp.writeFile(path.join(work, "share.yaml"), "browser:\n  open_delay_ms: 0\n");
    assert.equal(loadConfig().browser.open_delay_ms, 0);
  });
});
