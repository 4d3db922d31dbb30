import { describe, it, before, after } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { loadConfig } from "./index.js";

describe("loadConfig", () => {
  let dir: string;

  before(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "config-test-"));
  });

  after(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("reads values from the first existing candidate", () => {
    const file = path.join(dir, "app.yaml");
    fs.writeFileSync(
      file,
      [
        "environment: staging",
        "server:",
        "  port: 9090",
        "storage:",
        "  driver: filesystem",
        "  local_path: /srv/containers",
        "  credentials: ./creds.yml",
        "  container: photos",
        "  ssl: true",
        "  styles: [thumb, medium]",
      ].join("\n"),
    );

    const cfg = loadConfig([path.join(dir, "missing.yaml"), file]);

    assert.equal(cfg.environment, "staging");
    assert.equal(cfg.server.port, 9090);
    assert.equal(cfg.server.max_file_size, 10485760);
    assert.equal(cfg.storage.driver, "filesystem");
    assert.equal(cfg.storage.local_path, "/srv/containers");
    assert.equal(cfg.storage.cdn_url, "/files");
    assert.equal(cfg.storage.credentials, "./creds.yml");
    assert.equal(cfg.storage.container, "photos");
    assert.equal(cfg.storage.ssl, true);
    assert.deepEqual(cfg.storage.styles, ["thumb", "medium"]);
  });

  it("keeps an inline credential mapping as-is", () => {
    const file = path.join(dir, "inline.yaml");
    fs.writeFileSync(
      file,
      ["storage:", "  credentials:", "    username: someone", "    api_key: test-key"].join("\n"),
    );

    const cfg = loadConfig([file]);

    assert.deepEqual(cfg.storage.credentials, { username: "someone", api_key: "test-key" });
    assert.equal(cfg.storage.driver, "memory");
    assert.equal(cfg.storage.cdn_url, "http://cdn.local");
    assert.equal(cfg.storage.cdn_ssl_url, "https://cdn.local");
  });

  it("falls back to defaults when no file exists", () => {
    const cfg = loadConfig([path.join(dir, "nope.yaml")]);

    assert.equal(cfg.server.port, 8080);
    assert.equal(cfg.storage.driver, "memory");
    assert.equal(cfg.storage.ssl, false);
    assert.deepEqual(cfg.storage.styles, []);
    assert.equal(cfg.storage.path, undefined);
  });
});
