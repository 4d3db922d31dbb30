import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { buildBaseUrl, buildObjectUrl, encodeObjectPath, resolveSsl } from "./url.js";
import type { ContainerHandle } from "./remote.js";

const container: ContainerHandle = {
  name: "photos",
  cdn_url: "http://cdn.example",
  cdn_ssl_url: "https://ssl.cdn.example/",
  public: true,
};

describe("buildBaseUrl", () => {
  it("selects the plain or SSL CDN URL", () => {
    assert.equal(buildBaseUrl(container, false), "http://cdn.example");
    assert.equal(buildBaseUrl(container, true), "https://ssl.cdn.example");
  });

  it("uses a cname verbatim for both", () => {
    assert.equal(buildBaseUrl(container, false, "http://cdn.myapp.test"), "http://cdn.myapp.test");
    assert.equal(buildBaseUrl(container, true, "http://cdn.myapp.test"), "http://cdn.myapp.test");
  });
});

describe("buildObjectUrl", () => {
  it("escapes ampersands in the object path", () => {
    assert.equal(buildObjectUrl("http://cdn.example", "a&b/c.jpg"), "http://cdn.example/a%26b/c.jpg");
  });

  it("keeps path separators and escapes spaces and hashes", () => {
    assert.equal(
      buildObjectUrl("http://cdn.example", "/avatars/1/my photo#2.png"),
      "http://cdn.example/avatars/1/my%20photo%232.png",
    );
  });

  it("escapes a literal percent sign", () => {
    assert.equal(encodeObjectPath("100%.txt"), "100%25.txt");
  });
});

describe("resolveSsl", () => {
  it("accepts a flag or a per-record predicate", () => {
    assert.equal(resolveSsl(true, {}), true);
    assert.equal(resolveSsl(undefined, {}), false);
    assert.equal(resolveSsl((r: { secure: boolean }) => r.secure, { secure: true }), true);
    assert.equal(resolveSsl((r: { secure: boolean }) => r.secure, { secure: false }), false);
  });
});
