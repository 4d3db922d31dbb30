import { describe, it, mock } from "node:test";
import assert from "node:assert/strict";
import type { StorageConfig } from "../config/index.js";
import { DependencyUnavailableError, RemoteServiceError } from "../errors.js";
import { MemorySession, MemoryStore, MemoryStoreClient } from "./memory.js";
import {
  DEFAULT_AUTH_URL,
  StoreConnection,
  newStoreClient,
  registerStoreDriver,
  type AuthOptions,
  type RemoteStoreClient,
} from "./remote.js";

const credentials = { username: "someone", api_key: "test-key", servicenet: false };

function storageConfig(driver: string): StorageConfig {
  return {
    driver,
    local_path: "./unused",
    cdn_url: "http://cdn.test",
    cdn_ssl_url: "https://cdn.test",
    credentials: undefined,
    ssl: false,
    styles: [],
  };
}

describe("StoreConnection", () => {
  it("authenticates once for concurrent callers", async () => {
    const session = new MemorySession(new MemoryStore());
    const seen: AuthOptions[] = [];
    const client: RemoteStoreClient = {
      authenticate: async (options) => {
        seen.push(options);
        return session;
      },
    };
    const connection = new StoreConnection(client, credentials);

    const [a, b] = await Promise.all([connection.open(), connection.open()]);
    const c = await connection.open();

    assert.equal(a, session);
    assert.equal(b, session);
    assert.equal(c, session);
    assert.deepEqual(seen, [{ ...credentials, auth_url: DEFAULT_AUTH_URL }]);
  });

  it("reports authentication failures as RemoteServiceError", async () => {
    const connection = new StoreConnection(new MemoryStoreClient(), { ...credentials, api_key: "" });

    await assert.rejects(
      connection.open(),
      (err: unknown) => err instanceof RemoteServiceError && err.operation === "authenticate",
    );
  });

  it("wraps plain errors with the failing operation", async () => {
    const session = new MemorySession(new MemoryStore());
    mock.method(session, "createContainer", async () => {
      throw new Error("quota exceeded");
    });
    const connection = new StoreConnection({ authenticate: async () => session }, credentials);

    await assert.rejects(
      connection.call("createContainer", (s) => s.createContainer("photos")),
      (err: unknown) =>
        err instanceof RemoteServiceError &&
        err.operation === "createContainer" &&
        err.message === "createContainer failed: quota exceeded" &&
        err.cause instanceof Error,
    );
  });
});

describe("newStoreClient", () => {
  it("builds the memory driver with the configured CDN URLs", async () => {
    const client = newStoreClient(storageConfig("memory"));
    assert.ok(client instanceof MemoryStoreClient);

    const session = await client.authenticate({ ...credentials, auth_url: DEFAULT_AUTH_URL });
    const container = await session.createContainer("photos");
    assert.equal(container.cdn_url, "http://cdn.test/photos");
    assert.equal(container.cdn_ssl_url, "https://cdn.test/photos");
    assert.equal(container.public, false);
  });

  it("fails fast for a driver that is not registered", () => {
    assert.throws(
      () => newStoreClient(storageConfig("cloudfiles")),
      (err: unknown) => err instanceof DependencyUnavailableError && /"cloudfiles" is not available/.test(err.message),
    );
  });

  it("uses drivers added with registerStoreDriver", () => {
    const client = new MemoryStoreClient();
    registerStoreDriver("custom-test-driver", () => client);
    assert.equal(newStoreClient(storageConfig("custom-test-driver")), client);
  });
});
