import { describe, it, beforeEach, afterEach, mock } from "node:test";
import assert from "node:assert/strict";
import { RemoteServiceError } from "../errors.js";
import { ContainerRegistry } from "./container-registry.js";
import { MemorySession, MemoryStore } from "./memory.js";
import type { RemoteStoreClient } from "./remote.js";

const credentials = { username: "someone", api_key: "test-key", servicenet: false };

describe("ContainerRegistry", () => {
  let store: MemoryStore;
  let session: MemorySession;
  let registry: ContainerRegistry;

  beforeEach(() => {
    store = new MemoryStore();
    session = new MemorySession(store);
    const client: RemoteStoreClient = { authenticate: async () => session };
    registry = new ContainerRegistry(client);
    mock.method(console, "log", () => {});
  });

  afterEach(() => {
    mock.restoreAll();
  });

  it("creates and publishes a container once, then serves it from the cache", async () => {
    const create = mock.method(session, "createContainer");
    const publish = mock.method(session, "makePublic");
    const connection = registry.connect(credentials);

    const first = await registry.getOrCreate("photos", connection);
    const second = await registry.getOrCreate("photos", connection);

    assert.equal(first, second);
    assert.equal(first.public, true);
    assert.equal(first.cdn_url, "http://cdn.local/photos");
    assert.equal(create.mock.callCount(), 1);
    assert.equal(publish.mock.callCount(), 1);
    assert.equal(registry.cached("photos"), first);
  });

  it("creates a container only once under concurrent first use", async () => {
    const create = mock.method(session, "createContainer");
    const connection = registry.connect(credentials);

    const handles = await Promise.all(
      Array.from({ length: 5 }, () => registry.getOrCreate("shared", connection)),
    );

    assert.equal(create.mock.callCount(), 1);
    for (const handle of handles) assert.equal(handle, handles[0]);
  });

  it("does not serialize different container names", async () => {
    const create = mock.method(session, "createContainer");
    const connection = registry.connect(credentials);

    const [a, b] = await Promise.all([
      registry.getOrCreate("a", connection),
      registry.getOrCreate("b", connection),
    ]);

    assert.equal(a.name, "a");
    assert.equal(b.name, "b");
    assert.equal(create.mock.callCount(), 2);
  });

  it("surfaces a failed creation and retries on the next call", async () => {
    const connection = registry.connect(credentials);
    const create = mock.method(session, "createContainer", async () => {
      throw new Error("name taken");
    });

    await assert.rejects(
      registry.getOrCreate("taken", connection),
      (err: unknown) => err instanceof RemoteServiceError && err.operation === "createContainer",
    );
    assert.equal(registry.cached("taken"), undefined);

    create.mock.restore();
    const container = await registry.getOrCreate("taken", connection);
    assert.equal(container.name, "taken");
  });

  it("shares one connection per account", () => {
    const a = registry.connect(credentials);
    const b = registry.connect({ ...credentials });
    const other = registry.connect({ ...credentials, username: "someone-else" });

    assert.equal(a, b);
    assert.notEqual(a, other);
  });

  it("starts over after clear", async () => {
    const create = mock.method(session, "createContainer");
    await registry.getOrCreate("photos", registry.connect(credentials));

    registry.clear();
    await registry.getOrCreate("photos", registry.connect(credentials));

    assert.equal(create.mock.callCount(), 2);
  });

  it("does not cache a creation that finishes after clear", async () => {
    const pending = registry.getOrCreate("photos", registry.connect(credentials));
    registry.clear();
    await pending;

    assert.equal(registry.cached("photos"), undefined);

    const create = mock.method(session, "createContainer");
    await registry.getOrCreate("photos", registry.connect(credentials));
    assert.equal(create.mock.callCount(), 1);
  });
});
