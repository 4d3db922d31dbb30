import fsp from "node:fs/promises";
import { ObjectNotFoundError, RemoteServiceError } from "../errors.js";
import type {
  AuthOptions,
  ContainerHandle,
  ObjectHandle,
  RemoteStoreClient,
  StoreSession,
} from "./remote.js";

interface MemoryContainer {
  handle: ContainerHandle;
  objects: Map<string, Buffer>;
}

export interface MemoryStoreOptions {
  cdnUrl?: string;
  cdnSslUrl?: string;
}

/** In-process object store. Containers and objects live for as long as the MemoryStore does. */
export class MemoryStore {
  readonly containers = new Map<string, MemoryContainer>();
  readonly cdnUrl: string;
  readonly cdnSslUrl: string;

  constructor(options: MemoryStoreOptions = {}) {
    this.cdnUrl = (options.cdnUrl ?? "http://cdn.local").replace(/\/+$/, "");
    this.cdnSslUrl = (options.cdnSslUrl ?? "https://cdn.local").replace(/\/+$/, "");
  }

  objects(container: string): Map<string, Buffer> {
    return this.containers.get(container)?.objects ?? new Map();
  }
}

export class MemorySession implements StoreSession {
  constructor(private readonly store: MemoryStore) {}

  async createContainer(name: string): Promise<ContainerHandle> {
    const existing = this.store.containers.get(name);
    if (existing) return existing.handle;

    const handle: ContainerHandle = {
      name,
      cdn_url: `${this.store.cdnUrl}/${name}`,
      cdn_ssl_url: `${this.store.cdnSslUrl}/${name}`,
      public: false,
    };
    this.store.containers.set(name, { handle, objects: new Map() });
    return handle;
  }

  async makePublic(container: ContainerHandle): Promise<ContainerHandle> {
    const entry = this.lookup("makePublic", container);
    entry.handle = { ...entry.handle, public: true };
    return entry.handle;
  }

  async objectExists(container: ContainerHandle, path: string): Promise<boolean> {
    return this.lookup("objectExists", container).objects.has(path);
  }

  async readObject(container: ContainerHandle, path: string): Promise<Buffer> {
    const data = this.lookup("readObject", container).objects.get(path);
    if (!data) throw new ObjectNotFoundError("readObject", container.name, path);
    return Buffer.from(data);
  }

  async createObject(container: ContainerHandle, path: string): Promise<ObjectHandle> {
    this.lookup("createObject", container);
    return { container: container.name, path };
  }

  async loadFromFile(object: ObjectHandle, localPath: string): Promise<void> {
    const entry = this.store.containers.get(object.container);
    if (!entry) {
      throw new RemoteServiceError("loadFromFile", `Container ${object.container} does not exist`);
    }
    entry.objects.set(object.path, await fsp.readFile(localPath));
  }

  async deleteObject(container: ContainerHandle, path: string): Promise<void> {
    const objects = this.lookup("deleteObject", container).objects;
    if (!objects.delete(path)) {
      throw new ObjectNotFoundError("deleteObject", container.name, path);
    }
  }

  private lookup(operation: string, container: ContainerHandle): MemoryContainer {
    const entry = this.store.containers.get(container.name);
    if (!entry) {
      throw new RemoteServiceError(operation, `Container ${container.name} does not exist`);
    }
    return entry;
  }
}

/** MemoryStoreClient accepts any non-empty username and API key. */
export class MemoryStoreClient implements RemoteStoreClient {
  readonly store: MemoryStore;

  constructor(store: MemoryStore = new MemoryStore()) {
    this.store = store;
  }

  async authenticate(options: AuthOptions): Promise<StoreSession> {
    if (!options.username || !options.api_key) {
      throw new RemoteServiceError("authenticate", "Authentication failed: username and API key are required");
    }
    return new MemorySession(this.store);
  }
}
