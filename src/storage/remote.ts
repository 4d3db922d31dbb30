import type { Credentials } from "../credentials/resolver.js";
import type { StorageConfig } from "../config/index.js";
import { DependencyUnavailableError, RemoteServiceError } from "../errors.js";
import { MemoryStore, MemoryStoreClient } from "./memory.js";
import { FilesystemStoreClient } from "./local.js";

export const DEFAULT_AUTH_URL = "https://auth.api.rackspacecloud.com/v1.0";

export interface ContainerHandle {
  readonly name: string;
  readonly cdn_url: string;
  readonly cdn_ssl_url: string;
  readonly public: boolean;
}

export interface ObjectHandle {
  readonly container: string;
  readonly path: string;
}

export interface AuthOptions {
  username: string;
  api_key: string;
  servicenet: boolean;
  auth_url: string;
}

/**
 * StoreSession is an authenticated connection to the object store.
 * Every method is a network round trip in a real client; failures reject with
 * RemoteServiceError, and a missing object with ObjectNotFoundError.
 */
export interface StoreSession {
  createContainer(name: string): Promise<ContainerHandle>;
  /** Enables CDN access for the container and returns the published handle. */
  makePublic(container: ContainerHandle): Promise<ContainerHandle>;
  objectExists(container: ContainerHandle, path: string): Promise<boolean>;
  readObject(container: ContainerHandle, path: string): Promise<Buffer>;
  createObject(container: ContainerHandle, path: string): Promise<ObjectHandle>;
  loadFromFile(object: ObjectHandle, localPath: string): Promise<void>;
  deleteObject(container: ContainerHandle, path: string): Promise<void>;
}

export interface RemoteStoreClient {
  authenticate(options: AuthOptions): Promise<StoreSession>;
}

/** StoreConnection authenticates once and shares the session among all callers. */
export class StoreConnection {
  private session: StoreSession | null = null;
  private connecting: Promise<StoreSession> | null = null;

  constructor(
    private readonly client: RemoteStoreClient,
    readonly credentials: Credentials,
  ) {}

  async open(): Promise<StoreSession> {
    if (this.session) return this.session;
    if (this.connecting) return this.connecting;

    this.connecting = this.authenticate();
    try {
      return await this.connecting;
    } finally {
      this.connecting = null;
    }
  }

  /** Runs fn against the session, reporting any failure as a RemoteServiceError for operation. */
  async call<T>(operation: string, fn: (session: StoreSession) => Promise<T>): Promise<T> {
    const session = await this.open();
    try {
      return await fn(session);
    } catch (err) {
      throw RemoteServiceError.wrap(operation, err);
    }
  }

  private async authenticate(): Promise<StoreSession> {
    const { username, api_key, servicenet, auth_url } = this.credentials;
    try {
      const session = await this.client.authenticate({
        username,
        api_key,
        servicenet,
        auth_url: auth_url ?? DEFAULT_AUTH_URL,
      });
      this.session = session;
      return session;
    } catch (err) {
      throw RemoteServiceError.wrap("authenticate", err);
    }
  }
}

export type StoreDriverFactory = (cfg: StorageConfig) => RemoteStoreClient;

const drivers = new Map<string, StoreDriverFactory>([
  ["memory", (cfg) => new MemoryStoreClient(new MemoryStore({ cdnUrl: cfg.cdn_url, cdnSslUrl: cfg.cdn_ssl_url }))],
  ["filesystem", (cfg) => new FilesystemStoreClient(cfg.local_path, cfg.cdn_url, cfg.cdn_ssl_url)],
]);

/** Makes a store client available under a driver name for newStoreClient. */
export function registerStoreDriver(name: string, factory: StoreDriverFactory): void {
  drivers.set(name, factory);
}

export function newStoreClient(cfg: StorageConfig): RemoteStoreClient {
  const factory = drivers.get(cfg.driver);
  if (!factory) {
    const known = [...drivers.keys()].sort().join(", ");
    throw new DependencyUnavailableError(
      `Storage driver "${cfg.driver}" is not available (registered: ${known}). ` +
        "Register a Cloud Files client with registerStoreDriver before activating the backend.",
    );
  }
  return factory(cfg);
}
