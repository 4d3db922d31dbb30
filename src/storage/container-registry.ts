import type { Credentials } from "../credentials/resolver.js";
import { DEFAULT_AUTH_URL, StoreConnection } from "./remote.js";
import type { ContainerHandle, RemoteStoreClient } from "./remote.js";

/**
 * ContainerRegistry owns the authenticated connections and the container
 * cache shared by every attachment backend it is handed to. Construct one per
 * process (or per test) and pass it by reference.
 */
export class ContainerRegistry {
  private connections = new Map<string, StoreConnection>();
  private containers = new Map<string, ContainerHandle>();
  private creating = new Map<string, Promise<ContainerHandle>>();
  private generation = 0;

  constructor(private readonly client: RemoteStoreClient) {}

  /** Returns the shared connection for the account the credentials name. */
  connect(credentials: Credentials): StoreConnection {
    const key = [
      credentials.username,
      credentials.auth_url ?? DEFAULT_AUTH_URL,
      credentials.servicenet ? "snet" : "public",
    ].join("|");

    let connection = this.connections.get(key);
    if (!connection) {
      connection = new StoreConnection(this.client, credentials);
      this.connections.set(key, connection);
    }
    return connection;
  }

  async getOrCreate(name: string, connection: StoreConnection): Promise<ContainerHandle> {
    const cached = this.containers.get(name);
    if (cached) return cached;

    // Guard against concurrent creation of the same container
    const inflight = this.creating.get(name);
    if (inflight) return inflight;

    const promise = this.create(name, connection);
    this.creating.set(name, promise);
    try {
      return await promise;
    } finally {
      if (this.creating.get(name) === promise) this.creating.delete(name);
    }
  }

  cached(name: string): ContainerHandle | undefined {
    return this.containers.get(name);
  }

  /** Forgets every cached container and connection; creations already running are not cached. */
  clear(): void {
    this.generation++;
    this.containers.clear();
    this.creating.clear();
    this.connections.clear();
  }

  private async create(name: string, connection: StoreConnection): Promise<ContainerHandle> {
    const generation = this.generation;
    const created = await connection.call("createContainer", (s) => s.createContainer(name));
    const container = await connection.call("makePublic", (s) => s.makePublic(created));
    if (generation === this.generation) this.containers.set(name, container);
    console.log(`Container ${name} ready (cdn: ${container.cdn_url})`);
    return container;
  }
}
