import fsp from "node:fs/promises";
import path from "node:path";
import { ObjectNotFoundError, RemoteServiceError, isErrnoException } from "../errors.js";
import type {
  AuthOptions,
  ContainerHandle,
  ObjectHandle,
  RemoteStoreClient,
  StoreSession,
} from "./remote.js";

const PUBLIC_MARKER = ".cdn-enabled";

/**
 * Filesystem store: each container is a directory under basePath and each
 * object a file inside it. CDN URLs are cdnUrl/<container>, which the server
 * mounts as static files.
 */
export class FilesystemSession implements StoreSession {
  private readonly basePath: string;

  constructor(
    basePath: string,
    private readonly cdnUrl: string,
    private readonly cdnSslUrl: string,
  ) {
    this.basePath = path.resolve(basePath);
  }

  async createContainer(name: string): Promise<ContainerHandle> {
    const dir = this.containerDir("createContainer", name);
    await fsp.mkdir(dir, { recursive: true });
    return this.handle(name, await exists(path.join(dir, PUBLIC_MARKER)));
  }

  async makePublic(container: ContainerHandle): Promise<ContainerHandle> {
    const dir = this.containerDir("makePublic", container.name);
    await fsp.writeFile(path.join(dir, PUBLIC_MARKER), "");
    return this.handle(container.name, true);
  }

  async objectExists(container: ContainerHandle, objectPath: string): Promise<boolean> {
    return exists(this.objectFile("objectExists", container.name, objectPath));
  }

  async readObject(container: ContainerHandle, objectPath: string): Promise<Buffer> {
    const file = this.objectFile("readObject", container.name, objectPath);
    try {
      return await fsp.readFile(file);
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") {
        throw new ObjectNotFoundError("readObject", container.name, objectPath);
      }
      throw err;
    }
  }

  async createObject(container: ContainerHandle, objectPath: string): Promise<ObjectHandle> {
    this.objectFile("createObject", container.name, objectPath);
    return { container: container.name, path: objectPath };
  }

  async loadFromFile(object: ObjectHandle, localPath: string): Promise<void> {
    const file = this.objectFile("loadFromFile", object.container, object.path);
    await fsp.mkdir(path.dirname(file), { recursive: true });
    await fsp.copyFile(localPath, file);
  }

  async deleteObject(container: ContainerHandle, objectPath: string): Promise<void> {
    const file = this.objectFile("deleteObject", container.name, objectPath);
    try {
      await fsp.unlink(file);
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") {
        throw new ObjectNotFoundError("deleteObject", container.name, objectPath);
      }
      throw err;
    }
  }

  private handle(name: string, isPublic: boolean): ContainerHandle {
    return {
      name,
      cdn_url: `${this.cdnUrl}/${name}`,
      cdn_ssl_url: `${this.cdnSslUrl}/${name}`,
      public: isPublic,
    };
  }

  private containerDir(operation: string, name: string): string {
    if (name === "" || name.includes("/") || name.includes("\\") || name === "." || name === "..") {
      throw new RemoteServiceError(operation, `Invalid container name: ${name}`);
    }
    return path.join(this.basePath, name);
  }

  /** Rejects object paths that would resolve outside their container directory. */
  private objectFile(operation: string, container: string, objectPath: string): string {
    const dir = this.containerDir(operation, container);
    const resolved = path.resolve(dir, objectPath.replace(/^\/+/, ""));
    if (!resolved.startsWith(dir + path.sep)) {
      throw new RemoteServiceError(operation, `Directory traversal detected in object path ${objectPath}`);
    }
    return resolved;
  }
}

async function exists(file: string): Promise<boolean> {
  try {
    await fsp.access(file);
    return true;
  } catch {
    return false;
  }
}

export class FilesystemStoreClient implements RemoteStoreClient {
  constructor(
    private readonly basePath: string,
    private readonly cdnUrl: string,
    private readonly cdnSslUrl: string = cdnUrl,
  ) {}

  async authenticate(options: AuthOptions): Promise<StoreSession> {
    if (!options.username || !options.api_key) {
      throw new RemoteServiceError("authenticate", "Authentication failed: username and API key are required");
    }
    return new FilesystemSession(
      this.basePath,
      this.cdnUrl.replace(/\/+$/, ""),
      this.cdnSslUrl.replace(/\/+$/, ""),
    );
  }
}
