import fsp from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { resolveCredentials } from "../credentials/resolver.js";
import type { CredentialSource, Credentials } from "../credentials/resolver.js";
import { ConfigurationError } from "../errors.js";
import type { ContainerRegistry } from "../storage/container-registry.js";
import type { ContainerHandle, StoreConnection } from "../storage/remote.js";
import { buildBaseUrl, buildObjectUrl, resolveSsl } from "../storage/url.js";
import type { SslOption } from "../storage/url.js";
import { DEFAULT_PATH, Interpolations } from "./interpolations.js";
import type { AttachmentRecord, InterpolationTarget } from "./interpolations.js";
import { WriteDeleteQueue } from "./queue.js";
import type { LocalFile, QueueState } from "./queue.js";

export const PATH_TOKEN = "cf_path_filename";

export interface AttachmentInfo<R extends AttachmentRecord> {
  readonly name: string;
  readonly record: R;
}

export type ContainerOption<R extends AttachmentRecord> =
  | string
  | ((attachment: AttachmentInfo<R>) => string);

export interface CloudFilesOptions<R extends AttachmentRecord> {
  cloudfiles_credentials: CredentialSource;
  container?: ContainerOption<R>;
  container_name?: ContainerOption<R>;
  /** Object path template; defaults to DEFAULT_PATH. */
  path?: string;
  ssl?: SslOption<R>;
  /** Styles stored besides the default one. */
  styles?: string[];
  default_style?: string;
}

export interface ActivationDeps {
  registry: ContainerRegistry;
  environment: string;
  interpolations?: Interpolations;
}

/** A downloaded copy of a stored object. The caller must release it. */
export class TempFile implements LocalFile {
  constructor(
    readonly path: string,
    private readonly dir: string,
  ) {}

  static async create(objectPath: string, data: Buffer): Promise<TempFile> {
    const ext = path.extname(objectPath);
    const base = path.basename(objectPath, ext) || "object";
    const dir = await fsp.mkdtemp(path.join(os.tmpdir(), "cloudfiles-"));
    const file = path.join(dir, `${base}${ext}`);
    await fsp.writeFile(file, data);
    return new TempFile(file, dir);
  }

  async release(): Promise<void> {
    await fsp.rm(this.dir, { recursive: true, force: true });
  }
}

/**
 * CloudFilesStorage is one activated attachment definition: credentials,
 * path template and options are resolved once here and shared by every
 * attachment opened from it.
 */
export class CloudFilesStorage<R extends AttachmentRecord> {
  readonly styles: readonly string[];
  readonly defaultStyle: string;
  readonly pathTemplate: string;

  private constructor(
    readonly name: string,
    readonly credentials: Credentials,
    readonly connection: StoreConnection,
    readonly registry: ContainerRegistry,
    readonly interpolations: Interpolations,
    private readonly options: CloudFilesOptions<R>,
  ) {
    this.defaultStyle = options.default_style ?? "original";
    this.styles = [...new Set([this.defaultStyle, ...(options.styles ?? [])])];
    this.pathTemplate = options.path ?? DEFAULT_PATH;
  }

  static async activate<R extends AttachmentRecord>(
    name: string,
    options: CloudFilesOptions<R>,
    deps: ActivationDeps,
  ): Promise<CloudFilesStorage<R>> {
    if (options.path?.includes(`:${PATH_TOKEN}`)) {
      throw new ConfigurationError(`The path of ${name} cannot contain :${PATH_TOKEN}, which expands to the path itself`);
    }

    const credentials = await resolveCredentials(options.cloudfiles_credentials, deps.environment);
    const connection = deps.registry.connect(credentials);
    const interpolations = deps.interpolations ?? new Interpolations();
    interpolations.register(PATH_TOKEN, (attachment, style) => attachment.path(style));

    return new CloudFilesStorage(name, credentials, connection, deps.registry, interpolations, options);
  }

  /** Container name precedence: container, container_name, then the credentials. */
  containerName(record: R): string {
    const option = this.options.container ?? this.options.container_name ?? this.credentials.container_name;
    const name = typeof option === "function" ? option({ name: this.name, record }) : option;
    if (!name) {
      throw new ConfigurationError(`No container configured for attachment ${this.name}`);
    }
    return name;
  }

  useSsl(record: R): boolean {
    return resolveSsl(this.options.ssl, record);
  }

  /** Resolves the record's container (creating it on first use) and returns a ready attachment. */
  async open(record: R, originalFilename: string | null = null): Promise<CloudFilesAttachment<R>> {
    const containerName = this.containerName(record);
    const container = await this.registry.getOrCreate(containerName, this.connection);
    return new CloudFilesAttachment(this, record, container, originalFilename);
  }
}

export class CloudFilesAttachment<R extends AttachmentRecord> implements InterpolationTarget {
  readonly plainBaseUrl: string;
  readonly sslBaseUrl: string;
  private readonly queue: WriteDeleteQueue;
  private filename: string | null;

  constructor(
    private readonly storage: CloudFilesStorage<R>,
    readonly record: R,
    readonly container: ContainerHandle,
    originalFilename: string | null,
  ) {
    const cname = storage.credentials.cname;
    this.plainBaseUrl = buildBaseUrl(container, false, cname);
    this.sslBaseUrl = buildBaseUrl(container, true, cname);
    this.filename = originalFilename;
    this.queue = new WriteDeleteQueue({
      objectPath: (style) => this.path(style),
      upload: (objectPath, file) => this.upload(objectPath, file),
      remove: (objectPath) =>
        this.storage.connection.call("deleteObject", (s) => s.deleteObject(this.container, objectPath)),
    });
  }

  get name(): string {
    return this.storage.name;
  }

  get containerName(): string {
    return this.container.name;
  }

  get originalFilename(): string | null {
    return this.filename;
  }

  get state(): QueueState {
    return this.queue.state;
  }

  get pendingWrites(): ReadonlyMap<string, LocalFile> {
    return this.queue.pendingWrites();
  }

  get pendingDeletes(): readonly string[] {
    return this.queue.pendingDeletes();
  }

  path(style: string = this.storage.defaultStyle): string {
    return this.storage.interpolations.interpolate(this.storage.pathTemplate, this, style);
  }

  /** Public CDN URL; an ssl predicate is evaluated against the record on every call. */
  url(style: string = this.storage.defaultStyle): string {
    const base = this.storage.useSsl(this.record) ? this.sslBaseUrl : this.plainBaseUrl;
    return buildObjectUrl(base, this.path(style));
  }

  /** Asks the store; a write queued for the style is not consulted. */
  async exists(style: string = this.storage.defaultStyle): Promise<boolean> {
    const objectPath = this.path(style);
    return this.storage.connection.call("objectExists", (s) => s.objectExists(this.container, objectPath));
  }

  /** Reads the stored object; a write queued for the style is not consulted. */
  async read(style: string = this.storage.defaultStyle): Promise<Buffer> {
    const objectPath = this.path(style);
    return this.storage.connection.call("readObject", (s) => s.readObject(this.container, objectPath));
  }

  /**
   * Returns the queued file for the style when there is one. Otherwise the
   * object is downloaded into a TempFile owned by the caller.
   */
  async toFile(style: string = this.storage.defaultStyle): Promise<LocalFile | TempFile> {
    const queued = this.queue.pendingWrite(style);
    if (queued) return queued;

    const objectPath = this.path(style);
    return TempFile.create(objectPath, await this.read(style));
  }

  queueWrite(style: string, file: LocalFile): void {
    this.queue.queueWrite(style, file);
  }

  queueDelete(objectPath: string): void {
    this.queue.queueDelete(objectPath);
  }

  /** Queues file for every style and the previously stored objects for deletion. */
  assign(file: LocalFile): void {
    this.clear();
    this.filename = file.originalName ?? path.basename(file.path);
    for (const style of this.storage.styles) {
      this.queue.queueWrite(style, file);
    }
  }

  /** Drops queued writes and queues every stored style for deletion. */
  clear(): void {
    this.queue.clearWrites();
    if (this.filename === null) return;
    for (const style of this.storage.styles) {
      this.queue.queueDelete(this.path(style));
    }
    this.filename = null;
  }

  async flushWrites(): Promise<void> {
    await this.queue.flushWrites();
  }

  async flushDeletes(): Promise<void> {
    await this.queue.flushDeletes();
  }

  async save(): Promise<void> {
    await this.flushDeletes();
    await this.flushWrites();
  }

  async destroy(): Promise<void> {
    this.clear();
    await this.flushDeletes();
  }

  private async upload(objectPath: string, file: LocalFile): Promise<void> {
    const connection = this.storage.connection;
    const object = await connection.call("createObject", (s) => s.createObject(this.container, objectPath));
    await connection.call("loadFromFile", (s) => s.loadFromFile(object, file.path));
  }
}
