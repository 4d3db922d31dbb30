import { ObjectNotFoundError } from "../errors.js";

/** A file on local disk, e.g. an upload that has not reached the store yet. */
export interface LocalFile {
  readonly path: string;
  readonly originalName?: string;
}

/** How a queue reaches the store: the owning attachment supplies paths and remote calls. */
export interface QueueTarget {
  objectPath(style: string): string;
  upload(objectPath: string, file: LocalFile): Promise<void>;
  remove(objectPath: string): Promise<void>;
}

export type QueueState = "clean" | "dirty";

/**
 * WriteDeleteQueue buffers uploads (one per style) and deletions until the
 * owner flushes them.
 *
 * Flushes are fail-fast: entries are sent one at a time and leave the queue
 * as they succeed. The first failure is rethrown and the failing entry, plus
 * everything not yet attempted, stays queued for the next flush.
 */
export class WriteDeleteQueue {
  private writes = new Map<string, LocalFile>();
  private deletes: string[] = [];

  constructor(private readonly target: QueueTarget) {}

  get state(): QueueState {
    return this.writes.size > 0 || this.deletes.length > 0 ? "dirty" : "clean";
  }

  /** Replaces any write already queued for style. */
  queueWrite(style: string, file: LocalFile): void {
    this.writes.set(style, file);
  }

  queueDelete(objectPath: string): void {
    this.deletes.push(objectPath);
  }

  /** Drops every queued write; queued deletions stay. */
  clearWrites(): void {
    this.writes.clear();
  }

  pendingWrite(style: string): LocalFile | undefined {
    return this.writes.get(style);
  }

  pendingWrites(): ReadonlyMap<string, LocalFile> {
    return new Map(this.writes);
  }

  pendingDeletes(): readonly string[] {
    return [...this.deletes];
  }

  async flushWrites(): Promise<void> {
    for (const [style, file] of [...this.writes]) {
      await this.target.upload(this.target.objectPath(style), file);
      // A write queued for the style while this one was uploading stays queued
      if (this.writes.get(style) === file) {
        this.writes.delete(style);
      }
    }
  }

  async flushDeletes(): Promise<void> {
    for (const objectPath of [...this.deletes]) {
      try {
        await this.target.remove(objectPath);
      } catch (err) {
        if (!(err instanceof ObjectNotFoundError)) throw err;
      }
      const idx = this.deletes.indexOf(objectPath);
      if (idx >= 0) this.deletes.splice(idx, 1);
    }
  }
}
