import fsp from "node:fs/promises";
import type { Request, Response, NextFunction } from "express";
import { AppError, notFoundError } from "../errors.js";
import type { CloudFilesAttachment, CloudFilesStorage } from "./cloud-files.js";
import type { AttachmentRecord } from "./interpolations.js";

type AsyncHandler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

function asyncHandler(fn: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res, next).catch(next);
  };
}

/** AttachmentIndex remembers the original filename stored for each record id. */
export class AttachmentIndex {
  private filenames = new Map<string, string>();

  get(id: string): string | null {
    return this.filenames.get(id) ?? null;
  }

  set(id: string, filename: string): void {
    this.filenames.set(id, filename);
  }

  delete(id: string): void {
    this.filenames.delete(id);
  }
}

export class AttachmentHandler {
  private storage: CloudFilesStorage<AttachmentRecord>;
  private index: AttachmentIndex;
  private maxSize: number;

  constructor(storage: CloudFilesStorage<AttachmentRecord>, index: AttachmentIndex, maxSize: number) {
    this.storage = storage;
    this.index = index;
    this.maxSize = maxSize;
  }

  upload = asyncHandler(async (req: Request, res: Response) => {
    const file = req.file;
    if (!file) {
      throw new AppError("INVALID_PAYLOAD", 400, "Missing file in form data");
    }

    const id = req.params.id;
    let attachment: CloudFilesAttachment<AttachmentRecord>;
    try {
      if (file.size > this.maxSize) {
        throw new AppError(
          "FILE_TOO_LARGE",
          413,
          `File too large: ${file.size} bytes (max ${this.maxSize})`,
        );
      }

      attachment = await this.storage.open({ id }, this.index.get(id));
      attachment.assign({ path: file.path, originalName: file.originalname });
      await attachment.save();
      this.index.set(id, file.originalname);
    } finally {
      // The upload is in the store (or rejected) either way
      await fsp.rm(file.path, { force: true });
    }

    res.status(201).json({
      data: {
        id,
        filename: file.originalname,
        size: file.size,
        container: attachment.containerName,
        path: attachment.path(),
        url: attachment.url(),
      },
    });
  });

  url = asyncHandler(async (req: Request, res: Response) => {
    const id = req.params.id;
    const filename = this.index.get(id);
    if (filename === null) throw notFoundError("Attachment", id);

    const style = typeof req.query.style === "string" ? req.query.style : this.storage.defaultStyle;
    if (!this.storage.styles.includes(style)) {
      throw new AppError("UNKNOWN_STYLE", 404, `Unknown style: ${style}`);
    }

    const attachment = await this.storage.open({ id }, filename);
    res.json({ data: { url: attachment.url(style) } });
  });

  serve = asyncHandler(async (req: Request, res: Response) => {
    const id = req.params.id;
    const filename = this.index.get(id);
    if (filename === null) throw notFoundError("Attachment", id);

    const style = req.params.style ?? this.storage.defaultStyle;
    if (!this.storage.styles.includes(style)) {
      throw new AppError("UNKNOWN_STYLE", 404, `Unknown style: ${style}`);
    }

    const attachment = await this.storage.open({ id }, filename);
    const buffer = await attachment.read(style);

    res.set("Content-Type", "application/octet-stream");
    res.set("Content-Disposition", `inline; filename="${filename}"`);
    res.send(buffer);
  });

  delete = asyncHandler(async (req: Request, res: Response) => {
    const id = req.params.id;
    const filename = this.index.get(id);
    if (filename === null) throw notFoundError("Attachment", id);

    const attachment = await this.storage.open({ id }, filename);
    await attachment.destroy();
    this.index.delete(id);

    res.json({ data: { deleted: true } });
  });
}
