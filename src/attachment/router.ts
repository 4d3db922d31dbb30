import { Router, type Express } from "express";
import multer from "multer";
import type { AttachmentHandler } from "./handler.js";

export function registerAttachmentRoutes(app: Express, handler: AttachmentHandler, uploadDir: string): void {
  const upload = multer({ dest: uploadDir });
  const api = Router();

  api.post("/:id", upload.single("file"), handler.upload);
  api.get("/:id/url", handler.url);
  api.get("/:id/:style?", handler.serve);
  api.delete("/:id", handler.delete);

  app.use("/api/attachments", api);
}
