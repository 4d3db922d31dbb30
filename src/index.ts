import "dotenv/config";
import express from "express";
import morgan from "morgan";
import { loadConfig } from "./config/index.js";
import { credentialSourceFrom } from "./credentials/resolver.js";
import { newStoreClient } from "./storage/remote.js";
import { ContainerRegistry } from "./storage/container-registry.js";
import { CloudFilesStorage } from "./attachment/cloud-files.js";
import type { AttachmentRecord } from "./attachment/interpolations.js";
import { AttachmentHandler, AttachmentIndex } from "./attachment/handler.js";
import { registerAttachmentRoutes } from "./attachment/router.js";
import { errorHandler } from "./middleware/error-handler.js";

async function main() {
  // 1. Load config
  const cfg = loadConfig();
  console.log(
    `Config loaded (env: ${cfg.environment}, port: ${cfg.server.port}, storage driver: ${cfg.storage.driver})`,
  );

  // 2. Store client and the process-wide container registry
  const client = newStoreClient(cfg.storage);
  const registry = new ContainerRegistry(client);

  // 3. Activate the attachment backend (credentials resolved once here)
  const storage = await CloudFilesStorage.activate<AttachmentRecord>(
    "attachments",
    {
      cloudfiles_credentials: credentialSourceFrom(cfg.storage.credentials),
      container: cfg.storage.container,
      path: cfg.storage.path,
      ssl: cfg.storage.ssl,
      styles: cfg.storage.styles,
    },
    { registry, environment: cfg.environment },
  );
  console.log(`Cloud Files backend active (account: ${storage.credentials.username})`);

  // 4. Create Express app
  const app = express();
  app.use(
    morgan(":date[clf] :status :method :url :response-time ms", {
      stream: { write: (msg: string) => process.stdout.write(msg) },
    }),
  );

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  // Filesystem containers are served the way a CDN would serve them
  if (cfg.storage.driver === "filesystem" && cfg.storage.cdn_url.startsWith("/")) {
    app.use(cfg.storage.cdn_url, express.static(cfg.storage.local_path));
  }

  const handler = new AttachmentHandler(storage, new AttachmentIndex(), cfg.server.max_file_size);
  registerAttachmentRoutes(app, handler, cfg.server.upload_dir);

  // Error handler (must be last middleware)
  app.use(errorHandler);

  const port = cfg.server.port;
  app.listen(port, () => {
    console.log(`Starting server on :${port}`);
  });
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});
