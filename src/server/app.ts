import express from "express";
import morgan from "morgan";
import multer from "multer";
import type { Config } from "../config/index.js";
import { FileHandler } from "../engine/file-handler.js";
import { registerFileRoutes } from "../engine/router.js";
import { errorHandler } from "../middleware/error-handler.js";
import { Limiter, concurrencyLimit } from "../middleware/limiter.js";
import type { FileStorage } from "../storage/storage.js";

export interface AppOptions {
  config: Config;
  storage: FileStorage;
  publicUrl: () => Promise<string>;
  onShutdown: () => void;
  /** Shared upload limiter; one sized from server.max_concurrent_uploads by default. */
  uploadLimiter?: Limiter;
}

export function buildApp(opts: AppOptions): express.Express {
  const { config, storage } = opts;

  const app = express();
  app.disable("x-powered-by");

  if (config.server.log_requests) {
    app.use(
      morgan(":date[clf] :status :method :url :response-time ms", {
        stream: { write: (msg: string) => process.stdout.write(msg) },
      }),
    );
  }

  // Parts stream to hidden temp files inside the root and are renamed into
  // place by the handler.
  const maxFileSize = config.storage.max_file_size;
  const upload = multer({
    storage: multer.diskStorage({
      destination: storage.root,
      filename: (_req, _file, cb) => cb(null, storage.tempName()),
    }),
    limits: maxFileSize > 0 ? { fileSize: maxFileSize } : undefined,
  });

  const handler = new FileHandler({
    storage,
    publicUrl: opts.publicUrl,
    onShutdown: opts.onShutdown,
  });
  const limiter = opts.uploadLimiter ?? new Limiter(config.server.max_concurrent_uploads);
  const uploadLimit = concurrencyLimit(limiter);
  registerFileRoutes(app, handler, upload.array("file"), uploadLimit);

  // Error handler (must be last middleware)
  app.use(errorHandler(maxFileSize));

  return app;
}
