import path from "node:path";
import { pipeline } from "node:stream/promises";
import type { Request, Response, NextFunction } from "express";
import { qrDataUrl } from "../net/qr.js";
import { decodeUploadName, secureFilename } from "../storage/sanitize.js";
import type { FileStorage } from "../storage/storage.js";
import { notFoundError } from "./errors.js";
import { renderIndexPage } from "./page.js";

type AsyncHandler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

function asyncHandler(fn: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res, next).catch(next);
  };
}

export const FILES_PREFIX = "/files/";
export const DELETE_PREFIX = "/delete/";

const utf8 = new TextDecoder("utf-8");

// unquotePath decodes %XX escapes as UTF-8. Malformed sequences become U+FFFD
// instead of failing.
export function unquotePath(raw: string): string {
  return raw.replace(/(?:%[0-9A-Fa-f]{2})+/g, (run) => utf8.decode(Buffer.from(run.replace(/%/g, ""), "hex")));
}

function fileParam(req: Request, prefix: string): string {
  return req.path.startsWith(prefix) ? unquotePath(req.path.slice(prefix.length)) : "";
}

const DISCONNECT_CODES = new Set(["ERR_STREAM_PREMATURE_CLOSE", "ECONNRESET", "EPIPE"]);

// isClientDisconnect tells a peer that went away mid-response from a real
// stream failure.
export function isClientDisconnect(err: unknown): boolean {
  return (
    err instanceof Error && "code" in err && typeof err.code === "string" && DISCONNECT_CODES.has(err.code)
  );
}

function uploadedFiles(req: Request): Express.Multer.File[] {
  const files = req.files;
  if (!files) return [];
  return Array.isArray(files) ? files : Object.values(files).flat();
}

export interface FileHandlerOptions {
  storage: FileStorage;
  /** URL other devices should open; resolved per page view. */
  publicUrl: () => Promise<string>;
  /** Invoked by /shutdown. The lifecycle owner decides when to stop. */
  onShutdown: () => void;
}

export class FileHandler {
  private storage: FileStorage;
  private publicUrl: () => Promise<string>;
  private onShutdown: () => void;

  constructor(opts: FileHandlerOptions) {
    this.storage = opts.storage;
    this.publicUrl = opts.publicUrl;
    this.onShutdown = opts.onShutdown;
  }

  index = asyncHandler(async (_req: Request, res: Response) => {
    const url = await this.publicUrl();
    const [qr, listing] = await Promise.all([qrDataUrl(url), this.storage.list()]);

    res.type("html").send(
      renderIndexPage({
        url,
        qrDataUrl: qr,
        folderName: path.basename(this.storage.root),
        listing,
      }),
    );
  });

  listJson = asyncHandler(async (_req: Request, res: Response) => {
    const { names, sizesByName } = await this.storage.list();
    res.json({ names, sizes_by_name: sizesByName });
  });

  serve = asyncHandler(async (req: Request, res: Response) => {
    const name = fileParam(req, FILES_PREFIX);
    const st = await this.storage.stat(name);
    if (!st) {
      throw notFoundError(name);
    }

    const stream = await this.storage.openStream(name);
    res.type(path.extname(name) || "application/octet-stream");
    res.set("Content-Length", String(st.size));
    res.set("Content-Disposition", `inline; filename*=UTF-8''${encodeURIComponent(path.basename(name))}`);
    try {
      await pipeline(stream, res);
    } catch (err) {
      if (!isClientDisconnect(err)) throw err;
      console.log(`Download of ${name} cut short by the client`);
    }
  });

  upload = asyncHandler(async (req: Request, res: Response) => {
    const files = uploadedFiles(req);
    try {
      for (const file of files) {
        const original = decodeUploadName(file.originalname);
        if (original === "") continue;

        const name = secureFilename(original);
        if (name === "") {
          console.warn(`WARN: skipping upload with unusable name ${JSON.stringify(original)}`);
          continue;
        }
        await this.storage.save(name, file.path);
        console.log(`Stored ${name} (${file.size} bytes)`);
      }
    } finally {
      // Stored parts were renamed away; this only clears skipped or unreached ones.
      await Promise.all(files.map((file) => this.storage.discard(file.path)));
    }

    res.redirect("/");
  });

  remove = asyncHandler(async (req: Request, res: Response) => {
    const name = fileParam(req, DELETE_PREFIX);
    if (await this.storage.remove(name)) {
      console.log(`Deleted ${name}`);
    }
    res.redirect("/");
  });

  shutdown = (_req: Request, res: Response) => {
    res.type("text/plain").send("Shutting down...");
    this.onShutdown();
  };
}
