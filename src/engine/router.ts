import type { Express, RequestHandler } from "express";
import { DELETE_PREFIX, FILES_PREFIX, type FileHandler } from "./file-handler.js";

const FILES_ROUTE = new RegExp(`^${FILES_PREFIX}`);
const DELETE_ROUTE = new RegExp(`^${DELETE_PREFIX}`);

export function registerFileRoutes(
  app: Express,
  handler: FileHandler,
  upload: RequestHandler,
  uploadLimit: RequestHandler,
): void {
  app.get("/", handler.index);
  app.get("/_files_json", handler.listJson);
  // File routes take the raw path tail and decode it themselves, so a bad
  // escape is a missing file and not a routing error.
  app.get(FILES_ROUTE, handler.serve);
  app.post("/upload", uploadLimit, upload, handler.upload);
  // Deleting on GET is what the page script and old links use. Link
  // prefetchers and crawlers can trigger it too; there is no guard against that.
  app.get(DELETE_ROUTE, handler.remove);
  app.post("/shutdown", handler.shutdown);
}
