import type { Request, Response, NextFunction } from "express";
import multer from "multer";
import { AppError, payloadTooLargeError } from "../engine/errors.js";

function toAppError(err: Error, maxFileSize: number): AppError | null {
  if (err instanceof AppError) {
    return err;
  }
  if (err instanceof multer.MulterError) {
    if (err.code === "LIMIT_FILE_SIZE") {
      return payloadTooLargeError(maxFileSize);
    }
    return new AppError("INVALID_PAYLOAD", 400, err.message);
  }
  return null;
}

function send(res: Response, status: number, code: string, message: string): void {
  res.status(status);
  res.format({
    text: () => {
      res.send(message);
    },
    json: () => {
      res.json({ error: { code, message } });
    },
    default: () => {
      res.type("text/plain").send(message);
    },
  });
}

// errorHandler builds the terminal error middleware. maxFileSize only shapes
// the 413 message.
export function errorHandler(maxFileSize: number) {
  return (err: Error, _req: Request, res: Response, next: NextFunction): void => {
    const appErr = toAppError(err, maxFileSize);
    if (appErr) {
      send(res, appErr.status, appErr.code, appErr.message);
      return;
    }

    console.error("ERROR:", err);
    if (res.headersSent) {
      next(err);
      return;
    }
    send(res, 500, "INTERNAL_ERROR", "Internal server error");
  };
}
