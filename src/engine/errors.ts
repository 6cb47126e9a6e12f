export class AppError extends Error {
  code: string;
  status: number;

  constructor(code: string, status: number, message: string) {
    super(message);
    this.code = code;
    this.status = status;
  }
}

export function notFoundError(name: string): AppError {
  return new AppError("NOT_FOUND", 404, `File ${name} not found`);
}

export function payloadTooLargeError(limit: number): AppError {
  return new AppError("FILE_TOO_LARGE", 413, `File too large (max ${limit} bytes)`);
}
