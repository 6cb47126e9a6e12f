import type { Request, Response, NextFunction, RequestHandler } from "express";

// Limiter is a FIFO counting semaphore.
export class Limiter {
  private active = 0;
  private waiting: Array<() => void> = [];

  constructor(readonly max: number) {
    if (!Number.isInteger(max) || max < 1) {
      throw new RangeError(`Limiter max must be a positive integer, got ${max}`);
    }
  }

  get running(): number {
    return this.active;
  }

  get queued(): number {
    return this.waiting.length;
  }

  acquire(): Promise<void> {
    if (this.active < this.max) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiting.push(resolve);
    });
  }

  release(): void {
    const next = this.waiting.shift();
    if (next) {
      // The slot passes straight to the next waiter.
      next();
      return;
    }
    if (this.active > 0) {
      this.active--;
    }
  }
}

// concurrencyLimit holds each request until the limiter admits it and frees the
// slot once the response is closed.
export function concurrencyLimit(limiter: Limiter): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    let released = false;
    const release = () => {
      if (released) return;
      released = true;
      limiter.release();
    };

    limiter
      .acquire()
      .then(() => {
        if (req.socket.destroyed) {
          release();
          return;
        }
        res.once("close", release);
        next();
      })
      .catch(next);
  };
}
