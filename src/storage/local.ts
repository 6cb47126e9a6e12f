import { randomUUID } from "node:crypto";
import { once } from "node:events";
import fs from "node:fs";
import fsp from "node:fs/promises";
import path from "node:path";
import type { Readable } from "node:stream";
import { formatSize } from "./format.js";
import type { FileListing, FileStat, FileStorage } from "./storage.js";

const TEMP_PREFIX = ".upload-";

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

// realpath for paths whose tail may not exist yet: the existing prefix is
// resolved (symlinks included) and the missing segments are appended.
async function canonicalize(p: string): Promise<string> {
  try {
    return await fsp.realpath(p);
  } catch (err) {
    const parent = path.dirname(p);
    if (!isNotFound(err) || parent === p) {
      throw err;
    }
    return path.join(await canonicalize(parent), path.basename(p));
  }
}

/** Local filesystem storage rooted at a single flat directory. */
// compareCodePoints orders by Unicode code point rather than UTF-16 unit, so
// astral characters sort after the rest of the BMP.
export function compareCodePoints(a: string, b: string): number {
  const left = Array.from(a);
  const right = Array.from(b);
  const n = Math.min(left.length, right.length);
  for (let i = 0; i < n; i++) {
    const diff = (left[i]?.codePointAt(0) ?? 0) - (right[i]?.codePointAt(0) ?? 0);
    if (diff !== 0) return diff;
  }
  return left.length - right.length;
}

export class LocalStorage implements FileStorage {
  private constructor(readonly root: string) {}

  /** Creates the directory when absent and pins its canonical path. */
  static async open(dir: string): Promise<LocalStorage> {
    const absolute = path.resolve(dir);
    await fsp.mkdir(absolute, { recursive: true });
    return new LocalStorage(await fsp.realpath(absolute));
  }

  private resolve(name: string): string {
    return path.resolve(this.root, name);
  }

  async isSafe(name: string): Promise<boolean> {
    try {
      const target = await canonicalize(this.resolve(name));
      return path.dirname(target) === this.root;
    } catch {
      return false;
    }
  }

  async list(): Promise<FileListing> {
    const entries = await fsp.readdir(this.root, { withFileTypes: true });

    const names: string[] = [];
    for (const entry of entries) {
      if (entry.name.startsWith(".")) continue;
      if (entry.isFile()) {
        names.push(entry.name);
      } else if (entry.isSymbolicLink() && (await this.isRegularFile(entry.name))) {
        names.push(entry.name);
      }
    }
    names.sort(compareCodePoints);

    const sizes = await Promise.all(
      names.map(async (name): Promise<[string, string]> => {
        try {
          const st = await fsp.stat(this.resolve(name));
          return [name, formatSize(st.size)];
        } catch {
          return [name, ""];
        }
      }),
    );

    return { names, sizesByName: Object.fromEntries(sizes) };
  }

  private async isRegularFile(name: string): Promise<boolean> {
    try {
      return (await fsp.stat(this.resolve(name))).isFile();
    } catch {
      return false;
    }
  }

  async stat(name: string): Promise<FileStat | null> {
    if (!(await this.isSafe(name))) {
      return null;
    }
    try {
      const st = await fsp.stat(this.resolve(name));
      return st.isFile() ? { size: st.size } : null;
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }

  async openStream(name: string): Promise<Readable> {
    const stream = fs.createReadStream(this.resolve(name));
    await once(stream, "ready");
    return stream;
  }

  tempName(): string {
    return `${TEMP_PREFIX}${randomUUID()}`;
  }

  async save(name: string, tempPath: string): Promise<void> {
    if (!(await this.isSafe(name))) {
      throw new Error(`Refusing to store ${JSON.stringify(name)} outside ${this.root}`);
    }
    // rename replaces the target in one step, so readers never see a partial file.
    await fsp.rename(tempPath, this.resolve(name));
  }

  async discard(tempPath: string): Promise<void> {
    try {
      await fsp.unlink(tempPath);
    } catch (err) {
      if (!isNotFound(err)) throw err;
    }
  }

  async remove(name: string): Promise<boolean> {
    if (!(await this.stat(name))) {
      return false;
    }
    try {
      await fsp.unlink(this.resolve(name));
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
  }
}
