import type { Readable } from "node:stream";

export interface FileListing {
  /** Visible file names in ascending order. */
  names: string[];
  /** Display size per name; "" when the file could not be stat'ed. */
  sizesByName: Record<string, string>;
}

export interface FileStat {
  size: number;
}

/** FileStorage abstracts the flat shared directory. */
export interface FileStorage {
  /** Canonical absolute path of the storage root. */
  readonly root: string;
  /** True when name resolves to a direct child of the root. Never rejects. */
  isSafe(name: string): Promise<boolean>;
  /** Live scan of visible regular files. */
  list(): Promise<FileListing>;
  /** Size of a safe regular file, null when it is absent, unsafe or not a file. */
  stat(name: string): Promise<FileStat | null>;
  /** Open a file that stat() has accepted; resolves once it is readable. */
  openStream(name: string): Promise<Readable>;
  /** Name for an in-progress upload inside the root; hidden from listings. */
  tempName(): string;
  /** Move a finished upload into place under name, replacing any existing file. */
  save(name: string, tempPath: string): Promise<void>;
  /** Remove an in-progress upload. */
  discard(tempPath: string): Promise<void>;
  /** Remove a safe regular file. Resolves false when there was nothing to remove. */
  remove(name: string): Promise<boolean>;
}
