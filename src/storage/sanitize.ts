/**
 * Reduces an uploaded filename to a flat, ASCII-only name that is safe to use
 * as a direct child of the storage root. The result may be empty.
 *
 *   secureFilename("My cool movie.mov")  // "My_cool_movie.mov"
 *   secureFilename("../../etc/passwd")   // "etc_passwd"
 */
export function secureFilename(filename: string): string {
  const ascii = filename.normalize("NFKD").replace(/[^\x00-\x7f]/g, "");
  const words = ascii.replace(/[/\\]/g, " ").split(/\s+/).filter((w) => w !== "");
  return words
    .join("_")
    .replace(/[^A-Za-z0-9_.-]/g, "")
    .replace(/^[._]+|[._]+$/g, "");
}

/**
 * Multipart parsers hand filenames over decoded as latin1. Browsers send UTF-8,
 * so re-decode when the bytes form valid UTF-8.
 */
export function decodeUploadName(name: string): string {
  if (/[^\x00-\xff]/.test(name)) {
    return name;
  }
  const utf8 = Buffer.from(name, "latin1").toString("utf8");
  return utf8.includes("\uFFFD") ? name : utf8;
}
