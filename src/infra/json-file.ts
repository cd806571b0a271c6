import fs from "node:fs";
import path from "node:path";

/**
 * Read a JSON file. Returns undefined when the file does not exist; a file
 * that exists but does not parse is an error the caller must see.
 */
export function loadJsonFile(pathname: string): unknown {
  if (!fs.existsSync(pathname)) {
    return undefined;
  }
  const raw = fs.readFileSync(pathname, "utf8");
  try {
    return JSON.parse(raw) as unknown;
  } catch (err) {
    throw new Error(`Corrupt JSON in ${pathname}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

export function saveJsonFile(pathname: string, data: unknown) {
  const dir = path.dirname(pathname);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
  }
  // Atomic write: write and fsync a temp file, then rename (rename is atomic on POSIX)
  const tmp = `${pathname}.tmp.${process.pid}`;
  const fd = fs.openSync(tmp, "w", 0o600);
  try {
    fs.writeSync(fd, `${JSON.stringify(data, null, 2)}\n`, null, "utf8");
    fs.fsyncSync(fd);
  } finally {
    fs.closeSync(fd);
  }
  fs.renameSync(tmp, pathname);
}
