import { chmodSync, existsSync, readFileSync, writeFileSync } from "fs";

export function writeSecureFile(path: string, content: string): void {
  writeFileSync(path, content, { mode: 0o600 });
  chmodSync(path, 0o600);
}

/**
 * Parsed JSON content of `path`, or null when the file is missing or is not
 * JSON. Callers validate the shape.
 */
export function readJsonFile(path: string): unknown {
  if (!existsSync(path)) {
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
    return parsed;
  } catch {
    return null;
  }
}
