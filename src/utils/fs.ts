import fs from "node:fs";
import path from "node:path";

export function ensureDirSync(dir: string): void {
  fs.mkdirSync(dir, { recursive: true });
}

export function readJsonFileSync<T>(filePath: string): T | null {
  try {
    const content = fs.readFileSync(filePath, "utf8");
    return JSON.parse(content) as T;
  } catch {
    return null;
  }
}

// Writes to a sibling temp file and renames it over the target, so readers see
// either the old or the new document.
export function writeJsonFileSync(filePath: string, data: unknown): void {
  const tempPath = path.join(path.dirname(filePath), `.${path.basename(filePath)}.${process.pid}.tmp`);
  fs.writeFileSync(tempPath, `${JSON.stringify(data, null, 2)}\n`, "utf8");
  fs.renameSync(tempPath, filePath);
}

export function removeFileIfExists(filePath: string): void {
  fs.rmSync(filePath, { force: true });
}
