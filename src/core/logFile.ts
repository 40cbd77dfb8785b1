import fs from "node:fs";
import path from "node:path";
import { ensureDirSync } from "../utils/fs.js";

export function logFilePath(logDir: string, name: string): string {
  return path.join(logDir, `${encodeURIComponent(name)}.log`);
}

/**
 * Size-capped log file. When an append would push it past `maxBytes`, the
 * oldest content is dropped and only the newest half of the cap is kept.
 */
export class CappedLogFile {
  private size: number;

  constructor(
    readonly filePath: string,
    private readonly maxBytes: number
  ) {
    ensureDirSync(path.dirname(filePath));
    this.size = fileSize(filePath);
    if (this.size > maxBytes) {
      this.compact(Buffer.alloc(0));
    }
  }

  append(chunk: Buffer): void {
    if (chunk.length === 0) {
      return;
    }
    if (this.size + chunk.length > this.maxBytes) {
      this.compact(chunk);
      return;
    }
    fs.appendFileSync(this.filePath, chunk);
    this.size += chunk.length;
  }

  get byteLength(): number {
    return this.size;
  }

  private compact(chunk: Buffer): void {
    const keep = Math.floor(this.maxBytes / 2);
    const combined = Buffer.concat([readTail(this.filePath, keep), chunk]);
    const kept = combined.length > keep ? combined.subarray(combined.length - keep) : combined;
    fs.writeFileSync(this.filePath, kept);
    this.size = kept.length;
  }
}

/** Last `maxBytes` bytes of a log file; empty when the file does not exist. */
export function readTail(filePath: string, maxBytes: number): Buffer {
  if (maxBytes <= 0 || !fs.existsSync(filePath)) {
    return Buffer.alloc(0);
  }

  const fd = fs.openSync(filePath, "r");
  try {
    const { size } = fs.fstatSync(fd);
    const length = Math.min(size, maxBytes);
    const buffer = Buffer.alloc(length);
    const read = fs.readSync(fd, buffer, 0, length, size - length);
    return buffer.subarray(0, read);
  } finally {
    fs.closeSync(fd);
  }
}

function fileSize(filePath: string): number {
  return fs.existsSync(filePath) ? fs.statSync(filePath).size : 0;
}
