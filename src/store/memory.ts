import { DuplicateNameError, NotFoundError } from "../shared/errors.js";
import type { StreamConfig, StreamRecord, StreamStatus } from "../shared/types.js";
import { initialStatus, type PutOptions, type StreamStore } from "./types.js";

export class MemoryStreamStore implements StreamStore {
  private readonly records = new Map<string, StreamRecord>();

  put(config: StreamConfig, options: PutOptions = {}): StreamRecord {
    const existing = this.records.get(config.name);
    if (existing && !options.replace) {
      throw new DuplicateNameError(`Stream already exists: ${config.name}`);
    }

    const record: StreamRecord = {
      config: { ...config },
      status: { ...(options.status ?? existing?.status ?? initialStatus()) },
      createdAt: existing?.createdAt ?? new Date().toISOString()
    };
    this.records.set(config.name, record);
    return cloneRecord(record);
  }

  get(name: string): StreamRecord {
    const record = this.records.get(name);
    if (!record) {
      throw new NotFoundError(`Stream not found: ${name}`);
    }
    return cloneRecord(record);
  }

  has(name: string): boolean {
    return this.records.has(name);
  }

  list(): StreamRecord[] {
    return Array.from(this.records.values(), cloneRecord);
  }

  delete(name: string): void {
    if (!this.records.delete(name)) {
      throw new NotFoundError(`Stream not found: ${name}`);
    }
  }

  writeStatus(name: string, status: StreamStatus): boolean {
    const record = this.records.get(name);
    if (!record) {
      return false;
    }
    record.status = { ...status };
    return true;
  }
}

function cloneRecord(record: StreamRecord): StreamRecord {
  return {
    config: { ...record.config },
    status: { ...record.status },
    createdAt: record.createdAt
  };
}
