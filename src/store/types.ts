import type { StreamConfig, StreamRecord, StreamStatus } from "../shared/types.js";

export interface PutOptions {
  /** Replace an existing record with the same name instead of failing. */
  replace?: boolean;
  /** Status stored with the record; defaults to {@link initialStatus}. */
  status?: StreamStatus;
}

/**
 * Durable name → (config, status) mapping. Every mutating call has been
 * persisted by the time it returns.
 */
export interface StreamStore {
  put(config: StreamConfig, options?: PutOptions): StreamRecord;
  /** @throws NotFoundError */
  get(name: string): StreamRecord;
  has(name: string): boolean;
  /** Records in insertion order. */
  list(): StreamRecord[];
  /** @throws NotFoundError */
  delete(name: string): void;
  /** Returns false when the record is gone; the write is dropped. */
  writeStatus(name: string, status: StreamStatus): boolean;
}

export function initialStatus(reason = "starting"): StreamStatus {
  return {
    running: false,
    reason,
    lastCheckedAt: null,
    exitCode: null
  };
}
