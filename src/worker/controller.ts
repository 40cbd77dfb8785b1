import { spawn, type ChildProcess } from "node:child_process";
import type { Logger } from "../shared/logger.js";
import { AlreadyRunningError, NotFoundError, ShuttingDownError, WorkerStartFailedError } from "../shared/errors.js";
import type { ProbeResult, StopOutcome, StreamConfig, WorkerHandleInfo } from "../shared/types.js";
import { RingLogBuffer } from "../core/logBuffer.js";
import { CappedLogFile, logFilePath, readTail } from "../core/logFile.js";
import { describeRunning, isErrorLine, summarizeFailure } from "../core/health.js";
import type { WorkerCommandBuilder } from "./ffmpeg.js";

const KILL_WAIT_MS = 2000;
const FAILURE_CONTEXT_LINES = 3;
const MAX_PARTIAL_LINE = 4096;

/**
 * Owns at most one external worker process per stream name.
 */
export interface ProcessController {
  /** @throws AlreadyRunningError, WorkerStartFailedError */
  start(name: string, config: StreamConfig): Promise<WorkerHandleInfo>;
  /** @throws NotFoundError when the name has no handle and was never stopped */
  stop(name: string): Promise<StopOutcome>;
  probe(name: string): ProbeResult;
  /** Live output of the worker, or the persisted log once it has been released. */
  tailLog(name: string, maxBytes: number): Buffer;
  clearError(name: string): void;
  has(name: string): boolean;
  names(): string[];
  /** Stops every worker; `start` is refused from then on. */
  stopAll(deadlineMs: number): Promise<void>;
}

export interface ChildProcessControllerOptions {
  buildCommand: WorkerCommandBuilder;
  logger: Logger;
  stopGraceMs: number;
  logBufferBytes: number;
  staleOutputMs: number;
  /** Directory for per-stream log files; omitted or a zero cap keeps logs in memory only. */
  logDir?: string;
  logFileBytes?: number;
}

interface WorkerHandle {
  name: string;
  child: ChildProcess;
  pid: number;
  startedAt: string;
  log: RingLogBuffer;
  logFile: CappedLogFile | null;
  exited: boolean;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  exitPromise: Promise<void>;
  lastErrorLine: string | null;
  lastOutputAt: number | null;
  partialLine: string;
  stopping?: Promise<StopOutcome>;
}

export class ChildProcessController implements ProcessController {
  private readonly handles = new Map<string, WorkerHandle>();
  private readonly released = new Set<string>();
  private closed = false;

  constructor(private readonly options: ChildProcessControllerOptions) {}

  async start(name: string, config: StreamConfig): Promise<WorkerHandleInfo> {
    if (this.closed) {
      throw new ShuttingDownError(`Not starting worker for stream ${name}: shutting down`);
    }
    if (this.handles.has(name)) {
      throw new AlreadyRunningError(`Worker already running for stream: ${name}`);
    }

    const { command, args } = this.options.buildCommand(config);
    let child: ChildProcess;
    try {
      child = spawn(command, args, {
        stdio: ["ignore", "pipe", "pipe"],
        windowsHide: true
      });
    } catch (error) {
      throw new WorkerStartFailedError(`Failed to start worker for stream ${name}: ${errorMessage(error)}`);
    }

    const pid = child.pid;
    if (pid === undefined) {
      const spawnError = await new Promise<Error>((resolve) => {
        child.once("error", resolve);
      });
      this.options.logger.error({ err: spawnError, stream: name, command }, "worker spawn failed");
      throw new WorkerStartFailedError(`Failed to start worker for stream ${name}: ${spawnError.message}`);
    }

    const handle = this.register(name, child, pid);
    this.options.logger.info({ stream: name, pid, command, args }, "worker started");
    return { name, pid, startedAt: handle.startedAt };
  }

  async stop(name: string): Promise<StopOutcome> {
    const handle = this.handles.get(name);
    if (!handle) {
      if (this.released.has(name)) {
        return { forced: false, alreadyStopped: true };
      }
      throw new NotFoundError(`No worker for stream: ${name}`);
    }

    if (!handle.stopping) {
      handle.stopping = this.terminate(handle).finally(() => {
        this.release(handle);
      });
    }
    return handle.stopping;
  }

  probe(name: string): ProbeResult {
    const handle = this.handles.get(name);
    if (!handle) {
      return { alive: false, exitCode: null, signal: null, reason: "worker not running" };
    }

    if (handle.exited) {
      return {
        alive: false,
        exitCode: handle.exitCode,
        signal: handle.signal,
        reason: summarizeFailure({
          code: handle.exitCode,
          signal: handle.signal,
          lastLines: handle.log.lastLines(FAILURE_CONTEXT_LINES)
        })
      };
    }

    return {
      alive: true,
      exitCode: null,
      signal: null,
      reason: describeRunning({
        lastErrorLine: handle.lastErrorLine,
        lastOutputAt: handle.lastOutputAt,
        staleOutputMs: this.options.staleOutputMs,
        now: Date.now()
      })
    };
  }

  tailLog(name: string, maxBytes: number): Buffer {
    const handle = this.handles.get(name);
    if (handle) {
      return handle.log.tail(maxBytes);
    }
    const filePath = this.logFilePathFor(name);
    return filePath ? readTail(filePath, maxBytes) : Buffer.alloc(0);
  }

  clearError(name: string): void {
    const handle = this.handles.get(name);
    if (handle) {
      handle.lastErrorLine = null;
    }
  }

  has(name: string): boolean {
    return this.handles.has(name);
  }

  names(): string[] {
    return Array.from(this.handles.keys());
  }

  async stopAll(deadlineMs: number): Promise<void> {
    this.closed = true;
    const handles = Array.from(this.handles.values());
    if (handles.length === 0) {
      return;
    }

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<"deadline">((resolve) => {
      timer = setTimeout(() => resolve("deadline"), deadlineMs);
    });
    const stopped = Promise.allSettled(handles.map((handle) => this.stop(handle.name))).then(() => "done" as const);

    const outcome = await Promise.race([stopped, deadline]);
    clearTimeout(timer);
    if (outcome === "done") {
      return;
    }

    for (const handle of handles) {
      if (!handle.exited) {
        this.options.logger.warn({ stream: handle.name, pid: handle.pid }, "shutdown deadline reached; killing worker");
        this.signal(handle, "SIGKILL");
      }
      this.release(handle);
    }
  }

  private register(name: string, child: ChildProcess, pid: number): WorkerHandle {
    let markExited: () => void = () => undefined;
    const exitPromise = new Promise<void>((resolve) => {
      markExited = resolve;
    });

    const handle: WorkerHandle = {
      name,
      child,
      pid,
      startedAt: new Date().toISOString(),
      log: new RingLogBuffer(this.options.logBufferBytes),
      logFile: this.openLogFile(name),
      exited: false,
      exitCode: null,
      signal: null,
      exitPromise,
      lastErrorLine: null,
      lastOutputAt: null,
      partialLine: ""
    };

    const capture = (chunk: Buffer) => {
      handle.log.append(chunk);
      this.appendToFile(handle, chunk);
      handle.lastOutputAt = Date.now();
      this.scanForErrors(handle, chunk.toString("utf8"));
    };
    child.stdout?.on("data", capture);
    child.stderr?.on("data", capture);

    child.once("exit", (code, signal) => {
      handle.exited = true;
      handle.exitCode = code;
      handle.signal = signal;
      markExited();
      this.options.logger.info({ stream: name, pid, code, signal }, "worker exited");
    });

    child.on("error", (error) => {
      handle.lastErrorLine = error.message;
      this.options.logger.error({ err: error, stream: name, pid }, "worker process errored");
    });

    this.released.delete(name);
    this.handles.set(name, handle);
    return handle;
  }

  private logFilePathFor(name: string): string | null {
    const { logDir, logFileBytes } = this.options;
    return logDir && logFileBytes ? logFilePath(logDir, name) : null;
  }

  private openLogFile(name: string): CappedLogFile | null {
    const filePath = this.logFilePathFor(name);
    if (!filePath || !this.options.logFileBytes) {
      return null;
    }
    try {
      return new CappedLogFile(filePath, this.options.logFileBytes);
    } catch (error) {
      this.options.logger.warn({ err: error, stream: name, filePath }, "worker log file unavailable; keeping output in memory");
      return null;
    }
  }

  private appendToFile(handle: WorkerHandle, chunk: Buffer): void {
    if (!handle.logFile) {
      return;
    }
    try {
      handle.logFile.append(chunk);
    } catch (error) {
      this.options.logger.warn(
        { err: error, stream: handle.name, filePath: handle.logFile.filePath },
        "worker log file write failed; file logging disabled for this worker"
      );
      handle.logFile = null;
    }
  }

  private scanForErrors(handle: WorkerHandle, text: string): void {
    const lines = `${handle.partialLine}${text}`.split(/\r?\n|\r/);
    handle.partialLine = (lines.pop() ?? "").slice(-MAX_PARTIAL_LINE);
    for (const line of lines) {
      const trimmed = line.trim();
      if (trimmed && isErrorLine(trimmed)) {
        handle.lastErrorLine = trimmed;
      }
    }
  }

  private async terminate(handle: WorkerHandle): Promise<StopOutcome> {
    if (handle.exited) {
      return { forced: false, alreadyStopped: false };
    }

    this.signal(handle, "SIGTERM");
    if (await this.waitForExit(handle, this.options.stopGraceMs)) {
      this.options.logger.info({ stream: handle.name, pid: handle.pid }, "worker stopped");
      return { forced: false, alreadyStopped: false };
    }

    this.options.logger.warn(
      { stream: handle.name, pid: handle.pid, graceMs: this.options.stopGraceMs },
      "worker did not exit after SIGTERM; sending SIGKILL"
    );
    this.signal(handle, "SIGKILL");
    if (!(await this.waitForExit(handle, KILL_WAIT_MS))) {
      this.options.logger.error({ stream: handle.name, pid: handle.pid }, "worker still alive after SIGKILL");
    }
    return { forced: true, alreadyStopped: false };
  }

  private waitForExit(handle: WorkerHandle, timeoutMs: number): Promise<boolean> {
    if (handle.exited) {
      return Promise.resolve(true);
    }

    return new Promise<boolean>((resolve) => {
      const timer = setTimeout(() => resolve(false), timeoutMs);
      void handle.exitPromise.then(() => {
        clearTimeout(timer);
        resolve(true);
      });
    });
  }

  private signal(handle: WorkerHandle, signal: NodeJS.Signals): void {
    try {
      handle.child.kill(signal);
    } catch (error) {
      this.options.logger.warn({ err: error, stream: handle.name, pid: handle.pid, signal }, "failed to signal worker");
    }
  }

  private release(handle: WorkerHandle): void {
    if (this.handles.get(handle.name) === handle) {
      this.handles.delete(handle.name);
      this.released.add(handle.name);
    }
    handle.child.stdout?.removeAllListeners("data");
    handle.child.stderr?.removeAllListeners("data");
    handle.log.clear();
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
