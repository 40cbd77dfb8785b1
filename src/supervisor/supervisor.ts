import type { Logger } from "../shared/logger.js";
import type { ProbeResult, StreamRecord, StreamStatus, StreamView } from "../shared/types.js";
import { NotFoundError, ShuttingDownError } from "../shared/errors.js";
import { toStreamView, validateStreamConfig, type StreamInput } from "../core/stream.js";
import { KeyedLock } from "../core/keyedLock.js";
import { decideRestart, RESTART_DISABLED, type RestartPolicy } from "../core/restartPolicy.js";
import type { StreamStore } from "../store/types.js";
import type { ProcessController } from "../worker/controller.js";

export interface StreamSupervisorOptions {
  store: StreamStore;
  controller: ProcessController;
  logger: Logger;
  publicHostname: string;
  reconcileIntervalMs: number;
  restartPolicy?: RestartPolicy;
  autostartOnLoad?: boolean;
  now?: () => number;
}

interface RestartState {
  attempts: number;
  exitObservedAt: number | null;
  /** Set when a restart could not spawn the worker; retried from reconciliation. */
  failedStartReason: string | null;
}

export const NOT_STARTED_REASON = "not started after load";
export const SHUTDOWN_REASON = "stopped: daemon shut down";

export class StreamSupervisor {
  private readonly locks = new KeyedLock();
  private readonly restarts = new Map<string, RestartState>();
  private readonly restartPolicy: RestartPolicy;
  private readonly now: () => number;
  private interval?: NodeJS.Timeout;
  private reconcileInProgress = false;
  private stopping = false;
  private shutdownTask?: Promise<void>;
  private lastReconcileAt?: string;

  constructor(private readonly options: StreamSupervisorOptions) {
    this.restartPolicy = options.restartPolicy ?? RESTART_DISABLED;
    this.now = options.now ?? Date.now;
  }

  /**
   * Re-registers persisted streams and starts the reconciliation interval.
   * Workers are only launched here when `autostartOnLoad` is set.
   */
  async start(signal?: AbortSignal): Promise<void> {
    const records = this.options.store.list();
    for (const record of records) {
      const name = record.config.name;
      await this.locks.run(name, async () => {
        if (!this.options.autostartOnLoad || this.stopping) {
          this.writeStatus(name, { running: false, reason: NOT_STARTED_REASON, exitCode: null });
          return;
        }

        try {
          await this.options.controller.start(name, record.config);
          this.writeStatus(name, { running: false, reason: "starting", exitCode: null });
        } catch (error) {
          this.options.logger.error({ err: error, stream: name }, "failed to start stream on load");
          this.writeStatus(name, { running: false, reason: errorMessage(error), exitCode: null });
        }
      });
    }

    this.options.logger.info(
      { streams: records.length, autostart: this.options.autostartOnLoad === true },
      "streams loaded"
    );

    this.interval = setInterval(() => {
      void this.reconcileOnce();
    }, this.options.reconcileIntervalMs);

    signal?.addEventListener(
      "abort",
      () => {
        this.stopInterval();
      },
      { once: true }
    );
  }

  /**
   * Refuses new work, waits for in-flight operations within the deadline, then
   * stops every worker. Repeated calls share the first call's shutdown.
   */
  shutdown(deadlineMs: number): Promise<void> {
    this.shutdownTask ??= this.runShutdown(deadlineMs);
    return this.shutdownTask;
  }

  private async runShutdown(deadlineMs: number): Promise<void> {
    this.stopping = true;
    this.stopInterval();
    const startedAt = Date.now();

    if (!(await settlesWithin(this.locks.idle(), deadlineMs))) {
      this.options.logger.warn({ deadlineMs }, "in-flight stream operations still running at shutdown deadline");
    }

    const remainingMs = Math.max(0, deadlineMs - (Date.now() - startedAt));
    const names = this.options.controller.names();
    this.options.logger.info({ workers: names.length, deadlineMs: remainingMs }, "stopping all workers");
    await this.options.controller.stopAll(remainingMs);

    for (const record of this.options.store.list()) {
      this.writeStatus(record.config.name, { running: false, reason: SHUTDOWN_REASON, exitCode: null });
    }
  }

  private assertAcceptingWork(name: string): void {
    if (this.stopping) {
      throw new ShuttingDownError(`Supervisor is shutting down; stream ${name} not changed`);
    }
  }

  async addStream(input: StreamInput): Promise<StreamView> {
    const config = validateStreamConfig(input);

    return this.locks.run(config.name, async () => {
      this.assertAcceptingWork(config.name);
      this.options.store.put(config);

      try {
        await this.options.controller.start(config.name, config);
      } catch (error) {
        this.options.store.delete(config.name);
        this.options.logger.error({ err: error, stream: config.name }, "worker start failed; stream rolled back");
        throw error;
      }

      this.restarts.delete(config.name);
      this.options.logger.info({ stream: config.name, sourceUrl: config.sourceUrl, rtspPort: config.rtspPort }, "stream added");
      return this.toView(this.options.store.get(config.name));
    });
  }

  async removeStream(name: string): Promise<void> {
    await this.locks.run(name, async () => {
      if (!this.options.store.has(name)) {
        throw new NotFoundError(`Stream not found: ${name}`);
      }

      if (this.options.controller.has(name)) {
        try {
          const outcome = await this.options.controller.stop(name);
          if (outcome.forced) {
            this.options.logger.warn({ stream: name }, "worker had to be force-killed during removal");
          }
        } catch (error) {
          this.options.logger.error({ err: error, stream: name }, "worker stop failed during removal");
        }
      }

      this.options.store.delete(name);
      this.restarts.delete(name);
      this.options.logger.info({ stream: name }, "stream removed");
    });
  }

  listStreams(): StreamView[] {
    return this.options.store.list().map((record) => this.toView(record));
  }

  getStream(name: string): StreamView {
    return this.toView(this.options.store.get(name));
  }

  getStreamLogs(name: string, maxBytes: number): Buffer {
    if (!this.options.store.has(name)) {
      throw new NotFoundError(`Stream not found: ${name}`);
    }
    return this.options.controller.tailLog(name, maxBytes);
  }

  async clearStreamError(name: string): Promise<StreamView> {
    return this.locks.run(name, () => {
      this.assertAcceptingWork(name);
      if (!this.options.store.has(name)) {
        throw new NotFoundError(`Stream not found: ${name}`);
      }

      this.options.controller.clearError(name);
      this.restarts.delete(name);
      if (this.options.controller.has(name)) {
        this.applyProbe(name);
      }
      this.options.logger.info({ stream: name }, "stream error cleared");
      return this.toView(this.options.store.get(name));
    });
  }

  /** Clears the error state of every stream; streams removed meanwhile are skipped. */
  async clearAllErrors(): Promise<StreamView[]> {
    const names = this.options.store.list().map((record) => record.config.name);
    const views = await Promise.all(
      names.map((name) =>
        this.clearStreamError(name).catch((error: unknown) => {
          if (error instanceof NotFoundError) {
            return null;
          }
          throw error;
        })
      )
    );
    return views.filter((view): view is StreamView => view !== null);
  }

  /**
   * One reconciliation pass. Streams are probed concurrently, each under its
   * own lock; a stream removed mid-pass keeps its deletion.
   */
  async reconcileOnce(): Promise<void> {
    if (this.reconcileInProgress || this.stopping) {
      return;
    }
    this.reconcileInProgress = true;

    try {
      const names = this.options.store.list().map((record) => record.config.name);
      await Promise.all(
        names.map((name) =>
          this.locks.run(name, () => this.reconcileStream(name)).catch((error: unknown) => {
            this.options.logger.error({ err: error, stream: name }, "stream reconciliation failed");
          })
        )
      );
      this.lastReconcileAt = new Date(this.now()).toISOString();
    } finally {
      this.reconcileInProgress = false;
    }
  }

  stats(): { streams: number; runningWorkers: number; lastReconcileAt?: string } {
    const records = this.options.store.list();
    return {
      streams: records.length,
      runningWorkers: records.filter((record) => record.status.running).length,
      lastReconcileAt: this.lastReconcileAt
    };
  }

  private async reconcileStream(name: string): Promise<void> {
    if (!this.options.store.has(name) || this.stopping) {
      return;
    }

    if (!this.options.controller.has(name)) {
      const failedStartReason = this.restarts.get(name)?.failedStartReason;
      if (failedStartReason) {
        await this.maybeRestart(name, failedStartReason);
      }
      return;
    }

    const probe = this.applyProbe(name);
    const state = this.restarts.get(name);
    if (probe.alive) {
      if (state) {
        state.exitObservedAt = null;
      }
      return;
    }

    await this.maybeRestart(name, probe.reason);
  }

  private applyProbe(name: string): ProbeResult {
    const probe = this.options.controller.probe(name);
    const previous = this.options.store.get(name).status;

    if (!probe.alive && previous.running) {
      this.options.logger.warn({ stream: name, code: probe.exitCode, signal: probe.signal }, "worker exited unexpectedly");
    }

    this.writeStatus(name, {
      running: probe.alive,
      reason: probe.reason,
      exitCode: probe.exitCode
    });
    return probe;
  }

  private async maybeRestart(name: string, exitReason: string): Promise<void> {
    if (!this.restartPolicy.enabled) {
      return;
    }

    const state = this.restarts.get(name) ?? { attempts: 0, exitObservedAt: null, failedStartReason: null };
    const exitObservedAt = state.exitObservedAt ?? this.now();
    state.exitObservedAt = exitObservedAt;
    this.restarts.set(name, state);

    const decision = decideRestart({
      policy: this.restartPolicy,
      attempts: state.attempts,
      exitObservedAt,
      now: this.now()
    });

    switch (decision.action) {
      case "none":
      case "wait":
        return;
      case "exhausted": {
        const { exitCode } = this.options.store.get(name).status;
        this.writeStatus(name, {
          running: false,
          reason: `restart attempts exhausted (${state.attempts}): ${exitReason}`,
          exitCode
        });
        return;
      }
      case "restart":
        break;
      default: {
        const _exhaustive: never = decision;
        return _exhaustive;
      }
    }

    const { config } = this.options.store.get(name);
    this.options.logger.warn({ stream: name, attempt: decision.attempt }, "restarting crashed worker");
    if (this.options.controller.has(name)) {
      await this.options.controller.stop(name);
    }
    if (this.stopping) {
      return;
    }
    state.attempts = decision.attempt;
    state.exitObservedAt = null;

    try {
      await this.options.controller.start(name, config);
      state.failedStartReason = null;
      this.writeStatus(name, { running: false, reason: `restarting (attempt ${decision.attempt})`, exitCode: null });
    } catch (error) {
      const reason = errorMessage(error);
      state.failedStartReason = reason;
      state.exitObservedAt = this.now();
      this.options.logger.error({ err: error, stream: name, attempt: decision.attempt }, "worker restart failed");
      this.writeStatus(name, { running: false, reason, exitCode: null });
    }
  }

  private writeStatus(name: string, status: Omit<StreamStatus, "lastCheckedAt">): void {
    const written = this.options.store.writeStatus(name, {
      ...status,
      lastCheckedAt: new Date(this.now()).toISOString()
    });
    if (!written) {
      this.options.logger.debug({ stream: name }, "status write dropped; stream no longer exists");
    }
  }

  private toView(record: StreamRecord): StreamView {
    const restartCount = this.restarts.get(record.config.name)?.attempts ?? 0;
    return toStreamView(record, this.options.publicHostname, restartCount);
  }

  private stopInterval(): void {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = undefined;
    }
  }
}

async function settlesWithin(task: Promise<void>, timeoutMs: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<false>((resolve) => {
    timer = setTimeout(() => resolve(false), timeoutMs);
  });
  try {
    return await Promise.race([task.then(() => true as const), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
