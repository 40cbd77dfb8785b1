import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import {
  NOT_STARTED_REASON,
  SHUTDOWN_REASON,
  StreamSupervisor,
  type StreamSupervisorOptions
} from "../src/supervisor/supervisor.js";
import { StreamQueryService } from "../src/supervisor/query.js";
import { MemoryStreamStore } from "../src/store/memory.js";
import { DbClient } from "../src/db/client.js";
import { createLogger } from "../src/shared/logger.js";
import {
  DuplicateNameError,
  InvalidConfigError,
  NotFoundError,
  ShuttingDownError,
  WorkerStartFailedError
} from "../src/shared/errors.js";
import { FakeController } from "./helpers/fakeController.js";

const tempDirs: string[] = [];
const supervisors: StreamSupervisor[] = [];

afterEach(async () => {
  for (const supervisor of supervisors.splice(0)) {
    await supervisor.shutdown(1000);
  }
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

function makeSupervisor(overrides: Partial<StreamSupervisorOptions> = {}): {
  supervisor: StreamSupervisor;
  controller: FakeController;
  store: MemoryStreamStore;
} {
  const controller = new FakeController();
  const store = new MemoryStreamStore();
  const supervisor = new StreamSupervisor({
    store,
    controller,
    logger: createLogger("silent"),
    publicHostname: "cams.example.test",
    reconcileIntervalMs: 60_000,
    ...overrides
  });
  supervisors.push(supervisor);
  return { supervisor, controller, store };
}

const cam1 = { name: "cam1", sourceUrl: "rtmp://src/live/cam1", rtspPort: 8554 };

function nextTick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe("StreamSupervisor", () => {
  it("tracks a stream from add through crash to removal", async () => {
    const { supervisor, controller } = makeSupervisor();

    const added = await supervisor.addStream(cam1);
    expect(added.outputUrl).toBe("rtsp://cams.example.test:8554/cam1");
    expect(added.status.running).toBe(false);

    await supervisor.reconcileOnce();
    const [healthy] = supervisor.listStreams();
    expect(supervisor.listStreams()).toHaveLength(1);
    expect(healthy?.status.running).toBe(true);
    expect(healthy?.status.reason).toBe("healthy");
    expect(healthy?.status.lastCheckedAt).not.toBeNull();

    controller.kill("cam1", 1);
    await supervisor.reconcileOnce();
    const crashed = supervisor.getStream("cam1");
    expect(crashed.status.running).toBe(false);
    expect(crashed.status.reason).toBe("worker exited with code 1");
    expect(crashed.status.exitCode).toBe(1);

    await supervisor.removeStream("cam1");
    expect(supervisor.listStreams()).toEqual([]);
    await expect(supervisor.removeStream("cam1")).rejects.toThrow(NotFoundError);
    expect(controller.stopCalls).toBe(1);
  });

  it("never starts a second worker for a duplicate name", async () => {
    const { supervisor, controller, store } = makeSupervisor();
    await supervisor.addStream(cam1);

    await expect(supervisor.addStream({ ...cam1, rtspPort: 9554 })).rejects.toThrow(DuplicateNameError);
    expect(controller.starts.get("cam1")).toBe(1);
    expect(store.get("cam1").config.rtspPort).toBe(8554);
  });

  it("lets exactly one of two concurrent adds win", async () => {
    const { supervisor, controller } = makeSupervisor();

    const results = await Promise.allSettled([
      supervisor.addStream({ name: "a", sourceUrl: "rtmp://src/live/a", rtspPort: 8554 }),
      supervisor.addStream({ name: "a", sourceUrl: "rtmp://src/live/a2", rtspPort: 8554 })
    ]);

    const fulfilled = results.filter((result) => result.status === "fulfilled");
    const rejected = results.filter((result): result is PromiseRejectedResult => result.status === "rejected");
    expect(fulfilled).toHaveLength(1);
    expect(rejected).toHaveLength(1);
    expect(rejected[0]?.reason).toBeInstanceOf(DuplicateNameError);
    expect(controller.starts.get("a")).toBe(1);
    expect(controller.names()).toEqual(["a"]);
  });

  it("rolls back the record when the worker cannot start", async () => {
    const { supervisor, controller, store } = makeSupervisor();
    controller.failStart.add("cam1");

    await expect(supervisor.addStream(cam1)).rejects.toThrow(WorkerStartFailedError);
    expect(store.has("cam1")).toBe(false);
    expect(controller.names()).toEqual([]);
  });

  it("rejects invalid input before touching state", async () => {
    const { supervisor, controller, store } = makeSupervisor();

    await expect(supervisor.addStream({ ...cam1, sourceUrl: "srt://src/live/cam1" })).rejects.toThrow(InvalidConfigError);
    await expect(supervisor.addStream({ ...cam1, name: "cam 1" })).rejects.toThrow(InvalidConfigError);
    expect(store.list()).toEqual([]);
    expect(controller.starts.size).toBe(0);
  });

  it("drops a reconciliation write for a stream removed mid-pass", async () => {
    const { supervisor, controller, store } = makeSupervisor();
    await supervisor.addStream(cam1);

    let openGate: () => void = () => undefined;
    controller.stopGate = new Promise<void>((resolve) => {
      openGate = resolve;
    });

    const removal = supervisor.removeStream("cam1");
    const pass = supervisor.reconcileOnce();
    openGate();
    await Promise.all([removal, pass]);

    expect(store.has("cam1")).toBe(false);
    expect(supervisor.listStreams()).toEqual([]);
  });

  it("returns bounded logs and NotFound for unknown streams", async () => {
    const { supervisor, controller } = makeSupervisor();
    await supervisor.addStream(cam1);
    const worker = controller.workers.get("cam1");
    if (worker) {
      worker.output = "frame=1\nframe=2\n";
    }

    expect(supervisor.getStreamLogs("cam1", 8).toString()).toBe("frame=2\n");
    expect(() => supervisor.getStreamLogs("nope", 8)).toThrow(NotFoundError);
  });

  it("exposes the read path through the query service", async () => {
    const { supervisor } = makeSupervisor();
    await supervisor.addStream(cam1);
    const query = new StreamQueryService(supervisor);

    expect(query.listStreams().map((view) => view.config.name)).toEqual(["cam1"]);
    expect(query.getStream("cam1").inputUrl).toBe("rtmp://src/live/cam1");
    expect(() => query.getStream("nope")).toThrow(NotFoundError);
  });

  it("leaves crashed workers down when restart is disabled", async () => {
    const { supervisor, controller } = makeSupervisor();
    await supervisor.addStream(cam1);
    controller.kill("cam1");

    await supervisor.reconcileOnce();
    await supervisor.reconcileOnce();
    expect(controller.starts.get("cam1")).toBe(1);
    expect(supervisor.getStream("cam1").status.running).toBe(false);
  });

  it("restarts with doubling backoff until attempts run out", async () => {
    let clock = 0;
    const { supervisor, controller } = makeSupervisor({
      restartPolicy: { enabled: true, maxAttempts: 2, backoffMs: 1000 },
      now: () => clock
    });
    await supervisor.addStream(cam1);

    controller.kill("cam1");
    await supervisor.reconcileOnce();
    expect(controller.starts.get("cam1")).toBe(1);
    expect(supervisor.getStream("cam1").status.reason).toBe("worker exited with code 1");

    clock = 1000;
    await supervisor.reconcileOnce();
    expect(controller.starts.get("cam1")).toBe(2);
    expect(supervisor.getStream("cam1").status.reason).toBe("restarting (attempt 1)");
    expect(supervisor.getStream("cam1").restartCount).toBe(1);

    controller.kill("cam1");
    await supervisor.reconcileOnce();
    clock = 2500;
    await supervisor.reconcileOnce();
    expect(controller.starts.get("cam1")).toBe(2);

    clock = 3000;
    await supervisor.reconcileOnce();
    expect(controller.starts.get("cam1")).toBe(3);

    controller.kill("cam1");
    await supervisor.reconcileOnce();
    expect(controller.starts.get("cam1")).toBe(3);
    expect(supervisor.getStream("cam1").status.reason).toBe("restart attempts exhausted (2): worker exited with code 1");

    await supervisor.clearStreamError("cam1");
    expect(supervisor.getStream("cam1").restartCount).toBe(0);
  });

  it("keeps retrying a restart whose worker failed to spawn", async () => {
    let clock = 0;
    const { supervisor, controller } = makeSupervisor({
      restartPolicy: { enabled: true, maxAttempts: 2, backoffMs: 1000 },
      now: () => clock
    });
    await supervisor.addStream(cam1);

    controller.kill("cam1");
    await supervisor.reconcileOnce();
    controller.failStart.add("cam1");
    clock = 1000;
    await supervisor.reconcileOnce();
    expect(controller.has("cam1")).toBe(false);
    expect(supervisor.getStream("cam1").status.reason).toBe("Failed to start worker for stream cam1: spawn ENOENT");
    expect(supervisor.getStream("cam1").restartCount).toBe(1);

    clock = 2500;
    await supervisor.reconcileOnce();
    expect(controller.starts.get("cam1")).toBe(1);

    controller.failStart.delete("cam1");
    clock = 3000;
    await supervisor.reconcileOnce();
    expect(controller.starts.get("cam1")).toBe(2);
    expect(supervisor.getStream("cam1").status.reason).toBe("restarting (attempt 2)");
    expect(supervisor.getStream("cam1").restartCount).toBe(2);
  });

  it("reports exhaustion when the last restart failed to spawn", async () => {
    let clock = 0;
    const { supervisor, controller } = makeSupervisor({
      restartPolicy: { enabled: true, maxAttempts: 1, backoffMs: 1000 },
      now: () => clock
    });
    await supervisor.addStream(cam1);

    controller.kill("cam1");
    await supervisor.reconcileOnce();
    controller.failStart.add("cam1");
    clock = 1000;
    await supervisor.reconcileOnce();

    clock = 5000;
    await supervisor.reconcileOnce();
    expect(supervisor.getStream("cam1").status.reason).toBe(
      "restart attempts exhausted (1): Failed to start worker for stream cam1: spawn ENOENT"
    );
  });

  it("clears errors on every stream at once", async () => {
    let clock = 0;
    const { supervisor, controller } = makeSupervisor({
      restartPolicy: { enabled: true, maxAttempts: 1, backoffMs: 1000 },
      now: () => clock
    });
    await supervisor.addStream(cam1);
    await supervisor.addStream({ ...cam1, name: "cam2" });

    controller.kill("cam1");
    await supervisor.reconcileOnce();
    clock = 1000;
    await supervisor.reconcileOnce();
    expect(supervisor.getStream("cam1").restartCount).toBe(1);

    const views = await supervisor.clearAllErrors();
    expect(views.map((view) => view.config.name)).toEqual(["cam1", "cam2"]);
    expect(views.map((view) => view.restartCount)).toEqual([0, 0]);
    expect(views.map((view) => view.status.reason)).toEqual(["healthy", "healthy"]);
  });

  it("refuses new work once shutdown begins and stops workers started meanwhile", async () => {
    const { supervisor, controller, store } = makeSupervisor();
    let openGate: () => void = () => undefined;
    controller.startGate = new Promise<void>((resolve) => {
      openGate = resolve;
    });

    const adding = supervisor.addStream(cam1);
    await nextTick();
    const stopping = supervisor.shutdown(5000);

    await expect(supervisor.addStream({ ...cam1, name: "cam2" })).rejects.toThrow(ShuttingDownError);
    openGate();
    await expect(adding).resolves.toMatchObject({ config: { name: "cam1" } });
    await stopping;

    expect(controller.names()).toEqual([]);
    expect(controller.starts.get("cam2")).toBeUndefined();
    expect(store.has("cam2")).toBe(false);
    await expect(supervisor.clearStreamError("cam1")).rejects.toThrow(ShuttingDownError);
  });

  it("marks every stream stopped after shutdown", async () => {
    const { supervisor, store } = makeSupervisor();
    await supervisor.addStream(cam1);
    await supervisor.addStream({ ...cam1, name: "cam2" });
    await supervisor.reconcileOnce();
    expect(supervisor.stats().runningWorkers).toBe(2);

    await supervisor.shutdown(1000);
    expect(store.get("cam1").status).toMatchObject({ running: false, reason: SHUTDOWN_REASON, exitCode: null });
    expect(store.get("cam2").status).toMatchObject({ running: false, reason: SHUTDOWN_REASON, exitCode: null });
    expect(supervisor.stats().runningWorkers).toBe(0);
  });

  it("reports counts in stats", async () => {
    const { supervisor } = makeSupervisor();
    await supervisor.addStream(cam1);
    await supervisor.addStream({ ...cam1, name: "cam2" });
    await supervisor.reconcileOnce();

    const stats = supervisor.stats();
    expect(stats.streams).toBe(2);
    expect(stats.runningWorkers).toBe(2);
    expect(stats.lastReconcileAt).toBeDefined();
  });
});

describe("StreamSupervisor restart round-trip", () => {
  function makeDbSupervisor(db: DbClient, autostartOnLoad: boolean): { supervisor: StreamSupervisor; controller: FakeController } {
    const controller = new FakeController();
    const supervisor = new StreamSupervisor({
      store: db,
      controller,
      logger: createLogger("silent"),
      publicHostname: "localhost",
      reconcileIntervalMs: 60_000,
      autostartOnLoad
    });
    supervisors.push(supervisor);
    return { supervisor, controller };
  }

  async function seed(configDir: string): Promise<void> {
    const db = new DbClient(configDir);
    try {
      const { supervisor } = makeDbSupervisor(db, false);
      await supervisor.addStream(cam1);
      await supervisor.addStream({ ...cam1, name: "cam2", rtspPort: 9554 });
      await supervisor.shutdown(1000);
    } finally {
      db.close();
    }
  }

  function makeConfigDir(): string {
    const configDir = fs.mkdtempSync(path.join(os.tmpdir(), "rtsp-bridge-supervisor-test-"));
    tempDirs.push(configDir);
    return configDir;
  }

  it("reloads every stream without starting workers", async () => {
    const configDir = makeConfigDir();
    await seed(configDir);

    const db = new DbClient(configDir);
    try {
      const { supervisor, controller } = makeDbSupervisor(db, false);
      await supervisor.start();

      const views = supervisor.listStreams();
      expect(views.map((view) => view.config.name)).toEqual(["cam1", "cam2"]);
      expect(views.every((view) => !view.status.running && view.status.reason === NOT_STARTED_REASON)).toBe(true);
      expect(controller.names()).toEqual([]);
      await supervisor.shutdown(1000);
    } finally {
      db.close();
    }
  });

  it("starts reloaded workers when autostart is on", async () => {
    const configDir = makeConfigDir();
    await seed(configDir);

    const db = new DbClient(configDir);
    try {
      const { supervisor, controller } = makeDbSupervisor(db, true);
      await supervisor.start();

      expect(controller.names()).toEqual(["cam1", "cam2"]);
      expect(supervisor.getStream("cam2").status.reason).toBe("starting");
      await supervisor.shutdown(1000);
      expect(controller.names()).toEqual([]);
    } finally {
      db.close();
    }
  });
});
