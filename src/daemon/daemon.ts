import fs from "node:fs";
import path from "node:path";
import crypto from "node:crypto";
import http, { type IncomingMessage, type ServerResponse } from "node:http";
import type { Logger } from "../shared/logger.js";
import type { AppConfig, DaemonStatus } from "../shared/types.js";
import { DAEMON_HOST, LOCK_FILE_NAME } from "../shared/constants.js";
import { AlreadyRunningError, InvalidConfigError } from "../shared/errors.js";
import type { DbClient } from "../db/client.js";
import type { StreamSupervisor } from "../supervisor/supervisor.js";
import { StreamQueryService } from "../supervisor/query.js";
import { ensureDirSync, removeFileIfExists } from "../utils/fs.js";
import { isPidRunning } from "../utils/process.js";
import { clearRuntime, writeRuntime } from "./runtime.js";
import { handleApiRequest, type ApiContext } from "./routes.js";

const MAX_BODY_BYTES = 64 * 1024;

export interface SupervisorDaemonInput {
  configDir: string;
  config: AppConfig;
  db: DbClient;
  logger: Logger;
  supervisor: StreamSupervisor;
  onShutdownRequested?: () => void;
}

export class SupervisorDaemon {
  private server?: http.Server;
  private readonly token = crypto.randomBytes(24).toString("hex");
  private readonly abort = new AbortController();
  private readonly lockPath: string;
  private readonly api: ApiContext;
  private isStopping = false;

  constructor(private readonly input: SupervisorDaemonInput) {
    this.lockPath = path.join(input.configDir, LOCK_FILE_NAME);
    this.api = {
      supervisor: input.supervisor,
      query: new StreamQueryService(input.supervisor),
      status: () => this.currentStatus(),
      requestShutdown: () => {
        setTimeout(() => {
          input.onShutdownRequested?.();
        }, 100);
      }
    };
  }

  async start(): Promise<void> {
    this.acquireLock();
    try {
      await this.listen();
    } catch (error) {
      this.abort.abort();
      await this.closeServer();
      await this.input.supervisor.shutdown(this.input.config.shutdownDeadlineSec * 1000);
      this.releaseLock();
      throw error;
    }
  }

  private async listen(): Promise<void> {
    const server = http.createServer((req, res) => {
      void this.handleRequest(req, res).catch((error: unknown) => {
        this.input.logger.error({ err: error }, "daemon request handler failed");
        this.writeJson(res, { error: "Internal server error" }, 500);
      });
    });

    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(0, DAEMON_HOST, () => resolve());
    });

    this.server = server;
    const address = server.address();
    if (!address || typeof address === "string") {
      throw new Error("Failed to bind daemon HTTP server");
    }

    await this.input.supervisor.start(this.abort.signal);

    writeRuntime(this.input.configDir, {
      pid: process.pid,
      port: address.port,
      token: this.token,
      startedAt: new Date().toISOString(),
      configDir: this.input.configDir
    });
    this.input.logger.info({ port: address.port, configDir: this.input.configDir }, "daemon started");
  }

  async stop(): Promise<void> {
    if (this.isStopping) {
      return;
    }
    this.isStopping = true;
    this.abort.abort();

    await this.closeServer();
    await this.input.supervisor.shutdown(this.input.config.shutdownDeadlineSec * 1000);

    clearRuntime(this.input.configDir);
    this.releaseLock();
    this.input.logger.info("daemon stopped");
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    if (!this.authorize(req)) {
      this.writeJson(res, { error: "Unauthorized" }, 401);
      return;
    }

    let body: unknown;
    try {
      body = await readJsonBody(req);
    } catch (error) {
      const message = error instanceof Error ? error.message : "Invalid request body";
      this.writeJson(res, { error: message, code: "INVALID_CONFIG" }, 400);
      return;
    }

    const response = await handleApiRequest(this.api, {
      method: req.method ?? "GET",
      url: req.url ?? "/",
      body
    });

    if (response.text !== undefined) {
      res.statusCode = response.status;
      res.setHeader("Content-Type", "text/plain; charset=utf-8");
      res.end(response.text);
      return;
    }

    this.writeJson(res, response.json ?? {}, response.status);
  }

  private authorize(req: IncomingMessage): boolean {
    const header = req.headers.authorization;
    if (!header) {
      return false;
    }
    return header === `Bearer ${this.token}`;
  }

  private currentStatus(): DaemonStatus {
    const startedAt = this.input.db.getDaemonMeta("lastStartedAt") ?? new Date().toISOString();
    const startedMs = Date.parse(startedAt);
    const uptimeSec = Number.isNaN(startedMs) ? 0 : Math.max(0, Math.floor((Date.now() - startedMs) / 1000));
    const address = this.server?.address();
    const port = address && typeof address !== "string" ? address.port : undefined;
    const stats = this.input.supervisor.stats();

    return {
      running: true,
      pid: process.pid,
      port,
      uptimeSec,
      streams: stats.streams,
      runningWorkers: stats.runningWorkers,
      lastReconcileAt: stats.lastReconcileAt
    };
  }

  private writeJson(res: ServerResponse, body: unknown, statusCode = 200): void {
    res.statusCode = statusCode;
    res.setHeader("Content-Type", "application/json");
    res.end(`${JSON.stringify(body)}\n`);
  }

  private acquireLock(): void {
    ensureDirSync(this.input.configDir);
    try {
      fs.writeFileSync(this.lockPath, `${process.pid}\n`, { encoding: "utf8", flag: "wx" });
    } catch (error) {
      if (!(error instanceof Error && "code" in error && error.code === "EEXIST")) {
        throw error;
      }

      const holder = Number.parseInt(fs.readFileSync(this.lockPath, "utf8").trim(), 10);
      if (holder !== process.pid && isPidRunning(holder)) {
        throw new AlreadyRunningError(`Daemon already running with pid ${holder}`);
      }
      this.input.logger.warn({ stalePid: holder }, "replacing stale daemon lock");
      fs.writeFileSync(this.lockPath, `${process.pid}\n`, "utf8");
    }

    this.input.db.upsertDaemonMeta("lastStartedAt", new Date().toISOString());
  }

  private async closeServer(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = undefined;
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
      server.closeAllConnections();
    });
  }

  private releaseLock(): void {
    removeFileIfExists(this.lockPath);
  }
}

async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size > MAX_BODY_BYTES) {
      throw new InvalidConfigError("Request body too large");
    }
    chunks.push(buffer);
  }

  const text = Buffer.concat(chunks).toString("utf8").trim();
  if (!text) {
    return undefined;
  }

  try {
    return JSON.parse(text);
  } catch {
    throw new InvalidConfigError("Request body is not valid JSON");
  }
}
