import path from "node:path";
import { Command } from "commander";
import { createAppContext, createSupervisor, setAppConfigValue, type AppContext } from "./context.js";
import { parsePortInput, toStreamView } from "../core/stream.js";
import { AppError, DuplicateNameError, InvalidConfigError, NotFoundError } from "../shared/errors.js";
import { CONFIG_KEYS, configKeyFromInput } from "../config/settings.js";
import type { DaemonRuntime, StreamView } from "../shared/types.js";
import { readRuntime } from "../daemon/runtime.js";
import { DaemonApiClient } from "../daemon/ipcClient.js";
import { SupervisorDaemon } from "../daemon/daemon.js";
import { persistConfigDir, migrateDbIfNeeded } from "../config/bootstrap.js";
import { DB_FILE_NAME, DEFAULT_CONFIG_DIR, DEFAULT_LOG_TAIL_BYTES, DEFAULT_RTSP_PORT } from "../shared/constants.js";
import { assertFfmpegAvailable } from "../worker/ffmpeg.js";
import { resolveDirPath } from "../utils/path.js";
import { ensureDirSync } from "../utils/fs.js";

interface GlobalOptions {
  configDir?: string;
}

interface JsonOption {
  json?: boolean;
}

export async function runCli(argv: string[]): Promise<void> {
  const program = new Command();
  program
    .name("rtsp-bridge")
    .description("Supervises ffmpeg workers that relay RTMP sources to an RTSP server")
    .option("--config-dir <path>", "Override config directory for this command");

  program
    .command("serve")
    .description("Run the stream supervisor in the foreground")
    .action(async () => {
      await runDaemonProcess(program.opts<GlobalOptions>().configDir);
    });

  program
    .command("add")
    .argument("<name>", "Unique stream name (no whitespace)")
    .argument("<sourceUrl>", "RTMP source URL")
    .argument("[rtspPort]", `RTSP relay port (default ${DEFAULT_RTSP_PORT})`)
    .action(async (name: string, sourceUrl: string, rtspPort: string | undefined) => {
      const client = connect(program.opts<GlobalOptions>());
      const view = await client.addStream({
        name,
        sourceUrl,
        rtspPort: rtspPort === undefined ? DEFAULT_RTSP_PORT : parsePortInput(rtspPort)
      });
      console.log(`Added stream ${view.config.name}: ${view.inputUrl} -> ${view.outputUrl}`);
    });

  program
    .command("rm")
    .alias("del")
    .argument("<name>", "Stream name")
    .action(async (name: string) => {
      const client = connect(program.opts<GlobalOptions>());
      await client.removeStream(name);
      console.log(`Removed stream ${name}`);
    });

  program
    .command("ls")
    .alias("list")
    .option("--json", "Output JSON")
    .action(async (options: JsonOption) => {
      const streams = await listStreams(program.opts<GlobalOptions>());
      if (options.json) {
        console.log(JSON.stringify(streams, null, 2));
        return;
      }

      if (streams.length === 0) {
        console.log("No streams configured");
        return;
      }

      printStreams(streams);
    });

  program
    .command("get")
    .argument("<name>", "Stream name")
    .option("--json", "Output JSON")
    .action(async (name: string, options: JsonOption) => {
      const client = connect(program.opts<GlobalOptions>());
      const view = await client.getStream(name);
      if (options.json) {
        console.log(JSON.stringify(view, null, 2));
        return;
      }
      printStreams([view]);
      console.log(`Reason: ${view.status.reason}`);
    });

  program
    .command("logs")
    .argument("<name>", "Stream name")
    .option("--bytes <n>", "Maximum bytes to print from the end of the log", String(DEFAULT_LOG_TAIL_BYTES))
    .action(async (name: string, options: { bytes: string }) => {
      const maxBytes = Number(options.bytes);
      if (!Number.isInteger(maxBytes) || maxBytes < 0) {
        throw new InvalidConfigError(`Invalid byte count: ${options.bytes}`);
      }

      const client = connect(program.opts<GlobalOptions>());
      const text = await client.streamLogs(name, maxBytes);
      process.stdout.write(text.endsWith("\n") || text.length === 0 ? text : `${text}\n`);
    });

  program
    .command("clear-error")
    .argument("[name]", "Stream name")
    .option("--all", "Clear errors on every stream")
    .action(async (name: string | undefined, options: { all?: boolean }) => {
      if (options.all === (name !== undefined)) {
        throw new InvalidConfigError("Give either a stream name or --all");
      }

      const client = connect(program.opts<GlobalOptions>());
      if (name === undefined) {
        const views = await client.clearAllErrors();
        console.log(`Cleared errors for ${views.length} stream(s)`);
        return;
      }

      const view = await client.clearStreamError(name);
      console.log(`Cleared error for ${name}: ${view.status.reason}`);
    });

  program
    .command("status")
    .description("Show daemon status")
    .action(async () => {
      const runtime = withContext(program.opts<GlobalOptions>(), (context) => readRuntime(context.configDir));
      if (!runtime) {
        console.log("Daemon: stopped");
        return;
      }

      try {
        const status = await new DaemonApiClient(runtime).status();
        console.log(
          `Daemon: running pid=${status.pid} port=${status.port} streams=${status.streams} running=${status.runningWorkers} lastReconcileAt=${status.lastReconcileAt ?? "n/a"}`
        );
      } catch {
        console.log(`Daemon: running pid=${runtime.pid} (status endpoint unavailable)`);
      }
    });

  program
    .command("stop")
    .description("Stop the running daemon")
    .action(async () => {
      const runtime = withContext(program.opts<GlobalOptions>(), (context) => readRuntime(context.configDir));
      if (!runtime) {
        console.log("Daemon is not running");
        return;
      }

      try {
        await new DaemonApiClient(runtime).shutdown();
        console.log("Daemon stop requested");
      } catch {
        try {
          process.kill(runtime.pid, "SIGTERM");
          console.log(`Daemon signaled directly (pid ${runtime.pid})`);
        } catch {
          console.log("Daemon appears to have already stopped");
        }
      }
    });

  const config = program.command("config").description("Read and update configuration");

  config.command("list").action(() => {
    withContext(program.opts<GlobalOptions>(), (context) => {
      const values = context.db.listConfigRaw();
      console.log(`configDir=${context.configDir} (${context.configDirSource})`);
      for (const key of CONFIG_KEYS) {
        console.log(`${key}=${values[key] ?? String(context.config[key])}`);
      }
    });
  });

  config
    .command("get")
    .argument("<key>")
    .action((keyInput: string) => {
      withContext(program.opts<GlobalOptions>(), (context) => {
        const key = configKeyFromInput(keyInput);
        console.log(key === "configDir" ? context.configDir : context.db.getConfigValueRaw(key));
      });
    });

  config
    .command("set")
    .argument("<key>")
    .argument("<value>")
    .action((keyInput: string, value: string) => {
      withContext(program.opts<GlobalOptions>(), (context) => {
        const key = configKeyFromInput(keyInput);

        if (key === "configDir") {
          const nextDir = resolveDirPath(value);
          if (nextDir === context.configDir) {
            console.log(`configDir already set to ${nextDir}`);
            return;
          }

          if (readRuntime(context.configDir)) {
            throw new InvalidConfigError("Stop the daemon before moving the config directory");
          }

          ensureDirSync(nextDir);
          context.db.checkpoint();
          const copied = migrateDbIfNeeded(path.join(context.configDir, DB_FILE_NAME), path.join(nextDir, DB_FILE_NAME));
          persistConfigDir(nextDir);
          console.log(`configDir set to ${nextDir}${copied ? " (state copied)" : ""}`);
          return;
        }

        const updated = setAppConfigValue(context, key, value);
        console.log(`Updated ${key}=${String(updated)}`);
        if (readRuntime(context.configDir)) {
          console.log("Restart the daemon for the change to take effect");
        }
      });
    });

  await program.parseAsync(argv);
}

async function runDaemonProcess(configDirOverride?: string): Promise<void> {
  const context = createAppContext({ configDirOverride });
  const { logger } = context;

  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    try {
      await daemon.stop();
    } catch (error) {
      logger.error({ err: error }, "daemon shutdown failed");
    } finally {
      context.close();
      process.exit(0);
    }
  };

  const daemon = new SupervisorDaemon({
    configDir: context.configDir,
    config: context.config,
    db: context.db,
    logger,
    supervisor: createSupervisor(context),
    onShutdownRequested: () => {
      void shutdown();
    }
  });

  process.on("SIGINT", () => {
    void shutdown();
  });

  process.on("SIGTERM", () => {
    void shutdown();
  });

  try {
    assertFfmpegAvailable(context.config.ffmpegPath);
    await daemon.start();
  } catch (error) {
    context.close();
    throw error;
  }
}

function withContext<T>(options: GlobalOptions, fn: (context: AppContext) => T): T {
  const context = createAppContext({ configDirOverride: options.configDir });
  try {
    return fn(context);
  } finally {
    context.close();
  }
}

function connect(options: GlobalOptions): DaemonApiClient {
  const runtime = withContext(options, (context) => readRuntime(context.configDir));
  return new DaemonApiClient(requireRuntime(runtime));
}

function requireRuntime(runtime: DaemonRuntime | null): DaemonRuntime {
  if (!runtime) {
    throw new AppError("Daemon is not running. Start it with 'rtsp-bridge serve'.", "DAEMON_NOT_RUNNING");
  }
  return runtime;
}

async function listStreams(options: GlobalOptions): Promise<StreamView[]> {
  const runtime = withContext(options, (context) => readRuntime(context.configDir));
  if (runtime) {
    return new DaemonApiClient(runtime).listStreams();
  }

  // Daemon down: report the last persisted status.
  return withContext(options, (context) =>
    context.db.list().map((record) => toStreamView(record, context.config.publicHostname))
  );
}

function printStreams(streams: StreamView[]): void {
  const rows = streams.map((view) => ({
    name: view.config.name,
    running: view.status.running,
    reason: view.status.reason,
    input: view.inputUrl,
    output: view.outputUrl,
    checkedAt: view.status.lastCheckedAt ?? "never"
  }));
  console.table(rows);
}

export function handleCliError(error: unknown): number {
  if (error instanceof NotFoundError || error instanceof InvalidConfigError || error instanceof DuplicateNameError) {
    console.error(error.message);
    return 2;
  }

  if (error instanceof Error) {
    console.error(error.message);
    return 1;
  }

  console.error("Unknown error");
  return 1;
}

export function printHelpHint(): void {
  console.error(`Run 'rtsp-bridge help' for usage. Default config dir: ${DEFAULT_CONFIG_DIR}`);
}
