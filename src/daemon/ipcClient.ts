import { DAEMON_HOST, HTTP_API_PREFIX } from "../shared/constants.js";
import { AppError, errorFromCode } from "../shared/errors.js";
import type { DaemonRuntime, DaemonStatus, StreamView } from "../shared/types.js";
import type { StreamInput } from "../core/stream.js";

export class DaemonApiClient {
  constructor(private readonly runtime: DaemonRuntime) {}

  async status(): Promise<DaemonStatus> {
    return this.requestJson<DaemonStatus>("GET", `${HTTP_API_PREFIX}/status`);
  }

  async shutdown(): Promise<void> {
    await this.requestJson("POST", `${HTTP_API_PREFIX}/shutdown`);
  }

  async listStreams(): Promise<StreamView[]> {
    const body = await this.requestJson<{ streams: StreamView[] }>("GET", `${HTTP_API_PREFIX}/streams`);
    return body.streams;
  }

  async getStream(name: string): Promise<StreamView> {
    return this.requestJson<StreamView>("GET", streamPath(name));
  }

  async addStream(input: StreamInput): Promise<StreamView> {
    return this.requestJson<StreamView>("POST", `${HTTP_API_PREFIX}/streams`, input);
  }

  async removeStream(name: string): Promise<void> {
    await this.requestJson("DELETE", streamPath(name));
  }

  async clearStreamError(name: string): Promise<StreamView> {
    return this.requestJson<StreamView>("POST", `${streamPath(name)}/clear-error`);
  }

  async clearAllErrors(): Promise<StreamView[]> {
    const body = await this.requestJson<{ streams: StreamView[] }>("POST", `${HTTP_API_PREFIX}/clear-errors`);
    return body.streams;
  }

  async streamLogs(name: string, maxBytes: number): Promise<string> {
    const response = await this.request("GET", `${streamPath(name)}/logs?maxBytes=${maxBytes}`);
    return response.text();
  }

  private async requestJson<T = unknown>(method: string, path: string, body?: unknown): Promise<T> {
    const response = await this.request(method, path, body);
    return (await response.json()) as T;
  }

  private async request(method: string, path: string, body?: unknown): Promise<Response> {
    const url = `http://${DAEMON_HOST}:${this.runtime.port}${path}`;
    const response = await fetch(url, {
      method,
      headers: {
        Authorization: `Bearer ${this.runtime.token}`,
        "Content-Type": "application/json"
      },
      body: body === undefined ? undefined : JSON.stringify(body)
    });

    if (!response.ok) {
      throw await toError(response);
    }

    return response;
  }
}

function streamPath(name: string): string {
  return `${HTTP_API_PREFIX}/streams/${encodeURIComponent(name)}`;
}

async function toError(response: Response): Promise<AppError> {
  const text = await response.text();
  const parsed = safeParseJson(text);
  if (typeof parsed === "object" && parsed !== null && "error" in parsed && typeof parsed.error === "string") {
    const code = "code" in parsed && typeof parsed.code === "string" ? parsed.code : "DAEMON_ERROR";
    return errorFromCode(code, parsed.error);
  }
  return new AppError(`Daemon request failed: ${response.status} ${text}`, "DAEMON_ERROR");
}

function safeParseJson(input: string): unknown {
  if (!input.trim()) {
    return null;
  }
  try {
    return JSON.parse(input);
  } catch {
    return null;
  }
}
