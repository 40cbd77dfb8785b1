import { HTTP_API_PREFIX, DEFAULT_LOG_TAIL_BYTES, DEFAULT_RTSP_PORT } from "../shared/constants.js";
import { AppError, InvalidConfigError, httpStatusForError } from "../shared/errors.js";
import type { StreamInput } from "../core/stream.js";
import { decodeLogTail } from "../core/logBuffer.js";
import type { StreamSupervisor } from "../supervisor/supervisor.js";
import type { StreamQueryService } from "../supervisor/query.js";

export interface ApiRequest {
  method: string;
  url: string;
  body?: unknown;
}

export interface ApiResponse {
  status: number;
  json?: unknown;
  text?: string;
}

export interface ApiContext {
  supervisor: Pick<StreamSupervisor, "addStream" | "removeStream" | "clearStreamError" | "clearAllErrors">;
  query: StreamQueryService;
  status(): unknown;
  requestShutdown(): void;
}

const STREAMS_PATH = `${HTTP_API_PREFIX}/streams`;

export async function handleApiRequest(context: ApiContext, request: ApiRequest): Promise<ApiResponse> {
  try {
    return await route(context, request);
  } catch (error) {
    if (error instanceof AppError) {
      return { status: httpStatusForError(error), json: { error: error.message, code: error.code } };
    }
    throw error;
  }
}

async function route(context: ApiContext, request: ApiRequest): Promise<ApiResponse> {
  const url = new URL(request.url, "http://localhost");
  const method = request.method.toUpperCase();
  const pathname = url.pathname;

  if (method === "GET" && pathname === `${HTTP_API_PREFIX}/status`) {
    return { status: 200, json: context.status() };
  }

  if (method === "POST" && pathname === `${HTTP_API_PREFIX}/shutdown`) {
    context.requestShutdown();
    return { status: 200, json: { ok: true } };
  }

  if (method === "POST" && pathname === `${HTTP_API_PREFIX}/clear-errors`) {
    return { status: 200, json: { streams: await context.supervisor.clearAllErrors() } };
  }

  if (pathname === STREAMS_PATH) {
    if (method === "GET") {
      return { status: 200, json: { streams: context.query.listStreams() } };
    }
    if (method === "POST") {
      const view = await context.supervisor.addStream(parseStreamInput(request.body));
      return { status: 201, json: view };
    }
  }

  if (pathname.startsWith(`${STREAMS_PATH}/`)) {
    const segments = pathname.slice(STREAMS_PATH.length + 1).split("/");
    const name = decodeStreamName(segments[0] ?? "");
    const action = segments[1];

    if (segments.length === 1 && method === "GET") {
      return { status: 200, json: context.query.getStream(name) };
    }

    if (segments.length === 1 && method === "DELETE") {
      await context.supervisor.removeStream(name);
      return { status: 200, json: { ok: true } };
    }

    if (segments.length === 2 && action === "logs" && method === "GET") {
      const maxBytes = parseMaxBytes(url.searchParams.get("maxBytes"));
      return { status: 200, text: decodeLogTail(context.query.getStreamLogs(name, maxBytes)) };
    }

    if (segments.length === 2 && action === "clear-error" && method === "POST") {
      return { status: 200, json: await context.supervisor.clearStreamError(name) };
    }
  }

  return { status: 404, json: { error: "Not found" } };
}

export function parseStreamInput(body: unknown): StreamInput {
  if (typeof body !== "object" || body === null) {
    throw new InvalidConfigError("Request body must be a JSON object");
  }

  const name = "name" in body ? body.name : undefined;
  const sourceUrl = "sourceUrl" in body ? body.sourceUrl : undefined;
  const rtspPort = "rtspPort" in body ? body.rtspPort : undefined;

  if (typeof name !== "string") {
    throw new InvalidConfigError("name must be a string");
  }
  if (typeof sourceUrl !== "string") {
    throw new InvalidConfigError("sourceUrl must be a string");
  }
  if (rtspPort !== undefined && typeof rtspPort !== "number") {
    throw new InvalidConfigError("rtspPort must be a number");
  }

  return { name, sourceUrl, rtspPort: rtspPort ?? DEFAULT_RTSP_PORT };
}

function decodeStreamName(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch (error) {
    if (error instanceof URIError) {
      throw new InvalidConfigError(`Invalid stream name encoding: ${segment}`);
    }
    throw error;
  }
}

function parseMaxBytes(raw: string | null): number {
  if (raw === null) {
    return DEFAULT_LOG_TAIL_BYTES;
  }
  const parsed = Number(raw);
  if (!raw.trim() || !Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidConfigError("maxBytes must be a non-negative integer");
  }
  return parsed;
}
