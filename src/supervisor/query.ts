import type { StreamView } from "../shared/types.js";
import type { StreamSupervisor } from "./supervisor.js";

type StreamReader = Pick<StreamSupervisor, "listStreams" | "getStream" | "getStreamLogs">;

/** Read-only view of the supervisor for the presentation layer. */
export class StreamQueryService {
  constructor(private readonly supervisor: StreamReader) {}

  listStreams(): StreamView[] {
    return this.supervisor.listStreams();
  }

  getStream(name: string): StreamView {
    return this.supervisor.getStream(name);
  }

  getStreamLogs(name: string, maxBytes: number): Buffer {
    return this.supervisor.getStreamLogs(name, maxBytes);
  }
}
