import { describe, expect, it } from "vitest";
import { describeExit, describeRunning, isErrorLine, summarizeFailure } from "../src/core/health.js";

describe("isErrorLine", () => {
  it("matches error and fatal as words", () => {
    expect(isErrorLine("[rtmp] Error opening input")).toBe(true);
    expect(isErrorLine("FATAL: connection refused")).toBe(true);
    expect(isErrorLine("frame=  10 fps=25 errors_total=0")).toBe(false);
  });
});

describe("summarizeFailure", () => {
  it("describes the exit", () => {
    expect(describeExit(1, null)).toBe("worker exited with code 1");
    expect(describeExit(null, "SIGKILL")).toBe("worker killed by SIGKILL");
    expect(describeExit(null, null)).toBe("worker exited");
  });

  it("appends the last output lines", () => {
    expect(summarizeFailure({ code: 1, signal: null, lastLines: ["Connection refused", "Exiting"] })).toBe(
      "worker exited with code 1: Connection refused | Exiting"
    );
  });

  it("caps the reason length", () => {
    const reason = summarizeFailure({ code: 1, signal: null, lastLines: ["x".repeat(500)] });
    expect(reason).toHaveLength(300);
    expect(reason.endsWith("...")).toBe(true);
  });
});

describe("describeRunning", () => {
  it("is healthy with recent output", () => {
    expect(describeRunning({ lastErrorLine: null, lastOutputAt: 1000, staleOutputMs: 30_000, now: 2000 })).toBe("healthy");
  });

  it("reports the last error line", () => {
    expect(
      describeRunning({ lastErrorLine: "Error writing trailer", lastOutputAt: 1000, staleOutputMs: 30_000, now: 2000 })
    ).toBe("running, last error: Error writing trailer");
  });

  it("reports stale output", () => {
    expect(describeRunning({ lastErrorLine: null, lastOutputAt: 0, staleOutputMs: 30_000, now: 31_000 })).toBe(
      "running, no output for more than 30s"
    );
    expect(describeRunning({ lastErrorLine: null, lastOutputAt: 0, staleOutputMs: 0, now: 31_000 })).toBe("healthy");
  });
});
