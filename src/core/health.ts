const ERROR_LINE = /\b(error|fatal)\b/i;
const MAX_REASON_LENGTH = 300;

export function isErrorLine(line: string): boolean {
  return ERROR_LINE.test(line);
}

export function describeExit(code: number | null, signal: NodeJS.Signals | null): string {
  if (signal) {
    return `worker killed by ${signal}`;
  }
  if (code === null) {
    return "worker exited";
  }
  return `worker exited with code ${code}`;
}

export function summarizeFailure(input: {
  code: number | null;
  signal: NodeJS.Signals | null;
  lastLines: string[];
}): string {
  const head = describeExit(input.code, input.signal);
  if (input.lastLines.length === 0) {
    return head;
  }
  return truncate(`${head}: ${input.lastLines.join(" | ")}`);
}

export function describeRunning(input: {
  lastErrorLine: string | null;
  lastOutputAt: number | null;
  staleOutputMs: number;
  now: number;
}): string {
  if (input.lastErrorLine) {
    return truncate(`running, last error: ${input.lastErrorLine}`);
  }

  if (
    input.staleOutputMs > 0 &&
    input.lastOutputAt !== null &&
    input.now - input.lastOutputAt > input.staleOutputMs
  ) {
    return `running, no output for more than ${Math.round(input.staleOutputMs / 1000)}s`;
  }

  return "healthy";
}

function truncate(value: string): string {
  return value.length > MAX_REASON_LENGTH ? `${value.slice(0, MAX_REASON_LENGTH - 3)}...` : value;
}
