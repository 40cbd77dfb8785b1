import os from "node:os";
import path from "node:path";
import { InvalidConfigError } from "../shared/errors.js";

/**
 * Resolves a directory given on the command line, in the environment or in the
 * bootstrap file. A leading `~` expands to the home directory.
 */
export function resolveDirPath(input: string, home: string = os.homedir()): string {
  const trimmed = input.trim();
  if (!trimmed) {
    throw new InvalidConfigError("Directory path cannot be empty");
  }

  if (trimmed === "~") {
    return home;
  }

  if (trimmed.startsWith("~/")) {
    return path.join(home, trimmed.slice(2));
  }

  return path.resolve(trimmed);
}
