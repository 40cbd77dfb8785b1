import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { DbClient } from "../src/db/client.js";
import { DuplicateNameError, NotFoundError } from "../src/shared/errors.js";
import type { StreamConfig } from "../src/shared/types.js";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

function makeConfigDir(): string {
  const configDir = fs.mkdtempSync(path.join(os.tmpdir(), "rtsp-bridge-db-test-"));
  tempDirs.push(configDir);
  return configDir;
}

function stream(name: string, rtspPort = 8554): StreamConfig {
  return { name, sourceUrl: `rtmp://src/live/${name}`, rtspPort };
}

describe("DbClient streams", () => {
  it("lists streams in insertion order across reopen", () => {
    const configDir = makeConfigDir();
    const db = new DbClient(configDir);
    try {
      db.put(stream("zeta"));
      db.put(stream("alpha"));
      db.put(stream("mid"));
    } finally {
      db.close();
    }

    const reopened = new DbClient(configDir);
    try {
      expect(reopened.list().map((record) => record.config.name)).toEqual(["zeta", "alpha", "mid"]);
      expect(reopened.get("alpha").config).toEqual(stream("alpha"));
      expect(reopened.get("alpha").status).toEqual({
        running: false,
        reason: "starting",
        lastCheckedAt: null,
        exitCode: null
      });
    } finally {
      reopened.close();
    }
  });

  it("rejects a duplicate name and leaves the original untouched", () => {
    const db = new DbClient(makeConfigDir());
    try {
      db.put(stream("cam1", 8554));
      expect(() => db.put(stream("cam1", 9554))).toThrow(DuplicateNameError);
      expect(db.get("cam1").config.rtspPort).toBe(8554);
      expect(db.list()).toHaveLength(1);
    } finally {
      db.close();
    }
  });

  it("replaces a record in place when asked to", () => {
    const db = new DbClient(makeConfigDir());
    try {
      db.put(stream("first"));
      db.put(stream("cam1", 8554));
      db.put(stream("cam1", 9554), { replace: true });
      expect(db.get("cam1").config.rtspPort).toBe(9554);
      expect(db.list().map((record) => record.config.name)).toEqual(["first", "cam1"]);
    } finally {
      db.close();
    }
  });

  it("deletes config and status together", () => {
    const db = new DbClient(makeConfigDir());
    try {
      db.put(stream("cam1"));
      db.delete("cam1");
      expect(db.has("cam1")).toBe(false);
      expect(() => db.get("cam1")).toThrow(NotFoundError);
      expect(() => db.delete("cam1")).toThrow(NotFoundError);
    } finally {
      db.close();
    }
  });

  it("persists status writes and drops writes for removed streams", () => {
    const db = new DbClient(makeConfigDir());
    try {
      db.put(stream("cam1"));
      const status = { running: false, reason: "worker exited with code 1", lastCheckedAt: "2024-01-01T00:00:00.000Z", exitCode: 1 };
      expect(db.writeStatus("cam1", status)).toBe(true);
      expect(db.get("cam1").status).toEqual(status);

      db.delete("cam1");
      expect(db.writeStatus("cam1", status)).toBe(false);
      expect(db.has("cam1")).toBe(false);
    } finally {
      db.close();
    }
  });
});

describe("DbClient config", () => {
  it("seeds defaults and stores updates", () => {
    const db = new DbClient(makeConfigDir());
    try {
      expect(db.getConfigValueRaw("relayHost")).toBe("localhost");
      db.setConfigValueRaw("relayHost", "relay.local");
      expect(db.listConfigRaw().relayHost).toBe("relay.local");
    } finally {
      db.close();
    }
  });

  it("keeps daemon metadata", () => {
    const db = new DbClient(makeConfigDir());
    try {
      expect(db.getDaemonMeta("lastStartedAt")).toBeNull();
      db.upsertDaemonMeta("lastStartedAt", "2024-01-01T00:00:00.000Z");
      expect(db.getDaemonMeta("lastStartedAt")).toBe("2024-01-01T00:00:00.000Z");
    } finally {
      db.close();
    }
  });
});
