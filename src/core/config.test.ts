import path from "node:path";
import { describe, expect, it } from "vitest";
import { ConfigError, loadConfig } from "./config.js";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      host: "127.0.0.1",
      pivotYear: 80,
      backupDir: undefined,
      auditLog: undefined,
      uploadDir: path.resolve("uploads"),
      outputDir: path.resolve("output"),
    });
  });

  it("reads and resolves environment values", () => {
    const config = loadConfig({
      PORT: "8080",
      HOST: "0.0.0.0",
      DATE_RENAMER_PIVOT: "70",
      DATE_RENAMER_BACKUP_DIR: "/srv/backup",
      DATE_RENAMER_AUDIT_LOG: "logs/audit.jsonl",
    });
    expect(config.port).toBe(8080);
    expect(config.host).toBe("0.0.0.0");
    expect(config.pivotYear).toBe(70);
    expect(config.backupDir).toBe("/srv/backup");
    expect(config.auditLog).toBe(path.resolve("logs/audit.jsonl"));
  });

  it("treats blank paths as unset", () => {
    expect(loadConfig({ DATE_RENAMER_BACKUP_DIR: "  " }).backupDir).toBeUndefined();
  });

  it("rejects an out-of-range pivot", () => {
    expect(() => loadConfig({ DATE_RENAMER_PIVOT: "120" })).toThrow(ConfigError);
    expect(() => loadConfig({ DATE_RENAMER_PIVOT: "abc" })).toThrow(
      /DATE_RENAMER_PIVOT/,
    );
  });
});
