import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { BackupManager, configStem, formatBackupTimestamp, parseBackupName } from "./backup-manager.js";

describe("backup names", () => {
  it("formats local timestamps", () => {
    expect(formatBackupTimestamp(new Date(2026, 0, 2, 3, 4, 5))).toBe("20260102_030405");
  });

  it("parses stem, timestamp and tag", () => {
    expect(parseBackupName("oh-my-opencode.20260102_030405.auto.bak", "/b")).toEqual({
      file: "oh-my-opencode.20260102_030405.auto.bak",
      path: path.join("/b", "oh-my-opencode.20260102_030405.auto.bak"),
      name: "oh-my-opencode",
      timestamp: "20260102_030405",
      tag: "auto",
      display: "oh-my-opencode - 20260102_030405 (auto)",
    });
    expect(parseBackupName("opencode.json", "/b")).toBeNull();
    expect(parseBackupName("x.bak", "/b")).toBeNull();
    expect(configStem("/a/opencode.jsonc")).toBe("opencode");
  });
});

describe("BackupManager", () => {
  let root: string;
  let target: string;
  let second: number;
  let manager: BackupManager;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "ocfg-backup-"));
    target = path.join(root, "opencode.json");
    fs.writeFileSync(target, "v1");
    second = 0;
    manager = new BackupManager(path.join(root, "backups"), 2, () => new Date(2026, 0, 1, 12, 0, second++));
  });

  afterEach(() => fs.rmSync(root, { recursive: true, force: true }));

  it("creates backups and lists them newest first", async () => {
    const first = await manager.createBackup(target);
    const tagged = await manager.createBackup(target, "manual");
    expect(first?.file).toBe("opencode.20260101_120000.auto.bak");
    expect(tagged?.file).toBe("opencode.20260101_120001.manual.bak");
    expect((await manager.listBackups()).map(b => b.file)).toEqual([
      "opencode.20260101_120001.manual.bak",
      "opencode.20260101_120000.auto.bak",
    ]);
    expect(await manager.listBackups("auth")).toEqual([]);
  });

  it("keeps every backup taken within the same second", async () => {
    const sameSecond = new BackupManager(path.join(root, "backups"), 10, () => new Date(2026, 0, 1, 12, 0, 0));
    fs.writeFileSync(target, "state0");
    const first = await sameSecond.createBackup(target);
    fs.writeFileSync(target, "state1");
    const second = await sameSecond.createBackup(target);
    expect(first?.file).toBe("opencode.20260101_120000.auto.bak");
    expect(second?.file).toBe("opencode.20260101_120000_1.auto.bak");
    expect(second?.timestamp).toBe("20260101_120000_1");
    const backups = await sameSecond.listBackups("opencode");
    expect(backups.map(b => b.file)).toEqual([
      "opencode.20260101_120000_1.auto.bak",
      "opencode.20260101_120000.auto.bak",
    ]);
    expect(fs.readFileSync(backups[0].path, "utf-8")).toBe("state1");
    expect(fs.readFileSync(backups[1].path, "utf-8")).toBe("state0");
  });

  it("returns null for a missing source and rejects bad tags", async () => {
    expect(await manager.createBackup(path.join(root, "missing.json"))).toBeNull();
    await expect(manager.createBackup(target, "a b")).rejects.toThrow(/Invalid backup tag "a b"/);
  });

  it("keeps only the newest maxBackups per config", async () => {
    await manager.createBackup(target);
    await manager.createBackup(target);
    await manager.createBackup(target);
    expect((await manager.listBackups("opencode")).map(b => b.timestamp)).toEqual([
      "20260101_120002",
      "20260101_120001",
    ]);
  });

  it("restores over the target after a safety backup", async () => {
    const backup = await manager.createBackup(target);
    fs.writeFileSync(target, "v2");
    const safety = await manager.restoreBackup(backup?.file ?? "", target);
    expect(fs.readFileSync(target, "utf-8")).toBe("v1");
    expect(safety?.tag).toBe("before_restore");
    expect(fs.readFileSync(safety?.path ?? "", "utf-8")).toBe("v2");
  });

  it.skipIf(process.platform === "win32")("restores a missing auth.json with owner-only permissions", async () => {
    const auth = path.join(root, "auth.json");
    fs.writeFileSync(auth, JSON.stringify({ openai: { type: "api", key: "test-secret" } }), { mode: 0o600 });
    fs.chmodSync(auth, 0o600);
    const backup = await manager.createBackup(auth);
    fs.rmSync(auth);
    const safety = await manager.restoreBackup(backup?.file ?? "", auth);
    expect(safety).toBeNull();
    expect(fs.statSync(auth).mode & 0o777).toBe(0o600);
  });

  it("deletes backups and reports unknown ones", async () => {
    const backup = await manager.createBackup(target);
    await manager.deleteBackup(backup?.file ?? "");
    expect(await manager.listBackups()).toEqual([]);
    await expect(manager.deleteBackup("opencode.20200101_000000.auto.bak")).rejects.toThrow(/not found/);
    await expect(manager.findBackup("notes.txt")).rejects.toThrow("Not a backup file name: notes.txt");
  });
});
