import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { defaultSettings, loadSettings } from "./settings.js";

describe("settings", () => {
  let root: string;
  let file: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "ocfg-settings-"));
    file = path.join(root, "settings.yaml");
  });

  afterEach(() => fs.rmSync(root, { recursive: true, force: true }));

  it("uses defaults when the file is missing", async () => {
    const result = await loadSettings(file);
    expect(result).toEqual({ settings: defaultSettings(), path: file });
    expect(result.settings).toEqual({ maxBackups: 10, port: 3417, updateCheck: { enabled: true } });
  });

  it("reads values from the file", async () => {
    fs.writeFileSync(file, "maxBackups: 4\nopencodeDir: ~/oc\n");
    const { settings, error } = await loadSettings(file);
    expect(error).toBeUndefined();
    expect(settings.maxBackups).toBe(4);
    expect(settings.opencodeDir).toBe("~/oc");
  });

  it("falls back to defaults with an error for bad values", async () => {
    fs.writeFileSync(file, "maxBackups: 0\n");
    const result = await loadSettings(file);
    expect(result.settings.maxBackups).toBe(10);
    expect(result.error).toMatch(/^maxBackups: /);
  });

  it("reports YAML syntax errors", async () => {
    fs.writeFileSync(file, "port: [1\n");
    const result = await loadSettings(file);
    expect(result.error).toMatch(/^Invalid YAML syntax: /);
  });

  it("treats an empty file as defaults", async () => {
    fs.writeFileSync(file, "");
    expect((await loadSettings(file)).settings).toEqual(defaultSettings());
  });
});
