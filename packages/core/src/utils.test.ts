/**
 * Tests for utility functions
 */

import { describe, it, expect } from "vitest";
import * as os from "node:os";

describe("expandPath", () => {
  it("expands ~ to home directory", async () => {
    const { expandPath } = await import("./utils.js");
    const home = os.homedir();
    expect(expandPath("~/.config/opencode")).toBe(`${home}/.config/opencode`);
  });

  it("leaves absolute paths unchanged", async () => {
    const { expandPath } = await import("./utils.js");
    expect(expandPath("/absolute/path")).toBe("/absolute/path");
  });

  it("leaves relative paths unchanged", async () => {
    const { expandPath } = await import("./utils.js");
    expect(expandPath("relative/path")).toBe("relative/path");
  });
});

describe("contractPath", () => {
  it("contracts home directory to ~", async () => {
    const { contractPath } = await import("./utils.js");
    const home = os.homedir();
    expect(contractPath(`${home}/.config/opencode`)).toBe("~/.config/opencode");
  });

  it("leaves paths outside home unchanged", async () => {
    const { contractPath } = await import("./utils.js");
    expect(contractPath("/var/log")).toBe("/var/log");
  });
});

describe("getAppHome", () => {
  it("returns ~/.ocfg expanded", async () => {
    const { getAppHome } = await import("./utils.js");
    expect(getAppHome()).toBe(`${os.homedir()}/.ocfg`);
  });
});

describe("isPlainObject", () => {
  it("accepts objects and rejects arrays, null and primitives", async () => {
    const { isPlainObject } = await import("./utils.js");
    expect(isPlainObject({ a: 1 })).toBe(true);
    expect(isPlainObject([])).toBe(false);
    expect(isPlainObject(null)).toBe(false);
    expect(isPlainObject("provider")).toBe(false);
  });
});

describe("isEnvReference", () => {
  it("recognizes both reference styles", async () => {
    const { isEnvReference } = await import("./utils.js");
    expect(isEnvReference("{env:ANTHROPIC_API_KEY}")).toBe(true);
    expect(isEnvReference("${OPENAI_API_KEY}")).toBe(true);
    expect(isEnvReference("sk-test-secret")).toBe(false);
    expect(isEnvReference("prefix {env:A}")).toBe(false);
  });
});

describe("roundTo", () => {
  it("rounds to one decimal", async () => {
    const { roundTo } = await import("./utils.js");
    expect(roundTo(0.74, 1)).toBe(0.7);
    expect(roundTo(0.25, 1)).toBe(0.3);
    expect(roundTo(1, 1)).toBe(1);
  });
});

describe("splitCommand", () => {
  it("splits on whitespace and keeps quoted words together", async () => {
    const { splitCommand } = await import("./utils.js");
    expect(splitCommand("  npx -y  @scope/server ")).toEqual(["npx", "-y", "@scope/server"]);
    expect(splitCommand(`node "my server.js" --name 'a b' ""`)).toEqual(["node", "my server.js", "--name", "a b", ""]);
    expect(splitCommand("")).toEqual([]);
  });
});

describe("formatStatus", () => {
  it("formats configured status with green color", async () => {
    const { formatStatus } = await import("./utils.js");
    const result = formatStatus("configured");
    expect(result).toContain("configured");
    expect(result).toContain("\u001b[32m");
  });

  it("formats env status with yellow color", async () => {
    const { formatStatus } = await import("./utils.js");
    const result = formatStatus("env");
    expect(result).toContain("env");
    expect(result).toContain("\u001b[33m");
  });

  it("formats none status with gray color", async () => {
    const { formatStatus } = await import("./utils.js");
    const result = formatStatus("none");
    expect(result).toContain("none");
    expect(result).toContain("\u001b[90m");
  });
});

describe("pathExists", () => {
  it("returns true for existing paths", async () => {
    const { pathExists } = await import("./utils.js");
    expect(await pathExists("/")).toBe(true);
  });

  it("returns false for non-existing paths", async () => {
    const { pathExists } = await import("./utils.js");
    expect(await pathExists("/nonexistent/path/12345")).toBe(false);
  });
});

