import { describe, it, expect } from "vitest";
import { createLogEntry } from "@ocfg/core";
import { buildEnvSection, buildIssueReport, formatTraceTable, parseSince } from "./report.js";

const NOW = Date.UTC(2026, 5, 1, 12, 0, 0);

describe("parseSince", () => {
  it("converts relative times to timestamps", () => {
    expect(parseSince("1h", NOW)).toBe(NOW - 3_600_000);
    expect(parseSince("30m", NOW)).toBe(NOW - 1_800_000);
    expect(parseSince("7d", NOW)).toBe(NOW - 7 * 86_400_000);
  });

  it("handles absolute dates", () => {
    expect(parseSince("2026-02-10")).toBe(new Date("2026-02-10").getTime());
  });

  it("rejects values it cannot read", () => {
    expect(() => parseSince("yesterday")).toThrow('Invalid --since value "yesterday"');
  });
});

describe("report output", () => {
  const entries = [
    createLogEntry({ ts: NOW, traceId: "t1", level: "info", cmd: "provider", scope: "provider", op: "add", item: "acme", msg: "Added provider acme" }),
    createLogEntry({ ts: NOW + 1, traceId: "t1", level: "error", cmd: "model", scope: "cli", op: "model add", msg: "Provider \"x\" not found" }),
  ];

  it("buildEnvSection describes the runtime", () => {
    const section = buildEnvSection();
    expect(section._section).toBe("env");
    expect(section.node).toBe(process.version);
    expect(section.ocfg).toBe("0.1.0");
  });

  it("titles an issue report after the first error", () => {
    const report = buildIssueReport(entries, { os: "linux 6", node: "v20.0.0", arch: "x64", ocfg: "0.1.0" });
    expect(report.split("\n")[0]).toBe('# model: Provider "x" not found');
    expect(report).toContain("## Trace (2 entries, 1 errors, 0 warnings)");
    expect(report).toContain("- Node: v20.0.0");
  });

  it("falls back to a generic title without errors", () => {
    const report = buildIssueReport(entries.slice(0, 1), {});
    expect(report.split("\n")[0]).toBe("# Bug report");
  });

  it("formats a table row per entry", () => {
    const lines = formatTraceTable(entries).split("\n");
    expect(lines).toHaveLength(4);
    expect(lines[2]).toBe(
      `${"2026-06-01T12:00:00.000".padEnd(24)} ${"info".padEnd(6)} ${"provider".padEnd(10)} ${"provider".padEnd(10)} ${"acme".padEnd(20)} Added provider acme`,
    );
    expect(lines[3]).toContain(`${"-".padEnd(20)} Provider "x" not found`);
  });
});
