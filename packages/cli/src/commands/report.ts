import { Command } from "commander";
import os from "node:os";
import fs from "node:fs";
import path from "node:path";
import type { LogEntry } from "@ocfg/core";
import { getTracer } from "../core/global-tracer.js";
import type { TraceQueryOptions } from "../core/trace-store.js";
import { APP_VERSION } from "../core/version-checker.js";
import { errorMessage, parseInteger } from "./command-runner.js";

const SINCE_UNITS = { m: 60_000, h: 3_600_000, d: 86_400_000 } as const;

/** "30m", "1h", "7d" relative to `now`, or any date string */
export function parseSince(since: string, now = Date.now()): number {
  const match = since.match(/^(\d+)(m|h|d)$/);
  if (match) {
    const unit = match[2];
    if (unit === "m" || unit === "h" || unit === "d") {
      return now - parseInt(match[1], 10) * SINCE_UNITS[unit];
    }
  }
  const ts = new Date(since).getTime();
  if (Number.isNaN(ts)) throw new Error(`Invalid --since value "${since}": use 30m, 1h, 7d or a date`);
  return ts;
}

export function buildEnvSection(): Record<string, unknown> {
  return {
    _section: "env",
    os: `${os.platform()} ${os.release()}`,
    node: process.version,
    arch: os.arch(),
    ocfg: APP_VERSION,
  };
}

export function buildIssueReport(entries: LogEntry[], env: Record<string, unknown>): string {
  const errors = entries.filter((e) => e.level === "error");
  const warnings = entries.filter((e) => e.level === "warn");
  const title = errors.length > 0
    ? `${errors[0].cmd}: ${errors[0].msg}`
    : "Bug report";

  return `# ${title}

## Problem
<!-- Describe what you were trying to do and what happened instead -->

## Trace (${entries.length} entries, ${errors.length} errors, ${warnings.length} warnings)

\`\`\`jsonl
${entries.slice(0, 30).map((e) => JSON.stringify(e)).join("\n")}
\`\`\`

## Environment
- OS: ${env.os}
- Node: ${env.node}
- Arch: ${env.arch}
- ocfg: ${env.ocfg}

## Additional Context
<!-- Add any other context about the problem here -->
`;
}

export function formatTraceTable(entries: LogEntry[]): string {
  const lines = [
    `${"TIME".padEnd(24)} ${"LEVEL".padEnd(6)} ${"CMD".padEnd(10)} ${"SCOPE".padEnd(10)} ${"ITEM".padEnd(20)} MSG`,
    "─".repeat(100),
  ];
  for (const e of entries) {
    const time = new Date(e.ts).toISOString().slice(0, 23);
    lines.push(`${time.padEnd(24)} ${e.level.padEnd(6)} ${e.cmd.padEnd(10)} ${e.scope.padEnd(10)} ${(e.item ?? "-").padEnd(20)} ${e.msg}`);
  }
  return lines.join("\n");
}

interface ReportOptions {
  scope?: string;
  item?: string;
  cmd?: string;
  level?: string;
  source?: string;
  trace?: string;
  project?: string;
  since: string;
  limit: number;
  format: string;
  full: boolean;
  output?: string;
  issue: boolean;
}

export const reportCommand = new Command("report")
  .description("Query trace logs and generate bug reports")
  .option("--scope <scope>", "Filter by scope (provider, model, mcp, agent, auth, skill, backup, ...)")
  .option("--item <item>", "Filter by item name")
  .option("--cmd <cmd>", "Filter by command")
  .option("--level <level>", "Filter by log level (debug, info, warn, error)")
  .option("--source <source>", "Filter by item source")
  .option("--trace <traceId>", "Filter by trace ID")
  .option("--project <project>", "Filter by project directory")
  .option("--since <time>", "Time filter: 1h, 30m, 7d, or ISO date", "1h")
  .option("--limit <n>", "Max entries to return", parseInteger, 100)
  .option("--format <fmt>", "Output format: jsonl, table, json", "jsonl")
  .option("--full", "Include env context section", false)
  .option("--output <path>", "Write report to file instead of stdout")
  .option("--issue", "Generate a markdown bug report", false)
  .action((opts: ReportOptions) => {
    try {
      const tracer = getTracer();
      const query: TraceQueryOptions = {
        scope: opts.scope,
        item: opts.item,
        cmd: opts.cmd,
        level: opts.level,
        source: opts.source,
        traceId: opts.trace,
        project: opts.project,
        since: parseSince(opts.since),
        limit: opts.limit,
      };

      const entries = tracer.query(query);

      if (opts.issue) {
        const report = buildIssueReport(entries, buildEnvSection());
        const reportPath = opts.output ?? path.join(os.tmpdir(), `ocfg-report-${Date.now()}.md`);
        fs.writeFileSync(reportPath, report);
        console.log(`✓ Report saved to: ${reportPath}`);
        console.log("  Review it for sensitive data before sharing.");
        return;
      }

      let output: string;
      if (opts.format === "table") {
        output = formatTraceTable(entries);
      } else if (opts.format === "json") {
        output = JSON.stringify(entries, null, 2);
      } else {
        const lines = entries.map((e) => JSON.stringify({ _section: "trace", ...e }));
        if (opts.full) lines.push(JSON.stringify(buildEnvSection()));
        output = lines.join("\n");
      }

      if (opts.output) {
        fs.writeFileSync(opts.output, output + "\n");
        console.log(`Report written to ${opts.output}`);
      } else {
        process.stdout.write(output + "\n");
      }
    } catch (error) {
      console.error(`Error generating report: ${errorMessage(error)}`);
      process.exit(1);
    }
  });
