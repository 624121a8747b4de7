/**
 * Shared plumbing for ocfg subcommands: global options, the app context,
 * trace logging and the error exit.
 */

import { Command, InvalidArgumentError } from "commander";
import { isConfigError } from "@ocfg/core";
import { createContext, type AppContext } from "../core/context.js";
import { getTracer } from "../core/global-tracer.js";
import { hasModelRef } from "../core/model-registry.js";
import type { TraceLogger } from "../core/tracer.js";

// ============================================================================
// Types
// ============================================================================

export interface GlobalOptions {
  project?: string;
  json: boolean;
  debug: boolean;
}

export interface CommandRun {
  ctx: AppContext;
  log: TraceLogger;
  json: boolean;
}

// ============================================================================
// Options
// ============================================================================

export function globalOptions(command: Command): GlobalOptions {
  const opts = command.optsWithGlobals();
  return {
    project: typeof opts.dir === "string" ? opts.dir : undefined,
    json: opts.json === true,
    debug: opts.debug === true,
  };
}

/** "ocfg provider add" -> "provider add" */
export function commandPath(command: Command): string {
  const names: string[] = [];
  for (let current: Command | null = command; current?.parent; current = current.parent) {
    names.unshift(current.name());
  }
  return names.join(" ") || command.name();
}

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) throw new InvalidArgumentError("Not an integer.");
  return parsed;
}

export function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed)) throw new InvalidArgumentError("Not a number.");
  return parsed;
}

/** Repeatable `--env KEY=VALUE` style options */
export function collectPairs(value: string, previous: Record<string, string> = {}): Record<string, string> {
  const eq = value.indexOf("=");
  if (eq <= 0) throw new InvalidArgumentError(`Expected KEY=VALUE, got "${value}".`);
  return { ...previous, [value.slice(0, eq)]: value.slice(eq + 1) };
}

/** Repeatable options collected into a list */
export function collectList(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

// ============================================================================
// Output
// ============================================================================

/** Left-aligned columns separated by two spaces */
export function formatTable(headers: string[], rows: string[][]): string {
  const widths = headers.map((h, i) => Math.max(h.length, ...rows.map(r => (r[i] ?? "").length)));
  const line = (cells: string[]) =>
    cells
      .map((c, i) => (i === cells.length - 1 ? c : c.padEnd(widths[i])))
      .join("  ")
      .trimEnd();
  return [line(headers), line(widths.map(w => "─".repeat(w))), ...rows.map(line)].join("\n");
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

/** Print a list as JSON, a table, or `empty` when there is nothing to show */
export function printList<T>(
  run: Pick<CommandRun, "json">,
  items: T[],
  empty: string,
  headers: string[],
  toRow: (item: T) => string[],
): void {
  if (run.json) {
    printJson(items);
    return;
  }
  if (items.length === 0) {
    console.log(empty);
    return;
  }
  console.log(formatTable(headers, items.map(toRow)));
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Runner
// ============================================================================

/**
 * Run a subcommand action with a loaded context and a trace. Failures print
 * `Error <doing>: <message>`, are logged and exit with status 1.
 */
export async function runAction(
  command: Command,
  doing: string,
  action: (run: CommandRun) => Promise<void>,
): Promise<void> {
  const globals = globalOptions(command);
  const tracer = getTracer();
  if (globals.debug) tracer.setDebugMode(true);
  const cmd = commandPath(command);
  const log = tracer.createTrace(cmd.split(" ")[0]);
  const start = Date.now();

  try {
    const ctx = await createContext({ projectDir: globals.project });
    if (ctx.settingsError) {
      console.warn(`Warning: ${ctx.settingsPath} ignored: ${ctx.settingsError}`);
      log.warn({ scope: "settings", op: "load", path: ctx.settingsPath, msg: ctx.settingsError });
    }
    log.debug({ scope: "cli", op: cmd, msg: `Running ${cmd}`, project: ctx.paths.projectDir });
    await action({ ctx, log, json: globals.json });
    log.info({ scope: "cli", op: cmd, msg: `Finished ${doing}`, dur: Date.now() - start });
  } catch (error) {
    const message = errorMessage(error);
    console.error(`Error ${doing}: ${message}`);
    log.error({
      scope: "cli",
      op: cmd,
      msg: message,
      error: isConfigError(error) ? error.code : message,
      dur: Date.now() - start,
    });
    process.exit(1);
  }
}

/** An unknown provider/model ref is still saved; this only warns about it */
export async function warnUnknownModel(run: CommandRun, scope: string, ref: string | undefined): Promise<void> {
  if (!ref) return;
  if (hasModelRef(await run.ctx.store.load("opencode"), ref)) return;
  console.warn(`Warning: ${ref} is not a model in opencode.json or a native provider`);
  run.log.warn({ scope, op: "model-check", item: ref, msg: "Unknown model reference" });
}
