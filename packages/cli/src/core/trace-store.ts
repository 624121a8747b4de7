import Database from "better-sqlite3";
import { z } from "zod";
import type { LogEntry } from "@ocfg/core";

export interface TraceQueryOptions {
  traceId?: string;
  level?: string;
  cmd?: string;
  scope?: string;
  op?: string;
  item?: string;
  itemType?: string;
  source?: string;
  configLevel?: string;
  phase?: string;
  method?: string;
  project?: string;
  since?: number;
  limit?: number;
}

export interface TraceStoreOptions {
  maxRows?: number;
}

const COLUMNS = [
  "ts", "trace_id", "level", "cmd", "scope", "op", "item",
  "item_type", "source", "config_level", "phase", "method",
  "path", "project", "msg", "dur", "error", "data",
] as const;

const optional = z
  .string()
  .nullable()
  .transform(v => v ?? undefined);

const rowSchema = z.object({
  ts: z.number(),
  trace_id: z.string(),
  level: z.enum(["debug", "info", "warn", "error"]),
  cmd: z.string().nullable().transform(v => v ?? ""),
  scope: z.string().nullable().transform(v => v ?? ""),
  op: z.string().nullable().transform(v => v ?? ""),
  item: optional,
  item_type: optional,
  source: optional,
  config_level: optional,
  phase: optional,
  method: optional,
  path: optional,
  project: optional,
  msg: z.string(),
  dur: z.number().nullable().transform(v => v ?? undefined),
  error: optional,
  data: optional,
});

function parseData(raw: string | undefined): Record<string, unknown> | undefined {
  if (!raw) return undefined;
  const value: unknown = JSON.parse(raw);
  return typeof value === "object" && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : undefined;
}

export class TraceStore {
  private db: Database.Database;
  private maxRows: number;
  private insertStmt: Database.Statement;

  constructor(dbPath: string, opts?: TraceStoreOptions) {
    this.maxRows = opts?.maxRows ?? 50_000;
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("synchronous = NORMAL");
    this.init();
    this.insertStmt = this.db.prepare(`
      INSERT INTO events (${COLUMNS.join(", ")})
      VALUES (${COLUMNS.map(() => "?").join(", ")})
    `);
  }

  private init(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS events (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        ts INTEGER NOT NULL,
        trace_id TEXT NOT NULL,
        level TEXT NOT NULL,
        cmd TEXT,
        scope TEXT,
        op TEXT,
        item TEXT,
        item_type TEXT,
        source TEXT,
        config_level TEXT,
        phase TEXT,
        method TEXT,
        path TEXT,
        project TEXT,
        msg TEXT NOT NULL,
        dur INTEGER,
        error TEXT,
        data TEXT
      );
      CREATE INDEX IF NOT EXISTS idx_trace ON events(trace_id);
      CREATE INDEX IF NOT EXISTS idx_level ON events(level);
      CREATE INDEX IF NOT EXISTS idx_cmd ON events(cmd);
      CREATE INDEX IF NOT EXISTS idx_scope ON events(scope);
      CREATE INDEX IF NOT EXISTS idx_item ON events(item);
      CREATE INDEX IF NOT EXISTS idx_ts ON events(ts);
    `);
  }

  insert(entry: LogEntry): void {
    this.insertStmt.run(
      entry.ts,
      entry.traceId,
      entry.level,
      entry.cmd,
      entry.scope,
      entry.op,
      entry.item ?? null,
      entry.itemType ?? null,
      entry.source ?? null,
      entry.configLevel ?? null,
      entry.phase ?? null,
      entry.method ?? null,
      entry.path ?? null,
      entry.project ?? null,
      entry.msg,
      entry.dur ?? null,
      entry.error ?? null,
      entry.data ? JSON.stringify(entry.data) : null,
    );
  }

  query(opts: TraceQueryOptions): LogEntry[] {
    const conditions: string[] = [];
    const params: unknown[] = [];

    const addFilter = (col: string, val: string | undefined) => {
      if (val !== undefined) {
        conditions.push(`${col} = ?`);
        params.push(val);
      }
    };

    addFilter("trace_id", opts.traceId);
    addFilter("level", opts.level);
    addFilter("cmd", opts.cmd);
    addFilter("scope", opts.scope);
    addFilter("op", opts.op);
    addFilter("item", opts.item);
    addFilter("item_type", opts.itemType);
    addFilter("source", opts.source);
    addFilter("config_level", opts.configLevel);
    addFilter("phase", opts.phase);
    addFilter("method", opts.method);
    addFilter("project", opts.project);

    if (opts.since !== undefined) {
      conditions.push("ts >= ?");
      params.push(opts.since);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
    params.push(opts.limit && opts.limit > 0 ? Math.floor(opts.limit) : 500);

    const rows: unknown[] = this.db
      .prepare(`SELECT * FROM events ${where} ORDER BY ts DESC, id DESC LIMIT ?`)
      .all(...params);

    return rows.map(raw => {
      const row = rowSchema.parse(raw);
      return {
        ts: row.ts,
        traceId: row.trace_id,
        level: row.level,
        cmd: row.cmd,
        scope: row.scope,
        op: row.op,
        item: row.item,
        itemType: row.item_type,
        source: row.source,
        configLevel: row.config_level,
        phase: row.phase,
        method: row.method,
        path: row.path,
        project: row.project,
        msg: row.msg,
        dur: row.dur,
        error: row.error,
        data: parseData(row.data),
      };
    });
  }

  exportJsonl(opts: TraceQueryOptions): string {
    const entries = this.query(opts);
    return entries.map((e) => JSON.stringify(e)).join("\n");
  }

  count(): number {
    const row: unknown = this.db.prepare("SELECT COUNT(*) as c FROM events").get();
    return z.object({ c: z.number() }).parse(row).c;
  }

  vacuum(): void {
    const count = this.count();
    if (count > this.maxRows) {
      const deleteCount = count - this.maxRows;
      this.db.prepare("DELETE FROM events WHERE id IN (SELECT id FROM events ORDER BY ts ASC, id ASC LIMIT ?)").run(deleteCount);
    }
  }

  close(): void {
    this.db.close();
  }
}
