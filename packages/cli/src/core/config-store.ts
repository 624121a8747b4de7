/**
 * Config Store: load and save JSON / JSONC config documents
 */
import { parse, printParseErrorCode, type ParseError } from "jsonc-parser";
import { ConfigError, isPlainObject, pathExists, type ConfigDocument, type ConfigKind } from "@ocfg/core";
import type { BackupManager } from "./backup-manager.js";
import type { ConfigPaths } from "./config-paths.js";
import { readFileIfExists, writeFileEnsured } from "./fs-helpers.js";

export interface JsoncParseResult {
  data: ConfigDocument | null;
  errors: string[];
}

function lineColumnAt(text: string, offset: number): string {
  const before = text.slice(0, offset);
  const line = before.split("\n").length;
  const column = offset - before.lastIndexOf("\n");
  return `${line}:${column}`;
}

/**
 * Parse JSON that may carry comments and trailing commas.
 * A document whose root is not an object is treated as unparseable.
 */
export function parseJsonc(text: string): JsoncParseResult {
  const parseErrors: ParseError[] = [];
  const value: unknown = parse(text, parseErrors, { allowTrailingComma: true, disallowComments: false });
  const errors = parseErrors.map(
    e => `${printParseErrorCode(e.error)} at ${lineColumnAt(text, e.offset)}`,
  );
  if (errors.length > 0) return { data: null, errors };
  if (!isPlainObject(value)) return { data: null, errors: ["Root value is not an object"] };
  return { data: value, errors: [] };
}

/** Null when the file is missing or does not parse; for files this tool only reads */
export async function loadJson(filePath: string): Promise<ConfigDocument | null> {
  const content = await readFileIfExists(filePath);
  if (content === null) return null;
  return parseJsonc(content).data;
}

export function serializeJson(data: unknown): string {
  return JSON.stringify(data, null, 2) + "\n";
}

export async function saveJson(filePath: string, data: unknown, mode?: number): Promise<void> {
  await writeFileEnsured(filePath, serializeJson(data), mode);
}

export class ConfigStore {
  constructor(
    private readonly paths: ConfigPaths,
    private readonly backups: BackupManager,
  ) {}

  pathOf(kind: ConfigKind): string {
    return this.paths.configFile(kind);
  }

  /**
   * A missing file loads as an empty document. A file that exists but does not
   * parse is an error, so a later save cannot overwrite it.
   */
  async load(kind: ConfigKind): Promise<ConfigDocument> {
    const filePath = this.pathOf(kind);
    const content = await readFileIfExists(filePath);
    if (content === null) return {};
    const { data, errors } = parseJsonc(content);
    if (!data) {
      throw new ConfigError(
        "invalid",
        `Cannot parse ${filePath}: ${errors.join("; ")}. Fix the file or restore a backup.`,
      );
    }
    return data;
  }

  async save(kind: ConfigKind, doc: ConfigDocument, options: { backup?: boolean } = {}): Promise<string> {
    const filePath = this.pathOf(kind);
    if (options.backup !== false && (await pathExists(filePath))) {
      await this.backups.createBackup(filePath, "auto");
    }
    await saveJson(filePath, doc);
    return filePath;
  }

  /** Load, apply `edit`, save with a backup, and return what `edit` returned */
  async edit<T>(kind: ConfigKind, edit: (doc: ConfigDocument) => T): Promise<T> {
    const doc = await this.load(kind);
    const result = edit(doc);
    await this.save(kind, doc);
    return result;
  }
}
