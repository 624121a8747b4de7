import type { NextFunction, Request, Response } from "express";
import type { z } from "zod";
import { ConfigError, isConfigError, type ConfigErrorCode, type ConfigLocation } from "@ocfg/core";

const STATUS_BY_CODE: Record<ConfigErrorCode, number> = {
  invalid: 400,
  not_found: 404,
  duplicate: 409,
};

/** Validate a JSON body; failures become a 400 */
export function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
    throw new ConfigError("invalid", `Invalid request body: ${detail}`);
  }
  return parsed.data;
}

export function parseLocation(value: unknown): ConfigLocation {
  if (value === undefined || value === "global") return "global";
  if (value === "project") return "project";
  throw new ConfigError("invalid", `Unknown location "${String(value)}": use global or project`);
}

export function queryString(value: unknown): string | undefined {
  return typeof value === "string" && value !== "" ? value : undefined;
}

export function statusForError(error: unknown): number {
  if (isConfigError(error)) return STATUS_BY_CODE[error.code];
  // malformed JSON bodies from express.json()
  if (error instanceof SyntaxError) return 400;
  return 500;
}

/** Error middleware: every failure is `{ error }` with a status from its code */
export function errorHandler(error: unknown, _req: Request, res: Response, _next: NextFunction): void {
  const status = statusForError(error);
  const message = error instanceof Error ? error.message : String(error);
  if (status === 500) console.error(`API error: ${message}`);
  res.status(status).json({ error: message });
}
