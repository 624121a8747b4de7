export type ConfigErrorCode = "duplicate" | "not_found" | "invalid";

/**
 * A user-correctable problem with a requested config edit.
 * I/O failures are not wrapped and propagate as-is.
 */
export class ConfigError extends Error {
  readonly code: ConfigErrorCode;

  constructor(code: ConfigErrorCode, message: string) {
    super(message);
    this.name = "ConfigError";
    this.code = code;
  }
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}
