/**
 * Orchestrates running all doctor health checks.
 */

import type { AppContext } from "../../core/context.js";
import { checkAuthFile, checkConfigFile, checkSettings, checkSkills, checkVersion } from "./config-check.js";
import type { DiagnosticResult, DoctorResult } from "./types.js";

export interface RunChecksOptions {
  /** Query GitHub for a newer release */
  checkUpdates?: boolean;
}

/**
 * Run all diagnostic checks
 */
export async function runAllChecks(ctx: AppContext, options: RunChecksOptions = {}): Promise<DoctorResult> {
  const checks: DiagnosticResult[] = [];

  checks.push(checkSettings(ctx));

  const opencode = await checkConfigFile(ctx, "opencode");
  checks.push(opencode.result);
  // model references in oh-my-opencode.json resolve against opencode.json
  checks.push((await checkConfigFile(ctx, "oh-my-opencode", opencode.doc)).result);

  checks.push(...(await checkAuthFile(ctx)));
  checks.push(await checkSkills(ctx));

  if (options.checkUpdates) {
    const version = await checkVersion(ctx);
    if (version) checks.push(version);
  }

  const summary = {
    passed: checks.filter((c) => c.status === "pass").length,
    failed: checks.filter((c) => c.status === "fail").length,
    warnings: checks.filter((c) => c.status === "warn").length,
  };

  return {
    success: summary.failed === 0,
    checks,
    summary,
  };
}
