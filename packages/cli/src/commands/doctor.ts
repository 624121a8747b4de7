/**
 * Doctor Command for ocfg
 *
 * Validates opencode.json, oh-my-opencode.json, auth.json and skill folders,
 * and repairs the issues that have a safe default:
 * - Shows a checkmark for passing checks and an X for failing ones
 * - Lists each validator finding under its check
 * - `--fix` applies the automatic fixes to opencode.json (after a backup)
 * - Exits non-zero when a check fails
 */

import { Command } from "commander";
import { autoFix } from "../core/config-validator.js";
import type { AppContext } from "../core/context.js";
import { runAllChecks } from "./health-checks/runner.js";
import { formatDoctorJson, formatDoctorOutput } from "./health-checks/formatter.js";
import { runAction } from "./command-runner.js";
import type { ValidationIssue } from "@ocfg/core";

export interface FixOutcome {
  fixed: ValidationIssue[];
  remaining: ValidationIssue[];
}

/**
 * Apply automatic fixes to opencode.json. Nothing is written when there is
 * nothing to fix.
 */
export async function fixOpenCodeConfig(ctx: Pick<AppContext, "store">): Promise<FixOutcome> {
  const doc = await ctx.store.load("opencode");
  const { config, fixed, remaining } = autoFix(doc);
  if (fixed.length > 0) await ctx.store.save("opencode", config);
  return { fixed, remaining };
}

export const doctorCommand = new Command("doctor")
  .alias("validate")
  .description("Validate the config files and report issues")
  .option("-f, --fix", "Apply automatic fixes to opencode.json")
  .option("--check-updates", "Also check GitHub for a newer ocfg release")
  .action(async (opts: { fix?: boolean; checkUpdates?: boolean }, command: Command) => {
    await runAction(command, "running doctor", async ({ ctx, log, json }) => {
      if (opts.fix) {
        const { fixed } = await fixOpenCodeConfig(ctx);
        log.info({ scope: "validate", op: "fix", msg: `Fixed ${fixed.length} issue(s)`, data: { paths: fixed.map(i => i.path) } });
        if (!json) {
          console.log(fixed.length > 0 ? `Fixed ${fixed.length} issue(s) in opencode.json:` : "Nothing to fix automatically.");
          for (const issue of fixed) console.log(`  - ${issue.path}: ${issue.message}`);
          console.log("");
        }
      }

      const result = await runAllChecks(ctx, { checkUpdates: opts.checkUpdates });
      log.info({ scope: "validate", op: "doctor", msg: `${result.summary.failed} failed, ${result.summary.warnings} warnings`, data: result.summary });
      console.log(json ? formatDoctorJson(result) : formatDoctorOutput(result));

      // Exit with non-zero if checks failed
      if (!result.success) process.exitCode = 1;
    });
  });
