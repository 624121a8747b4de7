/**
 * compaction command - context compaction settings
 *
 * Usage:
 *   ocfg compaction
 *   ocfg compaction --auto off --prune on
 */

import { Command, InvalidArgumentError } from "commander";
import { getCompaction, setCompaction } from "../core/rules-manager.js";
import { printJson, runAction } from "./command-runner.js";

export function parseSwitch(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (["on", "true", "yes", "1"].includes(normalized)) return true;
  if (["off", "false", "no", "0"].includes(normalized)) return false;
  throw new InvalidArgumentError("Use on or off.");
}

export const compactionCommand = new Command("compaction")
  .description("Show or change context compaction (auto, prune)")
  .option("--auto <on|off>", "Compact automatically when the context is full", parseSwitch)
  .option("--prune <on|off>", "Prune old tool output", parseSwitch)
  .action(async (opts: { auto?: boolean; prune?: boolean }, command: Command) => {
    await runAction(command, "updating compaction", async (run) => {
      const changing = opts.auto !== undefined || opts.prune !== undefined;
      const doc = changing
        ? await run.ctx.store.edit("opencode", d => {
            setCompaction(d, opts);
            return d;
          })
        : await run.ctx.store.load("opencode");
      const current = getCompaction(doc);
      if (changing) run.log.info({ scope: "compaction", op: "set", msg: "Updated compaction", data: current });
      if (run.json) printJson(current);
      else console.log(`auto: ${current.auto ? "on" : "off"}\nprune: ${current.prune ? "on" : "off"}`);
    });
  });
