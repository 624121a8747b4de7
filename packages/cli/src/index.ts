#!/usr/bin/env node
/**
 * ocfg - OpenCode config manager
 *
 * Edit opencode.json, oh-my-opencode.json and auth.json from the command
 * line or through a local dashboard.
 */

import { Command } from "commander";
import { APP_VERSION } from "./core/version-checker.js";
import { providerCommand } from "./commands/provider.js";
import { modelCommand } from "./commands/model.js";
import { mcpCommand } from "./commands/mcp.js";
import { agentCommand } from "./commands/agent.js";
import { ohMyCommand } from "./commands/ohmy.js";
import { permissionCommand } from "./commands/permission.js";
import { skillCommand } from "./commands/skill.js";
import { rulesCommand } from "./commands/rules.js";
import { compactionCommand } from "./commands/compaction.js";
import { nativeCommand } from "./commands/native.js";
import { backupCommand } from "./commands/backup.js";
import { importCommand } from "./commands/import.js";
import { doctorCommand } from "./commands/doctor.js";
import { statusCommand } from "./commands/status.js";
import { reportCommand } from "./commands/report.js";
import { serveCommand } from "./commands/serve.js";

const program = new Command();

program
  .name("ocfg")
  .description("Manage OpenCode providers, models, MCP servers, agents, permissions and skills")
  .version(APP_VERSION)
  .option("-C, --dir <project>", "Project directory for project-scoped files (default: cwd)")
  .option("--json", "Print machine-readable JSON")
  .option("--debug", "Record debug entries in the trace log");

// Register commands
program.addCommand(statusCommand);
program.addCommand(providerCommand);
program.addCommand(modelCommand);
program.addCommand(mcpCommand);
program.addCommand(agentCommand);
program.addCommand(ohMyCommand);
program.addCommand(permissionCommand);
program.addCommand(skillCommand);
program.addCommand(rulesCommand);
program.addCommand(compactionCommand);
program.addCommand(nativeCommand);
program.addCommand(backupCommand);
program.addCommand(importCommand);
program.addCommand(doctorCommand);
program.addCommand(reportCommand);
program.addCommand(serveCommand);

await program.parseAsync();
