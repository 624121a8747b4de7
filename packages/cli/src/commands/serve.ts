import { Command } from "commander";
import { startServer } from "../server.js";
import { parseInteger, runAction } from "./command-runner.js";

export const serveCommand = new Command("serve")
  .description("Start the dashboard and its local API")
  .option("-p, --port <port>", "Port number (default: settings port, 3417)", parseInteger)
  .action(async (opts: { port?: number }, command: Command) => {
    await runAction(command, "starting server", async ({ ctx, log }) => {
      const port = opts.port ?? ctx.settings.port;
      const server = startServer(ctx, port);
      log.info({ scope: "serve", op: "start", msg: `Listening on ${port}` });
      server.on("error", (err) => {
        console.error(`Error starting server: ${err.message}`);
        process.exit(1);
      });
      // Prevent Node from exiting
      process.on("SIGINT", () => { server.close(); process.exit(0); });
      process.on("SIGTERM", () => { server.close(); process.exit(0); });
    });
  });
