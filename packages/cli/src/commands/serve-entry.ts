/**
 * Dev-only entry point for `tsx watch`: starts the API server directly from source.
 */
import { createContext } from "../core/context.js";
import { DEFAULT_PORT } from "../core/fs-helpers.js";
import { startServer } from "../server.js";

const port = parseInt(process.env.PORT ?? String(DEFAULT_PORT), 10);
const ctx = await createContext({ projectDir: process.env.OCFG_PROJECT });
const server = startServer(ctx, port);
process.on("SIGINT", () => { server.close(); process.exit(0); });
process.on("SIGTERM", () => { server.close(); process.exit(0); });
