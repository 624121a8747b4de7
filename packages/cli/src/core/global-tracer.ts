import path from "node:path";
import { getAppHome } from "@ocfg/core";
import { Tracer } from "./tracer.js";

export function getTracesDir(): string {
  return path.join(getAppHome(), "traces");
}

let _tracer: Tracer | null = null;

export function getTracer(): Tracer {
  if (!_tracer) {
    const dir = getTracesDir();
    _tracer = new Tracer(path.join(dir, "trace.db"), {
      snapshotDir: path.join(dir, "snapshots"),
      debugMode: process.argv.includes("--debug"),
    });
  }
  return _tracer;
}

export function closeTracer(): void {
  if (_tracer) {
    const tracer = _tracer;
    _tracer = null;
    tracer.vacuum();
    tracer.close();
  }
}

// Prune and close on process exit
process.on("exit", () => {
  try {
    closeTracer();
  } catch (err) {
    process.stderr.write(`trace log not closed: ${err instanceof Error ? err.message : String(err)}\n`);
  }
});
