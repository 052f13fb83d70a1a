#!/usr/bin/env node
import { readFileSync } from "node:fs";
import {
  basicLogger,
  filteredLogger,
  prefixedLogger,
} from "@sockserve/engine";
import { HELP_TEXT, parseArgs } from "./args.js";
import { type RunningServer, serve } from "./serve.js";

function readVersion(): string {
  const raw: unknown = JSON.parse(
    readFileSync(new URL("../package.json", import.meta.url), "utf8"),
  );
  if (
    raw &&
    typeof raw === "object" &&
    "version" in raw &&
    typeof raw.version === "string"
  ) {
    return raw.version;
  }
  return "unknown";
}

async function main(): Promise<void> {
  const parsed = parseArgs(process.argv.slice(2));
  switch (parsed.kind) {
    case "help":
      console.log(HELP_TEXT);
      return;
    case "version":
      console.log(readVersion());
      return;
    case "error":
      console.error(parsed.message);
      console.log(HELP_TEXT);
      process.exitCode = 1;
      return;
    case "run":
      break;
  }

  const args = parsed.options;
  const logger = filteredLogger(
    args.logLevel,
    prefixedLogger("sockserve", basicLogger()),
  );

  let running: RunningServer;
  try {
    running = await serve(args, logger);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Failed to start server: ${message}`);
    if (
      err &&
      typeof err === "object" &&
      "code" in err &&
      err.code === "EADDRINUSE"
    ) {
      console.error(`Is port ${args.port} already in use?`);
    }
    process.exit(1);
  }
  const { server, port, config } = running;

  const url = `http://${config.host === "0.0.0.0" ? "localhost" : config.host}:${port}`;
  console.log(`\n  sockserve serving ${server.state.rootDirectory}\n`);
  console.log(`  Local:   ${url}`);
  if (config.host === "0.0.0.0") {
    console.log(`  Network: http://0.0.0.0:${port}`);
  }
  console.log("\n  Press Ctrl+C to stop\n");

  let stopping = false;
  const shutdown = async () => {
    if (stopping) {
      process.exit(1);
    }
    stopping = true;
    console.log("\nShutting down...");
    await server.stop();
    await server.idle();
    console.log("Server stopped.");
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      console.error("Error during shutdown:", err);
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
