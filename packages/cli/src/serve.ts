import * as path from "node:path";
import {
  createNodeServer,
  defaultConfig,
  type Logger,
  type ServerConfig,
  type WebServer,
} from "@sockserve/engine";
import type { CliOptions } from "./args.js";
import { ensureWebRoot } from "./bootstrap.js";

export interface RunningServer {
  server: WebServer;
  port: number;
  config: ServerConfig;
}

export function toServerConfig(options: CliOptions): ServerConfig {
  return {
    ...defaultConfig(path.resolve(options.root)),
    port: options.port,
    host: options.host,
    quiet: options.quiet,
    maxRequestBytes: options.maxRequestBytes,
  };
}

/**
 * Prepare the root and start listening. Rejects when the port cannot be
 * bound; the server is already stopped in that case.
 */
export async function serve(
  options: CliOptions,
  logger: Logger,
  assetsDir?: string,
): Promise<RunningServer> {
  const config = toServerConfig(options);
  await ensureWebRoot(config.root, logger, assetsDir);

  const server = createNodeServer({ config, logger });
  const port = await server.start();
  return { server, port, config };
}
