import {
  DEFAULT_MAX_REQUEST_BYTES,
  DEFAULT_PORT,
  isLogLevel,
  LOG_LEVELS,
  type LogLevel,
} from "@sockserve/engine";

export const DEFAULT_ROOT = "webroot";

export interface CliOptions {
  root: string;
  port: number;
  host: string;
  quiet: boolean;
  maxRequestBytes: number;
  logLevel: LogLevel;
}

export type ParsedArgs =
  | { kind: "run"; options: CliOptions }
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "error"; message: string };

function parseInteger(value: string | undefined): number | null {
  if (value === undefined || !/^\d+$/.test(value)) {
    return null;
  }
  return Number.parseInt(value, 10);
}

export function parseArgs(args: readonly string[]): ParsedArgs {
  const options: CliOptions = {
    root: DEFAULT_ROOT,
    port: DEFAULT_PORT,
    host: "0.0.0.0",
    quiet: false,
    maxRequestBytes: DEFAULT_MAX_REQUEST_BYTES,
    logLevel: "info",
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];
    if (arg === "--port" || arg === "-p") {
      const port = parseInteger(args[++i]);
      if (port === null || port > 65535) {
        return { kind: "error", message: "Invalid port number" };
      }
      options.port = port;
    } else if (arg === "--host" || arg === "-H") {
      const host = args[++i];
      if (!host) {
        return { kind: "error", message: "Missing value for --host" };
      }
      options.host = host;
    } else if (arg === "--quiet" || arg === "-q") {
      options.quiet = true;
    } else if (arg === "--max-request-bytes") {
      const bytes = parseInteger(args[++i]);
      if (bytes === null || bytes < 16) {
        return {
          kind: "error",
          message: "--max-request-bytes must be an integer of at least 16",
        };
      }
      options.maxRequestBytes = bytes;
    } else if (arg === "--log-level") {
      const level = args[++i] ?? "";
      if (!isLogLevel(level)) {
        return {
          kind: "error",
          message: `--log-level must be one of: ${LOG_LEVELS.join(", ")}`,
        };
      }
      options.logLevel = level;
    } else if (arg === "--version" || arg === "-v") {
      return { kind: "version" };
    } else if (arg === "--help" || arg === "-h") {
      return { kind: "help" };
    } else if (!arg.startsWith("-")) {
      options.root = arg;
    } else {
      return { kind: "error", message: `Unknown option: ${arg}` };
    }
    i++;
  }

  return { kind: "run", options };
}

export const HELP_TEXT = `
sockserve - serve a directory of static files over HTTP/1.x

Usage: sockserve [directory] [options]

  directory                    Root to serve (default: ${DEFAULT_ROOT}).
                               Created with sample pages if missing.

Options:
  --port, -p <port>            Port to listen on (default: ${DEFAULT_PORT})
  --host, -H <host>            Host to bind (default: 0.0.0.0)
  --quiet, -q                  Suppress request logging
  --max-request-bytes <n>      Cap on the request line (default: ${DEFAULT_MAX_REQUEST_BYTES})
  --log-level <level>          debug, info, warn or error (default: info)
  --version, -v                Show version
  --help, -h                   Show this help
`;
