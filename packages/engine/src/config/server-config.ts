export interface ServerConfig {
  /** Port to listen on. 0 picks an ephemeral port. Default: 8080 */
  port: number;
  /** Host/IP to bind. Default: '0.0.0.0' (all interfaces) */
  host: string;
  /** Root directory to serve. Resolved to an absolute path at startup. */
  root: string;
  /** Suppress per-request access logging. Default: false */
  quiet: boolean;
  /**
   * Upper bound on the bytes collected for the request line. A line that
   * does not end within this many bytes is answered with 400. Default: 4096
   */
  maxRequestBytes: number;
  /** Extra extension → content-type entries, merged over the built-ins. */
  mimeTypes: Record<string, string>;
  /** Name shown in the `server` header and on error pages. */
  serverSignature: string;
  /**
   * Compare paths against the root case-insensitively. Defaults to true on
   * platforms whose file systems usually ignore case (Windows, macOS).
   */
  caseInsensitivePaths?: boolean;
}

export const DEFAULT_PORT = 8080;
export const DEFAULT_MAX_REQUEST_BYTES = 4096;
export const DEFAULT_SERVER_SIGNATURE = "sockserve";

export function defaultConfig(root: string): ServerConfig {
  return {
    port: DEFAULT_PORT,
    host: "0.0.0.0",
    root,
    quiet: false,
    maxRequestBytes: DEFAULT_MAX_REQUEST_BYTES,
    mimeTypes: {},
    serverSignature: DEFAULT_SERVER_SIGNATURE,
  };
}
