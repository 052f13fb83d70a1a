import { DEFAULT_MAX_REQUEST_BYTES } from "../config/server-config.js";
import type { ITcpSocket } from "../interfaces/socket.js";
import { concat, decodeToString } from "../utils/buffer.js";
import type { HttpRequest } from "./types.js";

const CR = 13;
const LF = 10;

export type HttpRequestParseErrorCode = "MALFORMED_ENCODING";

export class HttpRequestParseError extends Error {
  constructor(
    readonly code: HttpRequestParseErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "HttpRequestParseError";
  }
}

/** Bytes collected from one connection before parsing. */
export interface RequestChunk {
  data: Uint8Array;
  /** The byte cap was reached before any line terminator arrived. */
  truncated: boolean;
}

export interface ParseRequestLineOptions {
  truncated?: boolean;
}

export interface RequestLineReaderOptions {
  maxRequestBytes?: number;
}

const MALFORMED: Omit<HttpRequest, "method"> = {
  target: "",
  httpVersion: "",
  wellFormed: false,
};

function indexOfLineTerminator(buffer: Uint8Array): number {
  for (let i = 0; i < buffer.length; i++) {
    if (buffer[i] === CR || buffer[i] === LF) return i;
  }
  return -1;
}

/**
 * Parse the request line out of the bytes read from a connection.
 * Returns null when nothing was read at all.
 */
export function parseRequestLine(
  bytes: Uint8Array,
  options?: ParseRequestLineOptions,
): HttpRequest | null {
  if (bytes.length === 0) {
    return null;
  }

  const text = decodeToString(bytes);
  const requestLine = text.split(/\r\n|\r|\n/)[0] ?? "";
  const fields = requestLine.split(" ");
  const method = (fields[0] ?? "").toUpperCase();

  if (options?.truncated) {
    return { method, ...MALFORMED };
  }

  const [, rawTarget, rawVersion] = fields;
  if (fields.length < 3 || !method || !rawTarget || !rawVersion) {
    return { method, ...MALFORMED };
  }

  const target = decodeTarget(rawTarget);
  if (!target) {
    return { method, ...MALFORMED };
  }

  const httpVersion = rawVersion.startsWith("HTTP/")
    ? rawVersion.slice("HTTP/".length)
    : rawVersion;

  return { method, target, httpVersion, wellFormed: true };
}

function decodeTarget(rawTarget: string): string {
  const pathPart = rawTarget.split("?")[0].split("#")[0];
  try {
    return decodeURIComponent(pathPart);
  } catch {
    throw new HttpRequestParseError(
      "MALFORMED_ENCODING",
      `Invalid percent-encoding in request target: ${rawTarget}`,
    );
  }
}

/**
 * Collects the bytes of one request from a socket. Data is accumulated across
 * reads until a line terminator shows up, the byte cap is hit, or the peer
 * closes. Nothing times out: a client that never sends keeps the read pending.
 */
export class RequestLineReader {
  private chunks: Uint8Array[] = [];
  private closed = false;
  private done = false;
  private socketError: Error | null = null;
  private waiter: (() => void) | null = null;
  private readonly maxRequestBytes: number;

  constructor(socket: ITcpSocket, options?: RequestLineReaderOptions) {
    this.maxRequestBytes =
      options?.maxRequestBytes ?? DEFAULT_MAX_REQUEST_BYTES;

    socket.onData((data) => {
      if (this.closed || this.done) return;
      this.chunks.push(data);
      this.notify();
    });

    socket.onEnd(() => {
      this.closed = true;
      this.notify();
    });

    socket.onClose(() => {
      this.closed = true;
      this.notify();
    });

    socket.onError((err) => {
      this.socketError = err;
      this.closed = true;
      this.notify();
    });
  }

  /** Collect one request. Data arriving after this resolves is dropped. */
  async read(): Promise<RequestChunk> {
    try {
      return await this.collect();
    } finally {
      this.done = true;
      this.chunks = [];
    }
  }

  private async collect(): Promise<RequestChunk> {
    while (true) {
      const buffer = concat(this.chunks);
      const terminatorAt = indexOfLineTerminator(buffer);

      if (terminatorAt !== -1 && terminatorAt < this.maxRequestBytes) {
        return {
          data: buffer.subarray(0, Math.min(buffer.length, this.maxRequestBytes)),
          truncated: false,
        };
      }

      if (buffer.length >= this.maxRequestBytes) {
        return {
          data: buffer.subarray(0, this.maxRequestBytes),
          truncated: true,
        };
      }

      if (this.socketError) {
        throw this.socketError;
      }

      if (this.closed) {
        return { data: buffer, truncated: false };
      }

      await new Promise<void>((resolve) => {
        this.waiter = resolve;
      });
    }
  }

  private notify(): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.();
  }
}

export function createRequestLineReader(
  socket: ITcpSocket,
  options?: RequestLineReaderOptions,
): RequestLineReader {
  return new RequestLineReader(socket, options);
}
