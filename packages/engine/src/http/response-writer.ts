import type { ITcpSocket } from "../interfaces/socket.js";
import { concat, fromString } from "../utils/buffer.js";
import type { HttpResponse } from "./types.js";

export interface SerializeResponseOptions {
  /** Value of the `server` header. */
  server?: string;
  date?: Date;
}

/**
 * Serialize a response as status line, headers and body. The connection
 * always closes after one response, so `connection: close` is fixed.
 */
export function serializeResponse(
  response: HttpResponse,
  options?: SerializeResponseOptions,
): Uint8Array {
  const body = fromString(response.body);

  const headers = new Map<string, string>();
  headers.set("content-type", response.contentType);
  headers.set("content-length", String(body.length));
  headers.set("connection", "close");
  if (options?.server) {
    headers.set("server", options.server);
  }
  headers.set("date", (options?.date ?? new Date()).toUTCString());

  const headerBytes = buildHeaderBytes(
    response.statusCode,
    response.statusText,
    headers,
  );
  return concat([headerBytes, body]);
}

/**
 * Send a complete response over a socket, waiting for the write to be
 * accepted when the socket supports it.
 */
export async function sendResponse(
  socket: ITcpSocket,
  response: HttpResponse,
  options?: SerializeResponseOptions,
): Promise<void> {
  const data = serializeResponse(response, options);
  if (socket.sendAndWait) {
    await socket.sendAndWait(data);
    return;
  }
  socket.send(data);
}

function buildHeaderBytes(
  status: number,
  statusText: string,
  headers: Map<string, string>,
): Uint8Array {
  const lines: string[] = [`HTTP/1.1 ${status} ${statusText}`];
  for (const [key, value] of headers) {
    lines.push(`${key}: ${value}`);
  }
  lines.push("", ""); // \r\n\r\n
  return fromString(lines.join("\r\n"));
}
