import {
  createRequestLineReader,
  parseRequestLine,
} from "../http/request-parser.js";
import type { ResponseBuilder } from "../http/response-builder.js";
import { sendResponse } from "../http/response-writer.js";
import type { HttpRequest, HttpResponse, HttpStatus } from "../http/types.js";
import type { ITcpSocket } from "../interfaces/socket.js";
import type { Logger } from "../logging/logger.js";
import { PathResolutionError, type PathResolver } from "./path-resolver.js";

export type ConnectionState =
  | "connected"
  | "reading"
  | "parsed"
  | "resolved"
  | "responding"
  | "closed";

export interface ConnectionContext {
  resolver: PathResolver;
  responses: ResponseBuilder;
  logger: Logger;
  maxRequestBytes: number;
  serverSignature: string;
  quiet: boolean;
}

/** What happened on a finished connection. */
export interface ConnectionOutcome {
  request: HttpRequest | null;
  /** Status of the response sent or attempted; null after an empty read. */
  statusCode: number | null;
}

/**
 * Owns one accepted socket from first byte to close: read the request line,
 * resolve it, write exactly one response, release the socket.
 */
export class ConnectionHandler {
  private _state: ConnectionState = "connected";
  private request: HttpRequest | null = null;
  private statusCode: number | null = null;

  constructor(
    private readonly socket: ITcpSocket,
    private readonly context: ConnectionContext,
  ) {}

  get state(): ConnectionState {
    return this._state;
  }

  async run(): Promise<ConnectionOutcome> {
    // Attach listeners before the first await so no data is missed.
    const reader = createRequestLineReader(this.socket, {
      maxRequestBytes: this.context.maxRequestBytes,
    });

    try {
      this._state = "reading";
      const chunk = await reader.read();
      if (chunk.data.length === 0) {
        this.context.logger.debug(
          `Connection from ${this.peer()} closed without sending a request`,
        );
        return this.outcome();
      }

      const response = await this.respondTo(chunk.data, chunk.truncated);
      await this.respond(response);
    } catch (err) {
      await this.fail(err);
    } finally {
      this.close();
    }

    return this.outcome();
  }

  private async respondTo(
    data: Uint8Array,
    truncated: boolean,
  ): Promise<HttpResponse> {
    const { responses, resolver } = this.context;

    const request = parseRequestLine(data, { truncated });
    this._state = "parsed";
    this.request = request;
    if (!request || !request.wellFormed) {
      return responses.buildError(400);
    }

    try {
      const target = await resolver.resolve(request);
      this._state = "resolved";
      return await responses.buildSuccess(
        target.absolutePath,
        target.contentType,
      );
    } catch (err) {
      if (!(err instanceof PathResolutionError)) {
        throw err;
      }
      this.context.logger.debug(err.message);
      return responses.buildError(classifyResolutionFailure(err));
    }
  }

  private async respond(response: HttpResponse): Promise<void> {
    this._state = "responding";
    this.statusCode = response.statusCode;
    this.logAccess(response.statusCode);
    await sendResponse(this.socket, response, {
      server: this.context.serverSignature,
    });
  }

  /** Last-chance 500 for anything that escaped the pipeline. */
  private async fail(err: unknown): Promise<void> {
    this.context.logger.error(
      `Error handling connection from ${this.peer()}:`,
      err,
    );
    if (this._state === "responding") {
      // The response was already on its way; the write itself failed.
      return;
    }
    try {
      await this.respond(this.context.responses.buildError(500));
    } catch (writeErr) {
      this.context.logger.debug("Could not send error response:", writeErr);
    }
  }

  private close(): void {
    if (this._state === "closed") return;
    this._state = "closed";
    try {
      this.socket.close();
    } catch (err) {
      this.context.logger.debug("Socket close failed:", err);
    }
  }

  private logAccess(statusCode: number): void {
    if (this.context.quiet) return;
    const method = this.request?.method || "-";
    const target = this.request?.target || "-";
    this.context.logger.info(
      `${method} ${target} ${statusCode} - ${this.peer()}`,
    );
  }

  private peer(): string {
    return this.socket.remoteAddress ?? "?";
  }

  private outcome(): ConnectionOutcome {
    return { request: this.request, statusCode: this.statusCode };
  }
}

export function classifyResolutionFailure(
  err: PathResolutionError,
): HttpStatus {
  switch (err.code) {
    case "METHOD_NOT_ALLOWED":
      return 405;
    case "TRAVERSAL":
    case "TYPE_NOT_ALLOWED":
      return 403;
    case "NOT_FOUND":
      return 404;
  }
}
