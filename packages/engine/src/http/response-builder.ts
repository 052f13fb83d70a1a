import type { IFileSystem } from "../interfaces/filesystem.js";
import type { Logger } from "../logging/logger.js";
import { concat, decodeToString } from "../utils/buffer.js";
import { type HttpResponse, type HttpStatus, STATUS_TEXT } from "./types.js";

export const ERROR_CONTENT_TYPE = "text/html; charset=utf-8";

const READ_CHUNK_SIZE = 64 * 1024;

export interface ResponseBuilderOptions {
  fs: IFileSystem;
  /** Signature line shown at the bottom of error pages. */
  signature: string;
  logger?: Logger;
}

export class ResponseBuilder {
  private readonly fs: IFileSystem;
  private readonly signature: string;
  private readonly logger?: Logger;

  constructor(options: ResponseBuilderOptions) {
    this.fs = options.fs;
    this.signature = options.signature;
    this.logger = options.logger;
  }

  /**
   * Read a resolved file into a 200 response. The file can still vanish
   * between resolution and this read; that becomes a 500.
   */
  async buildSuccess(
    filePath: string,
    contentType: string,
  ): Promise<HttpResponse> {
    let body: string;
    try {
      body = decodeToString(await this.readFile(filePath));
    } catch (err) {
      this.logger?.error(`Failed to read ${filePath}:`, err);
      return this.buildError(500);
    }

    return {
      statusCode: 200,
      statusText: STATUS_TEXT[200],
      contentType,
      body,
    };
  }

  buildError(
    statusCode: HttpStatus,
    statusText: string = STATUS_TEXT[statusCode],
  ): HttpResponse {
    return {
      statusCode,
      statusText,
      contentType: ERROR_CONTENT_TYPE,
      body: renderErrorPage(statusCode, statusText, this.signature),
    };
  }

  private async readFile(filePath: string): Promise<Uint8Array> {
    const handle = await this.fs.open(filePath);
    try {
      const chunks: Uint8Array[] = [];
      let position = 0;
      while (true) {
        const buffer = new Uint8Array(READ_CHUNK_SIZE);
        const { bytesRead } = await handle.read(
          buffer,
          0,
          buffer.length,
          position,
        );
        if (bytesRead === 0) break;
        chunks.push(buffer.subarray(0, bytesRead));
        position += bytesRead;
      }
      return concat(chunks);
    } finally {
      await handle.close();
    }
  }
}

export function renderErrorPage(
  statusCode: number,
  statusText: string,
  signature: string,
): string {
  const title = `${statusCode} ${escapeHtml(statusText)}`;
  return [
    "<!DOCTYPE html>",
    "<html>",
    `<head><title>${title}</title></head>`,
    "<body>",
    `<h1>${title}</h1>`,
    "<hr>",
    `<p>${escapeHtml(signature)}</p>`,
    "</body>",
    "</html>",
    "",
  ].join("\n");
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}
