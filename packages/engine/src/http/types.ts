/** A parsed request line. Headers and bodies are never read. */
export interface HttpRequest {
  /** Upper-cased method, e.g. "GET". */
  readonly method: string;
  /** Percent-decoded path, without query string or fragment. */
  readonly target: string;
  /** Version with the "HTTP/" prefix removed; not validated. */
  readonly httpVersion: string;
  /** False when the request line could not be split into its three fields. */
  readonly wellFormed: boolean;
}

export interface HttpResponse {
  readonly statusCode: number;
  readonly statusText: string;
  readonly contentType: string;
  /** UTF-8 text. */
  readonly body: string;
}

export type HttpStatus = 200 | 400 | 403 | 404 | 405 | 500;

export const STATUS_TEXT: Record<HttpStatus, string> = {
  200: "OK",
  400: "Bad Request",
  403: "Forbidden",
  404: "Not Found",
  405: "Method Not Allowed",
  500: "Internal Server Error",
};
