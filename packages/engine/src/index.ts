// Node adapters
export {
  NodeFileHandle,
  NodeFileSystem,
  NodeSocketFactory,
  NodeTcpServer,
  NodeTcpSocket,
} from "./adapters/node/index.js";
// Config
export type { ServerConfig } from "./config/server-config.js";
export {
  DEFAULT_MAX_REQUEST_BYTES,
  DEFAULT_PORT,
  DEFAULT_SERVER_SIGNATURE,
  defaultConfig,
} from "./config/server-config.js";
// HTTP
export type {
  ParseRequestLineOptions,
  RequestChunk,
  RequestLineReaderOptions,
} from "./http/request-parser.js";
export {
  createRequestLineReader,
  HttpRequestParseError,
  parseRequestLine,
  RequestLineReader,
} from "./http/request-parser.js";
export type { ResponseBuilderOptions } from "./http/response-builder.js";
export {
  ERROR_CONTENT_TYPE,
  renderErrorPage,
  ResponseBuilder,
} from "./http/response-builder.js";
export { sendResponse, serializeResponse } from "./http/response-writer.js";
export type { HttpRequest, HttpResponse, HttpStatus } from "./http/types.js";
export { STATUS_TEXT } from "./http/types.js";
// Interfaces
export type {
  IFileHandle,
  IFileStat,
  IFileSystem,
} from "./interfaces/filesystem.js";
export type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "./interfaces/socket.js";
// Logging
export type { Logger, LogLevel } from "./logging/logger.js";
export {
  basicLogger,
  filteredLogger,
  isLogLevel,
  LOG_LEVELS,
  prefixedLogger,
  silentLogger,
} from "./logging/logger.js";
// Presets
export type { NodeServerOptions } from "./presets/node.js";
export { createNodeServer } from "./presets/node.js";
// Server
export type {
  ConnectionContext,
  ConnectionOutcome,
  ConnectionState,
} from "./server/connection-handler.js";
export {
  ConnectionHandler,
  classifyResolutionFailure,
} from "./server/connection-handler.js";
export { MimeRegistry } from "./server/mime-registry.js";
export type {
  PathResolutionErrorCode,
  PathResolverOptions,
  ResolvedTarget,
} from "./server/path-resolver.js";
export { PathResolutionError, PathResolver } from "./server/path-resolver.js";
export type {
  ServerState,
  WebServerEvents,
  WebServerOptions,
} from "./server/web-server.js";
export { WebServer } from "./server/web-server.js";
// Utils
export { concat, decodeToString, fromString } from "./utils/buffer.js";
export type { EventMap } from "./utils/event-emitter.js";
export { EventEmitter } from "./utils/event-emitter.js";
