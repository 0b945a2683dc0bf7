// Node adapters
export {
  NodeFileSystem,
  NodeSocketFactory,
  NodeTcpServer,
  NodeTcpSocket,
} from "./adapters/node/index.js";
// Config
export type { ServerConfig } from "./config/server-config.js";
export { defaultConfig } from "./config/server-config.js";
// HTTP
export type {
  Compressor,
  NegotiateCompressionOptions,
  NegotiatedBody,
} from "./http/compression.js";
export {
  gzipBestCompression,
  negotiateCompression,
  parseAcceptEncoding,
} from "./http/compression.js";
export type {
  HttpRequestReadErrorCode,
  ReadRequestOptions,
} from "./http/request-parser.js";
export {
  HttpRequestReadError,
  parseHttpRequest,
  readRequestBytes,
} from "./http/request-parser.js";
export { sendResponse, serializeResponse } from "./http/response-writer.js";
export type { HttpRequest, HttpResponseOptions } from "./http/types.js";
export { STATUS_TEXT } from "./http/types.js";
// Interfaces
export type { IFileSystem } from "./interfaces/filesystem.js";
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
} from "./logging/logger.js";
// Presets
export type { NodeServerOptions } from "./presets/node.js";
export { createNodeServer } from "./presets/node.js";
// Server
export type { FileHandlerOptions } from "./server/file-handler.js";
export { FileHandler } from "./server/file-handler.js";
export {
  echoHandler,
  emptyResponse,
  userAgentHandler,
} from "./server/handlers.js";
export type { RouterOptions } from "./server/router.js";
export { Router } from "./server/router.js";
export type { WebServerEvents, WebServerOptions } from "./server/web-server.js";
export { WebServer } from "./server/web-server.js";
// Testing
export { InMemoryFileSystem } from "./testing/in-memory-filesystem.js";
export {
  InMemorySocketFactory,
  InMemoryTcpSocket,
} from "./testing/in-memory-socket-factory.js";
// Utils
export { concat, decodeToString, fromString } from "./utils/buffer.js";
export { EventEmitter } from "./utils/event-emitter.js";
