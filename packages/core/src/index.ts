// Config
export {
  ClientSchema,
  DEFAULT_PORT,
  LoggingSchema,
  ServerSchema,
  ServiceConfigSchema,
} from "./config/schema.js";
export type {
  ClientConfig,
  ClientTls,
  LoggingConfig,
  ServerConfig,
  ServerTls,
  ServiceConfig,
} from "./config/types.js";
export { defaultConfig } from "./config/defaults.js";
export { validateConfig, ConfigValidationError } from "./config/validation.js";
export {
  DEFAULT_CONFIG_PATH,
  initializeConfig,
  loadConfig,
  loadConfigOrDefaults,
  parseConfig,
  saveConfig,
} from "./config/loader.js";

// Infrastructure
export {
  createConfiguredLogger,
  createLogger,
  metadataForLog,
} from "./infra/logger.js";
export type { LoggerOptions, LogLevel } from "./infra/logger.js";
export {
  AppError,
  ConfigError,
  InternalError,
  ValidationError,
} from "./infra/errors.js";

// Protocol
export type {
  ConnectionRequest,
  ConnectionRequestBody,
  ConnectionResponse,
  ConnectionResponseBody,
  RequestMetadata,
  RequestSettings,
  ValidConnectionRequest,
} from "./rpc/protocol/types.js";
export {
  CONNECT_METHOD_PATH,
  PROTO_PACKAGE,
  SERVICE_NAME,
} from "./rpc/protocol/types.js";
export {
  ConnectionRequestSchema,
  ConnectionResponseSchema,
  RequestMetadataSchema,
  ValidConnectionRequestSchema,
} from "./rpc/protocol/schema.js";
export {
  decodeConnectionRequest,
  decodeConnectionResponse,
  encodeConnectionRequest,
  encodeConnectionResponse,
  parseConnectionRequest,
  parseConnectionResponse,
  validateConnectionRequest,
} from "./rpc/protocol/codec.js";
export {
  loadConnect4Service,
  PROTO_FILE,
  resolveProtoRoot,
} from "./rpc/protocol/definition.js";
export type { Connect4ServiceDefinition } from "./rpc/protocol/definition.js";

// Server
export { createConnect4Server, buildChannelOptions } from "./rpc/server.js";
export type {
  Connect4ServerInstance,
  Connect4ServerOptions,
} from "./rpc/server.js";
export { toStatusResponse, withRawRequests } from "./rpc/server-grpc.js";
export type {
  CallContext,
  Connect4ServiceHandlers,
  StatusResponse,
  UnaryHandler,
} from "./rpc/server-grpc.js";
export {
  buildConnectionResponse,
  createConnectHandler,
} from "./rpc/server-methods/connect.js";
export { formatListenAddress, isLoopbackAddress, resolveBindHost } from "./rpc/net.js";
export {
  buildChannelCredentials,
  buildServerCredentials,
  readTlsKeyPair,
} from "./rpc/tls.js";

// Client
export { checkDeadlineMs, createConnect4Client, isServiceError } from "./rpc/client.js";
export type {
  Connect4Client,
  Connect4ClientOptions,
  ConnectCallOptions,
} from "./rpc/client.js";
