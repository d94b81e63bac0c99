// Envelope types
export {
  PROTOCOL_VERSIONS,
  DEFAULT_PROTOCOL_VERSION,
  BUILTIN_MESSAGE_TYPES,
  type ProtocolVersion,
  type BuiltinMessageType,
  type ExecuteStatus,
  type Header,
  type Envelope,
  type ContentFragment,
  type SocketAddress,
  type ConnectReplyContent,
  type ExecuteRequestContent,
  type ExecuteReplyContent,
  type ConnectRequestMessage,
  type ConnectReplyMessage,
  type ExecuteRequestMessage,
  type ExecuteReplyMessage,
} from "./types.js";

// Error handling
export {
  ProtocolError,
  SchemaValidationError,
  UnknownMessageTypeError,
  RemoteReportedError,
  UnsupportedFormatError,
  MalformedContentError,
  InvalidReplyError,
  type ErrorInfo,
  type ValidationIssue,
} from "./errors.js";

// Configuration and logging
export {
  loadConfig,
  ConfigError,
  DEFAULT_MIME_TYPE,
  LOG_LEVELS,
  type LogLevel,
  type ProtocolConfig,
} from "./config.js";
export { createLogger, getLogger, type Logger, type LoggerOptions } from "./logger.js";

// Schemas and registry
export {
  UniqueIdSchema,
  ErrorInfoSchema,
  ConnectReplyContentSchema,
  ExecuteRequestContentSchema,
  ExecuteReplyContentSchema,
  buildSharedDefinitions,
  type SharedDefinitions,
} from "./schema.js";
export {
  MessageRegistry,
  BUILTIN_DEFINITIONS,
  getDefaultRegistry,
  type MessageTypeDefinition,
  type RegistryDocument,
} from "./registry.js";

// Validation
export {
  validate,
  safeValidate,
  isValidMessage,
  decodeMessageData,
  type ValidationResult,
  type DecodeMessageOptions,
} from "./validate.js";

// Content codec
export {
  ContentCodec,
  MimeTypes,
  BUILTIN_FORMATS,
  getDefaultCodec,
  encodeContent,
  decodeContent,
  type ContentFormat,
  type ContentCodecOptions,
} from "./codec.js";

// Message builders
export {
  MessageBuilder,
  makeHeader,
  makeConnectRequest,
  makeConnectReply,
  makeExecuteRequest,
  makeExecuteReply,
  type MessageBuilderOptions,
  type ExecuteRequestOptions,
  type ExecuteReplyOptions,
} from "./message.js";

// Wire format
export { serializeMessage, parseMessage } from "./wire.js";
