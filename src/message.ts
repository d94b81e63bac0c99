import { randomUUID } from "node:crypto";
import { getDefaultCodec, type ContentCodec } from "./codec.js";
import { loadConfig } from "./config.js";
import {
  InvalidReplyError,
  SchemaValidationError,
  type ErrorInfo,
} from "./errors.js";
import { getLogger, type Logger } from "./logger.js";
import { ErrorInfoSchema } from "./schema.js";
import type { MessageRegistry } from "./registry.js";
import type {
  ConnectReplyContent,
  ConnectReplyMessage,
  ConnectRequestMessage,
  Envelope,
  ExecuteReplyContent,
  ExecuteReplyMessage,
  ExecuteRequestContent,
  ExecuteRequestMessage,
  ExecuteStatus,
  Header,
  ProtocolVersion,
} from "./types.js";
import { validate } from "./validate.js";

export interface MessageBuilderOptions {
  /** Version stamped on headers; defaults to PLUGIN_PROTOCOL_VERSION */
  version?: ProtocolVersion;
  codec?: ContentCodec;
  /** Registry built envelopes are validated against */
  registry?: MessageRegistry;
  /**
   * Validate every envelope against the registry before returning it;
   * on by default. Routing fields and execution counts are checked either way.
   */
  validate?: boolean;
  generateId?: () => string;
  now?: () => Date;
  logger?: Logger;
}

export interface ExecuteRequestOptions {
  data?: unknown;
  /** Format for `data`; `null` stores it untouched */
  mimeType?: string | null;
  silent?: boolean;
  stopOnError?: boolean;
}

export interface ExecuteReplyOptions {
  status?: ExecuteStatus;
  /** Failure to report; required when status is "error" */
  error?: unknown;
  data?: unknown;
  mimeType?: string | null;
}

/** Textual or structured form of an error, as stored in `content.error` */
function describeError(error: unknown): string | ErrorInfo {
  const info = ErrorInfoSchema.safeParse(error);
  return info.success ? info.data : String(error);
}

function requireField(field: "source" | "target" | "session", value: string): void {
  if (value.length === 0) {
    const message = `\`${field}\` must be a non-empty string`;
    throw new SchemaValidationError(`Invalid message header: ${message}`, [
      { path: `header.${field}`, message },
    ]);
  }
}

/**
 * Builds envelopes for every built-in message type.
 *
 * Replies are derived from their request: source and target are swapped,
 * the session is kept, and the request header becomes `parent_header`.
 */
export class MessageBuilder {
  private readonly version: ProtocolVersion;
  private readonly codec: ContentCodec;
  private readonly registry: MessageRegistry | undefined;
  private readonly validateOutput: boolean;
  private readonly generateId: () => string;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(options: MessageBuilderOptions = {}) {
    this.version = options.version ?? loadConfig().version;
    this.codec = options.codec ?? getDefaultCodec();
    this.registry = options.registry;
    this.validateOutput = options.validate ?? true;
    this.generateId = options.generateId ?? randomUUID;
    this.now = options.now ?? (() => new Date());
    this.logger = (options.logger ?? getLogger()).child({ component: "message-builder" });
  }

  buildHeader<T extends string>(
    source: string,
    target: string,
    msgType: T,
    session?: string
  ): Header<T> {
    requireField("source", source);
    requireField("target", target);
    if (session !== undefined) requireField("session", session);
    return Object.freeze({
      msg_id: this.generateId(),
      session: session ?? this.generateId(),
      date: this.now().toISOString(),
      source,
      target,
      msg_type: msgType,
      version: this.version,
    });
  }

  buildConnectRequest(source: string, target: string): ConnectRequestMessage {
    return this.finish({
      header: this.buildHeader(source, target, "connect_request"),
    });
  }

  /** `content` is carried verbatim */
  buildConnectReply(
    request: Envelope,
    content: ConnectReplyContent
  ): ConnectReplyMessage {
    return this.finish({
      header: this.replyHeader(request, "connect_reply"),
      parent_header: request.header,
      content,
    });
  }

  buildExecuteRequest(
    source: string,
    target: string,
    command: string,
    options: ExecuteRequestOptions = {}
  ): ExecuteRequestMessage {
    const content: ExecuteRequestContent = {
      command,
      silent: options.silent ?? false,
      stop_on_error: options.stopOnError ?? false,
      ...this.codec.encode(options.data, options.mimeType),
    };
    return this.finish({
      header: this.buildHeader(source, target, "execute_request"),
      content,
    });
  }

  /**
   * Reply to an `execute_request`.
   *
   * A status of "error" must come with an `error`. Any `error` given is
   * stamped on the content, whatever the status.
   */
  buildExecuteReply(
    request: Envelope,
    executionCount: number,
    options: ExecuteReplyOptions = {}
  ): ExecuteReplyMessage {
    const status = options.status ?? "ok";
    const hasError = options.error !== undefined && options.error !== null;
    if (status === "error" && !hasError) {
      throw new InvalidReplyError('If status is "error", `error` must be provided');
    }

    if (!Number.isInteger(executionCount) || executionCount < 0) {
      throw new InvalidReplyError(
        `\`executionCount\` must be a non-negative integer, got ${executionCount}`
      );
    }

    const command = request.content?.["command"];
    if (typeof command !== "string") {
      throw new InvalidReplyError("The request has no command to reply to");
    }

    const content: ExecuteReplyContent = {
      execution_count: executionCount,
      status,
      command,
      ...this.codec.encode(options.data, options.mimeType),
    };
    if (hasError) content.error = describeError(options.error);

    return this.finish({
      header: this.replyHeader(request, "execute_reply"),
      parent_header: request.header,
      content,
    });
  }

  private replyHeader<T extends string>(request: Envelope, msgType: T): Header<T> {
    const { source, target, session } = request.header;
    return this.buildHeader(target, source, msgType, session);
  }

  private finish<M extends Envelope>(message: M): M {
    if (this.validateOutput) validate(message, this.registry);
    this.logger.debug(
      {
        msgId: message.header.msg_id,
        msgType: message.header.msg_type,
        session: message.header.session,
      },
      "Message built"
    );
    Object.freeze(message);
    return message;
  }
}

let defaultBuilder: MessageBuilder | undefined;

function builder(): MessageBuilder {
  defaultBuilder ??= new MessageBuilder();
  return defaultBuilder;
}

export function makeHeader<T extends string>(
  source: string,
  target: string,
  msgType: T,
  session?: string
): Header<T> {
  return builder().buildHeader(source, target, msgType, session);
}

export function makeConnectRequest(
  source: string,
  target: string
): ConnectRequestMessage {
  return builder().buildConnectRequest(source, target);
}

export function makeConnectReply(
  request: Envelope,
  content: ConnectReplyContent
): ConnectReplyMessage {
  return builder().buildConnectReply(request, content);
}

export function makeExecuteRequest(
  source: string,
  target: string,
  command: string,
  options?: ExecuteRequestOptions
): ExecuteRequestMessage {
  return builder().buildExecuteRequest(source, target, command, options);
}

export function makeExecuteReply(
  request: Envelope,
  executionCount: number,
  options?: ExecuteReplyOptions
): ExecuteReplyMessage {
  return builder().buildExecuteReply(request, executionCount, options);
}
