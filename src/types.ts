import type { ErrorInfo } from "./errors.js";

/** Protocol versions a header may declare */
export const PROTOCOL_VERSIONS = ["0.2", "0.3"] as const;
export type ProtocolVersion = (typeof PROTOCOL_VERSIONS)[number];

/** Version stamped on new headers unless configured otherwise */
export const DEFAULT_PROTOCOL_VERSION: ProtocolVersion = "0.3";

/** Message types understood by the default registry */
export const BUILTIN_MESSAGE_TYPES = [
  "connect_request",
  "connect_reply",
  "execute_request",
  "execute_reply",
] as const;
export type BuiltinMessageType = (typeof BUILTIN_MESSAGE_TYPES)[number];

/** Outcome of an execution, as reported in `execute_reply` */
export type ExecuteStatus = "ok" | "error" | "abort";

/** Identity and routing section of every envelope */
export interface Header<T extends string = string> {
  readonly msg_id: string;
  readonly session: string;
  /** ISO 8601 creation time */
  readonly date: string;
  readonly source: string;
  readonly target: string;
  readonly msg_type: T;
  readonly version: ProtocolVersion;
}

/** Full message unit exchanged between plugins */
export interface Envelope<
  T extends string = string,
  C extends Record<string, unknown> = Record<string, unknown>,
> {
  readonly header: Header<T>;
  /** Header of the message being replied to */
  readonly parent_header?: Header;
  readonly metadata?: Record<string, unknown>;
  readonly content?: C;
}

/** Data fragment produced by the content codec */
export interface ContentFragment {
  data?: unknown;
  metadata?: { mime_type: string };
}

/** Endpoint address advertised in a `connect_reply` */
export interface SocketAddress {
  uri: string;
  port: number;
}

export interface ConnectReplyContent extends Record<string, unknown> {
  command: SocketAddress & { name: string };
  publish: SocketAddress;
}

export interface ExecuteRequestContent extends Record<string, unknown> {
  command: string;
  silent: boolean;
  stop_on_error: boolean;
  data?: unknown;
  metadata?: Record<string, unknown>;
}

export interface ExecuteReplyContent extends Record<string, unknown> {
  command: string;
  status: ExecuteStatus;
  execution_count: number;
  data?: unknown;
  metadata?: Record<string, unknown>;
  error?: string | ErrorInfo;
}

export type ConnectRequestMessage = Envelope<"connect_request">;
export type ConnectReplyMessage = Envelope<"connect_reply", ConnectReplyContent> & {
  readonly parent_header: Header;
  readonly content: ConnectReplyContent;
};
export type ExecuteRequestMessage = Envelope<"execute_request", ExecuteRequestContent> & {
  readonly content: ExecuteRequestContent;
};
export type ExecuteReplyMessage = Envelope<"execute_reply", ExecuteReplyContent> & {
  readonly parent_header: Header;
  readonly content: ExecuteReplyContent;
};
