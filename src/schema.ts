import { z } from "zod/v4";
import { PROTOCOL_VERSIONS, type Envelope, type Header } from "./types.js";

// Plugin message format, inspired by the Jupyter messaging protocol.

export const UniqueIdSchema = z.string().min(1).describe("Typically UUID");

/** Structured error sub-object, as carried in `execute_reply` content */
export const ErrorInfoSchema = z.looseObject({
  ename: z.string().describe("Exception name, as a string"),
  evalue: z.string().optional().describe("Exception value, as a string"),
  traceback: z
    .array(z.string())
    .optional()
    .describe("The traceback as a list of frames, each represented as a string"),
});

export const ConnectReplyContentSchema = z.looseObject({
  command: z.looseObject({
    uri: z.string(),
    port: z.number().int().nonnegative(),
    name: z.string(),
  }),
  publish: z.looseObject({
    uri: z.string(),
    port: z.number().int().nonnegative(),
  }),
});

export const ExecuteRequestContentSchema = z.looseObject({
  command: z.string().describe("Command to be executed by the target"),
  data: z.unknown().optional().describe("The execution arguments"),
  metadata: z
    .record(z.string(), z.unknown())
    .optional()
    .describe("Describes the encoding of `data`"),
  silent: z
    .boolean()
    .default(false)
    .describe("Signals the plugin to execute as quietly as possible"),
  stop_on_error: z
    .boolean()
    .default(false)
    .describe(
      "If true, an error does not abort the execution queue, so queued requests still run"
    ),
});

export const ExecuteReplyContentSchema = z.looseObject({
  command: z.string().describe("Command executed"),
  status: z.enum(["ok", "error", "abort"]),
  execution_count: z
    .number()
    .int()
    .nonnegative()
    .describe("Execution counter, increased by one with each request"),
  data: z.unknown().optional().describe("The execution result"),
  metadata: z
    .record(z.string(), z.unknown())
    .optional()
    .describe("Describes the encoding of `data`"),
  error: z.union([z.string(), ErrorInfoSchema]).optional(),
});

/**
 * Definitions shared by every message type of one registry. Type-specific
 * schemas reference these instead of redefining them.
 */
export interface SharedDefinitions {
  header: z.ZodType<Header>;
  error: typeof ErrorInfoSchema;
  baseMessage: z.ZodType<Envelope>;
}

/**
 * Build the header and base envelope schemas for a set of message types.
 * The header's `msg_type` enumeration is exactly `messageTypes`.
 */
export function buildSharedDefinitions(
  messageTypes: readonly [string, ...string[]]
): SharedDefinitions {
  const header = z
    .looseObject({
      msg_id: UniqueIdSchema.describe("Typically UUID, unique per message"),
      session: UniqueIdSchema.describe("Typically UUID, unique per session"),
      date: z
        .string()
        .min(1)
        .describe("ISO 8601 timestamp for when the message was created"),
      source: z
        .string()
        .min(1)
        .describe("Identifier of the message source, unique across all plugins"),
      target: z
        .string()
        .min(1)
        .describe("Identifier of the message target, unique across all plugins"),
      msg_type: z
        .enum(messageTypes)
        .describe("All recognized message type strings"),
      version: z
        .enum(PROTOCOL_VERSIONS)
        .describe("The message protocol version"),
    })
    .describe("Message header");

  const baseMessage = z
    .looseObject({
      header,
      parent_header: header
        .optional()
        .describe(
          "In a chain of messages, the header of the parent, so that clients can track where messages come from"
        ),
      metadata: z
        .record(z.string(), z.unknown())
        .optional()
        .describe("Any metadata associated with the message"),
      content: z
        .record(z.string(), z.unknown())
        .optional()
        .describe("The message content, whose structure depends on the message type"),
    })
    .describe("Plugin message envelope");

  return { header, error: ErrorInfoSchema, baseMessage };
}
