import { getDefaultCodec, type ContentCodec } from "./codec.js";
import {
  SchemaValidationError,
  UnknownMessageTypeError,
  type ValidationIssue,
} from "./errors.js";
import { getLogger } from "./logger.js";
import { getDefaultRegistry, type MessageRegistry } from "./registry.js";
import type { Envelope } from "./types.js";

/** Outcome of a non-throwing validation */
export type ValidationResult =
  | { ok: true; envelope: Envelope }
  | { ok: false; error: SchemaValidationError };

function toIssues(
  issues: readonly { path: readonly PropertyKey[]; message: string }[]
): ValidationIssue[] {
  return issues.map((i) => ({
    path: i.path.map(String).join("."),
    message: i.message,
  }));
}

function describeIssues(issues: ValidationIssue[]): string {
  return issues
    .map((i) => (i.path ? `${i.path}: ${i.message}` : i.message))
    .join("; ");
}

/** The declared `header.msg_type`, if the envelope carries one as a string */
function declaredType(envelope: unknown): string | undefined {
  if (typeof envelope !== "object" || envelope === null) return undefined;
  if (!("header" in envelope)) return undefined;
  const header = envelope.header;
  if (typeof header !== "object" || header === null) return undefined;
  if (!("msg_type" in header)) return undefined;
  return typeof header.msg_type === "string" ? header.msg_type : undefined;
}

/** `value` conforms once `result`, a parse of `value`, has succeeded */
function parsed(value: unknown, result: { success: boolean }): value is Envelope {
  return result.success;
}

function reject(error: SchemaValidationError, msgType: string | undefined): ValidationResult {
  getLogger().debug(
    { component: "validator", msgType, code: error.code, issues: error.issues.length },
    "Message rejected"
  );
  return { ok: false, error };
}

/**
 * Check an envelope against the base schema and then against the schema of
 * its declared message type.
 *
 * The base schema is always checked first, so malformed envelopes are
 * rejected before a type lookup is attempted.
 */
export function safeValidate(
  envelope: unknown,
  registry: MessageRegistry = getDefaultRegistry()
): ValidationResult {
  const msgType = declaredType(envelope);

  const base = registry.baseSchema.safeParse(envelope);
  if (!base.success) {
    const issues = toIssues(base.error.issues);
    const onlyTypeIsWrong =
      msgType !== undefined &&
      !registry.has(msgType) &&
      issues.every((i) => i.path === "header.msg_type");
    return reject(
      onlyTypeIsWrong
        ? new UnknownMessageTypeError(msgType, issues)
        : new SchemaValidationError(
            `Invalid message envelope: ${describeIssues(issues)}`,
            issues
          ),
      msgType
    );
  }

  const type = base.data.header.msg_type;
  const schema = registry.getSchema(type);
  if (!schema) {
    return reject(new UnknownMessageTypeError(type), type);
  }

  const typed = schema.safeParse(envelope);
  // zod parses into a copy; hand back the caller's object itself
  if (typed.success && parsed(envelope, typed)) return { ok: true, envelope };

  const issues = toIssues(typed.error?.issues ?? []);
  return reject(
    new SchemaValidationError(`Invalid ${type} message: ${describeIssues(issues)}`, issues),
    type
  );
}

/**
 * Validate an envelope, throwing SchemaValidationError when it does not
 * conform. Returns the same envelope object so calls can be chained.
 */
export function validate(
  envelope: unknown,
  registry?: MessageRegistry
): Envelope {
  const result = safeValidate(envelope, registry);
  if (!result.ok) throw result.error;
  return result.envelope;
}

export function isValidMessage(
  value: unknown,
  registry?: MessageRegistry
): value is Envelope {
  return safeValidate(value, registry).ok;
}

export interface DecodeMessageOptions {
  registry?: MessageRegistry;
  codec?: ContentCodec;
}

/**
 * Validate a received envelope, then decode the payload in its content.
 *
 * Throws SchemaValidationError for a non-conforming envelope and
 * RemoteReportedError when the content reports a remote failure.
 */
export function decodeMessageData(
  envelope: unknown,
  options: DecodeMessageOptions = {}
): unknown {
  const message = validate(envelope, options.registry);
  return (options.codec ?? getDefaultCodec()).decode(message.content);
}
