/** Structured error sub-object carried in `content.error` of a reply */
export interface ErrorInfo {
  ename: string;
  evalue?: string;
  traceback?: string[];
}

/** A single structural problem found while validating an envelope */
export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Base class for every error raised by the protocol layer.
 *
 * `code` is stable and meant for programmatic checks; `message` is for humans.
 */
export class ProtocolError extends Error {
  override name = "ProtocolError";

  constructor(
    public readonly code: string,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
  }
}

/** Envelope does not conform to the base schema or to its message type's schema */
export class SchemaValidationError extends ProtocolError {
  override name = "SchemaValidationError";

  constructor(
    message: string,
    public readonly issues: ValidationIssue[] = [],
    code = "SCHEMA_VALIDATION_FAILED",
  ) {
    super(code, message);
  }
}

/** `header.msg_type` names a type the registry does not know */
export class UnknownMessageTypeError extends SchemaValidationError {
  override name = "UnknownMessageTypeError";

  constructor(
    public readonly msgType: unknown,
    issues: ValidationIssue[] = [],
  ) {
    super(
      `Unknown message type: ${String(msgType)}`,
      issues,
      "UNKNOWN_MESSAGE_TYPE",
    );
  }
}

/**
 * The remote side reported a failure in `content.error`. `remoteError` is
 * the reported value as received: usually a string or an ErrorInfo.
 */
export class RemoteReportedError extends ProtocolError {
  override name = "RemoteReportedError";

  constructor(public readonly remoteError: unknown) {
    super("REMOTE_ERROR", describeRemoteError(remoteError));
  }
}

/** No content format is registered for the mime type */
export class UnsupportedFormatError extends ProtocolError {
  override name = "UnsupportedFormatError";

  constructor(public readonly mimeType: string) {
    super("UNSUPPORTED_FORMAT", `Unrecognized mime-type: ${mimeType}`);
  }
}

/** `content.data` cannot be decoded by the format it is tagged with */
export class MalformedContentError extends ProtocolError {
  override name = "MalformedContentError";

  constructor(
    public readonly mimeType: string,
    message: string,
    cause?: unknown,
  ) {
    super("MALFORMED_CONTENT", `Malformed ${mimeType} content: ${message}`, cause);
  }
}

/** A reply was built with arguments that disagree with each other */
export class InvalidReplyError extends ProtocolError {
  override name = "InvalidReplyError";

  constructor(message: string) {
    super("INVALID_REPLY", message);
  }
}

function describeRemoteError(error: unknown): string {
  if (typeof error === "string") return error;
  if (typeof error === "object" && error !== null && "ename" in error && typeof error.ename === "string") {
    const evalue = "evalue" in error && typeof error.evalue === "string" ? error.evalue : "";
    return evalue ? `${error.ename}: ${evalue}` : error.ename;
  }
  try {
    return String(error);
  } catch {
    // no usable toString, e.g. a null-prototype object
    return Object.prototype.toString.call(error);
  }
}
