import { describe, expect, test } from "vitest";
import {
  InvalidReplyError,
  MalformedContentError,
  ProtocolError,
  RemoteReportedError,
  SchemaValidationError,
  UnknownMessageTypeError,
  UnsupportedFormatError,
} from "../src/errors.js";

describe("ProtocolError", () => {
  test("creates error with code and message", () => {
    const err = new ProtocolError("SOMETHING_BROKE", "It broke");
    expect(err.code).toBe("SOMETHING_BROKE");
    expect(err.message).toBe("It broke");
    expect(err.name).toBe("ProtocolError");
    expect(err).toBeInstanceOf(Error);
  });

  test("creates error with cause", () => {
    const cause = new Error("root");
    const err = new ProtocolError("WRAPPED", "Wrapped", cause);
    expect(err.cause).toBe(cause);
  });

  test("omits cause when not provided", () => {
    expect(new ProtocolError("X", "x").cause).toBeUndefined();
  });
});

describe("SchemaValidationError", () => {
  test("carries issues", () => {
    const issues = [{ path: "header.msg_id", message: "Required" }];
    const err = new SchemaValidationError("Invalid", issues);
    expect(err.code).toBe("SCHEMA_VALIDATION_FAILED");
    expect(err.issues).toEqual(issues);
    expect(err).toBeInstanceOf(ProtocolError);
  });

  test("unknown message type is a schema validation error", () => {
    const err = new UnknownMessageTypeError("bogus_request");
    expect(err).toBeInstanceOf(SchemaValidationError);
    expect(err.code).toBe("UNKNOWN_MESSAGE_TYPE");
    expect(err.name).toBe("UnknownMessageTypeError");
    expect(err.message).toBe("Unknown message type: bogus_request");
    expect(err.msgType).toBe("bogus_request");
  });
});

describe("RemoteReportedError", () => {
  test("uses a textual remote error as its message", () => {
    const err = new RemoteReportedError("Error: division by zero");
    expect(err.code).toBe("REMOTE_ERROR");
    expect(err.message).toBe("Error: division by zero");
    expect(err.remoteError).toBe("Error: division by zero");
  });

  test("describes a structured remote error", () => {
    const err = new RemoteReportedError({ ename: "ValueError", evalue: "bad input" });
    expect(err.message).toBe("ValueError: bad input");
  });

  test("falls back to the error name without a value", () => {
    expect(new RemoteReportedError({ ename: "KeyError" }).message).toBe("KeyError");
  });

  test("keeps any other reported value and describes it as text", () => {
    const err = new RemoteReportedError(10n);
    expect(err.remoteError).toBe(10n);
    expect(err.message).toBe("10");
    expect(new RemoteReportedError({ evalue: "no name" }).message).toBe("[object Object]");
    expect(new RemoteReportedError(Object.create(null)).message).toBe("[object Object]");
  });
});

describe("format and reply errors", () => {
  test("UnsupportedFormatError names the mime type", () => {
    const err = new UnsupportedFormatError("application/x-unknown");
    expect(err.code).toBe("UNSUPPORTED_FORMAT");
    expect(err.mimeType).toBe("application/x-unknown");
    expect(err.message).toBe("Unrecognized mime-type: application/x-unknown");
  });

  test("MalformedContentError prefixes the mime type", () => {
    const err = new MalformedContentError("application/json", "unexpected end");
    expect(err.code).toBe("MALFORMED_CONTENT");
    expect(err.message).toBe("Malformed application/json content: unexpected end");
  });

  test("InvalidReplyError has a stable code", () => {
    const err = new InvalidReplyError("no error given");
    expect(err.code).toBe("INVALID_REPLY");
    expect(err.name).toBe("InvalidReplyError");
  });
});
