import { describe, expect, test } from "vitest";
import { z } from "zod/v4";
import { UnknownMessageTypeError } from "../src/errors.js";
import {
  BUILTIN_DEFINITIONS,
  getDefaultRegistry,
  MessageRegistry,
  type MessageTypeDefinition,
} from "../src/registry.js";
import { BUILTIN_MESSAGE_TYPES } from "../src/types.js";
import { validate } from "../src/validate.js";

const header = {
  msg_id: "msg-1",
  session: "session-1",
  date: "2026-01-02T03:04:05.000Z",
  source: "hub",
  target: "plugin",
  version: "0.3",
};

const ping: MessageTypeDefinition = {
  type: "ping_request",
  description: "Liveness probe",
  constraints: () => z.looseObject({ content: z.looseObject({ nonce: z.string() }) }),
};

describe("getDefaultRegistry", () => {
  test("registers the built-in message types in order", () => {
    expect(getDefaultRegistry().types).toEqual([...BUILTIN_MESSAGE_TYPES]);
  });

  test("is built once", () => {
    expect(getDefaultRegistry()).toBe(getDefaultRegistry());
  });

  test("is immutable", () => {
    const registry = getDefaultRegistry();
    expect(Object.isFrozen(registry)).toBe(true);
    expect(Object.isFrozen(registry.types)).toBe(true);
  });
});

describe("MessageRegistry", () => {
  test("returns a schema for each registered type", () => {
    const registry = getDefaultRegistry();
    for (const type of BUILTIN_MESSAGE_TYPES) {
      expect(registry.has(type)).toBe(true);
      expect(registry.getSchema(type)).toBeDefined();
    }
  });

  test("returns undefined for an unregistered type", () => {
    const registry = getDefaultRegistry();
    expect(registry.has("shutdown_request")).toBe(false);
    expect(registry.getSchema("shutdown_request")).toBeUndefined();
    expect(registry.toJSONSchema("shutdown_request")).toBeUndefined();
  });

  test("describes each type", () => {
    expect(getDefaultRegistry().describe("execute_reply")).toBe(
      "Response from an execution request"
    );
  });

  test("rejects an empty definition list", () => {
    expect(() => new MessageRegistry([])).toThrow(
      "A message registry needs at least one message type"
    );
  });

  test("rejects duplicate message types", () => {
    expect(() => new MessageRegistry([ping, ping])).toThrow(
      "Duplicate message type: ping_request"
    );
  });

  test("composed schemas still require the base envelope", () => {
    const schema = getDefaultRegistry().getSchema("execute_request");
    const content = { command: "add" };
    expect(schema?.safeParse({ header: { ...header, msg_type: "execute_request" }, content }).success).toBe(true);
    expect(schema?.safeParse({ content }).success).toBe(false);
  });
});

describe("toJSONSchema", () => {
  test("returns a fresh document on every call", () => {
    const registry = getDefaultRegistry();
    const first = registry.toJSONSchema("execute_reply");
    const second = registry.toJSONSchema("execute_reply");
    expect(first).not.toBe(second);
    expect(first).toEqual(second);

    if (first) first["title"] = "changed";
    expect(second?.["title"]).toBeUndefined();
    expect(registry.toJSONSchema("execute_reply")?.["title"]).toBeUndefined();
  });

  test("renders typed messages as a conjunction with the base schema", () => {
    const schema = getDefaultRegistry().toJSONSchema("connect_reply");
    const allOf = schema?.["allOf"];
    expect(Array.isArray(allOf)).toBe(true);
    expect(Array.isArray(allOf) ? allOf.length : 0).toBe(2);
  });

  test("renders connect_request as the base envelope alone", () => {
    const schema = getDefaultRegistry().toJSONSchema("connect_request");
    expect(schema?.["type"]).toBe("object");
    expect(schema?.["required"]).toEqual(["header"]);
  });
});

describe("toDocument", () => {
  test("lists every message type with its schema", () => {
    const doc = getDefaultRegistry().toDocument();
    expect(doc.version).toBe("0.3");
    expect(doc.messageTypes.map((t) => t.type)).toEqual([...BUILTIN_MESSAGE_TYPES]);
    expect(doc.messageTypes[0]?.schema["type"]).toBe("object");
  });
});

describe("custom message types", () => {
  const registry = new MessageRegistry([...BUILTIN_DEFINITIONS, ping]);
  const message = {
    header: { ...header, msg_type: "ping_request" },
    content: { nonce: "abc" },
  };

  test("extend the header's type enumeration", () => {
    expect(registry.types).toEqual([...BUILTIN_MESSAGE_TYPES, "ping_request"]);
    expect(validate(message, registry)).toBe(message);
  });

  test("apply their own constraints", () => {
    expect(() => validate({ ...message, content: {} }, registry)).toThrow(/content\.nonce/);
  });

  test("built-in types still validate in the extended registry", () => {
    const request = { header: { ...header, msg_type: "connect_request" } };
    expect(validate(request, registry)).toBe(request);
  });

  test("are unknown to the default registry", () => {
    expect(() => validate(message)).toThrow(UnknownMessageTypeError);
  });

  test("can reference the shared definitions", () => {
    const withError = new MessageRegistry([
      {
        type: "failure_notice",
        description: "Unsolicited failure report",
        constraints: (defs) =>
          z.looseObject({
            parent_header: defs.header,
            content: z.looseObject({ error: defs.error }),
          }),
      },
    ]);
    const notice = {
      header: { ...header, msg_type: "failure_notice" },
      parent_header: { ...header, msg_type: "failure_notice" },
      content: { error: { ename: "TimeoutError" } },
    };
    expect(validate(notice, withError)).toBe(notice);
    expect(() =>
      validate({ ...notice, content: { error: { evalue: "late" } } }, withError)
    ).toThrow(/content\.error\.ename/);
  });
});
