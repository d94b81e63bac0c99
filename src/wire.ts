import { SchemaValidationError } from "./errors.js";
import type { MessageRegistry } from "./registry.js";
import type { Envelope } from "./types.js";
import { validate } from "./validate.js";

// Byte arrays have no JSON form; they travel as { "$bytes": "<base64>" }.
// A payload object whose only key is "$bytes", "$$bytes", ... gains one
// more "$" on the way out and loses it on the way in.
const BYTES_KEY = "$bytes";
const ESCAPABLE_KEY = /^\$+bytes$/;

function soleKey(value: object): string | undefined {
  const keys = Object.keys(value);
  return keys.length === 1 ? keys[0] : undefined;
}

function replacer(this: unknown, key: string, value: unknown): unknown {
  // Buffer#toJSON runs before the replacer, so look at the raw value
  const raw =
    typeof this === "object" && this !== null
      ? Reflect.get(this, key)
      : value;
  if (raw instanceof Uint8Array) {
    return { [BYTES_KEY]: Buffer.from(raw).toString("base64") };
  }
  if (typeof value !== "object" || value === null || Array.isArray(value)) return value;
  const only = soleKey(value);
  if (only === undefined || !ESCAPABLE_KEY.test(only)) return value;
  return { [`$${only}`]: Reflect.get(value, only) };
}

function reviver(_key: string, value: unknown): unknown {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return value;
  const only = soleKey(value);
  if (only === undefined || !ESCAPABLE_KEY.test(only)) return value;
  const inner = Reflect.get(value, only);
  if (only !== BYTES_KEY) return { [only.slice(1)]: inner };
  if (typeof inner !== "string") return value;
  return new Uint8Array(Buffer.from(inner, "base64"));
}

/** Serialize an envelope to JSON text for the transport */
export function serializeMessage(envelope: Envelope): string {
  return JSON.stringify(envelope, replacer);
}

/**
 * Parse JSON text received from the transport and validate it, so that
 * malformed envelopes never reach a command dispatcher.
 */
export function parseMessage(text: string, registry?: MessageRegistry): Envelope {
  let raw: unknown;
  try {
    raw = JSON.parse(text, reviver);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new SchemaValidationError(`Message is not valid JSON: ${message}`, [
      { path: "", message },
    ]);
  }
  return validate(raw, registry);
}
