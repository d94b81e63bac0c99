import { z } from "zod/v4";
import { ProtocolError } from "./errors.js";
import { DEFAULT_PROTOCOL_VERSION, PROTOCOL_VERSIONS, type ProtocolVersion } from "./types.js";

export const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/** Native-object serialization, used when a caller names no format */
export const DEFAULT_MIME_TYPE = "application/x-v8-serialized";

const EnvSchema = z.object({
  PLUGIN_PROTOCOL_VERSION: z.enum(PROTOCOL_VERSIONS).default(DEFAULT_PROTOCOL_VERSION),
  PLUGIN_DEFAULT_MIME_TYPE: z.string().min(1).default(DEFAULT_MIME_TYPE),
  PLUGIN_LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

export interface ProtocolConfig {
  /** Version stamped on new headers */
  version: ProtocolVersion;
  /** Format used to encode `content.data` when a caller names none */
  defaultMimeType: string;
  logLevel: LogLevel;
}

export class ConfigError extends ProtocolError {
  override name = "ConfigError";

  constructor(message: string) {
    super("INVALID_CONFIG", message);
  }
}

/**
 * Read protocol settings from the environment.
 *
 * Unset or empty variables fall back to their defaults.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): ProtocolConfig {
  const parsed = EnvSchema.safeParse({
    PLUGIN_PROTOCOL_VERSION: env.PLUGIN_PROTOCOL_VERSION || undefined,
    PLUGIN_DEFAULT_MIME_TYPE: env.PLUGIN_DEFAULT_MIME_TYPE || undefined,
    PLUGIN_LOG_LEVEL: env.PLUGIN_LOG_LEVEL || undefined,
  });
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((i) => `${i.path.map(String).join(".")}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${message}`);
  }

  return {
    version: parsed.data.PLUGIN_PROTOCOL_VERSION,
    defaultMimeType: parsed.data.PLUGIN_DEFAULT_MIME_TYPE,
    logLevel: parsed.data.PLUGIN_LOG_LEVEL,
  };
}
