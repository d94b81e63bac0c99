import { deserialize, serialize } from "node:v8";
import { dump, load } from "js-yaml";
import { DEFAULT_MIME_TYPE, loadConfig } from "./config.js";
import {
  MalformedContentError,
  RemoteReportedError,
  UnsupportedFormatError,
} from "./errors.js";
import { getLogger, type Logger } from "./logger.js";
import type { ContentFragment } from "./types.js";

export const MimeTypes = {
  /** Node structured-clone serialization, carried as base64 text */
  V8: DEFAULT_MIME_TYPE,
  YAML: "application/x-yaml",
  JSON: "application/json",
  OCTET_STREAM: "application/octet-stream",
  TEXT: "text/plain",
} as const;

/** Translates payload values to and from the representation kept in `content.data` */
export interface ContentFormat {
  mimeType: string;
  encode(data: unknown): unknown;
  decode(data: unknown): unknown;
}

function requireText(mimeType: string, data: unknown): string {
  if (typeof data !== "string") {
    throw new MalformedContentError(mimeType, `expected text, got ${typeof data}`);
  }
  return data;
}

/** Run a format's (de)serializer, reporting its failures as malformed content */
function guarded<T>(mimeType: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof MalformedContentError) throw err;
    const message = err instanceof Error ? err.message : String(err);
    throw new MalformedContentError(mimeType, message, err);
  }
}

function passthrough(mimeType: string): ContentFormat {
  return { mimeType, encode: (data) => data, decode: (data) => data };
}

export const BUILTIN_FORMATS: readonly ContentFormat[] = [
  {
    mimeType: MimeTypes.V8,
    encode: (data) =>
      guarded(MimeTypes.V8, () => serialize(data).toString("base64")),
    decode: (data) => {
      const text = requireText(MimeTypes.V8, data);
      return guarded(MimeTypes.V8, (): unknown =>
        deserialize(Buffer.from(text, "base64"))
      );
    },
  },
  {
    mimeType: MimeTypes.YAML,
    encode: (data) => guarded(MimeTypes.YAML, () => dump(data)),
    decode: (data) => {
      const text = requireText(MimeTypes.YAML, data);
      return guarded(MimeTypes.YAML, () => load(text));
    },
  },
  {
    mimeType: MimeTypes.JSON,
    encode: (data) => guarded(MimeTypes.JSON, () => JSON.stringify(data)),
    decode: (data) => {
      const text = requireText(MimeTypes.JSON, data);
      return guarded(MimeTypes.JSON, (): unknown => JSON.parse(text));
    },
  },
  passthrough(MimeTypes.OCTET_STREAM),
  passthrough(MimeTypes.TEXT),
];

export interface ContentCodecOptions {
  /** Format used by `encode` when the caller names none */
  defaultMimeType?: string;
  logger?: Logger;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Encodes payloads into content fragments and decodes them back, choosing
 * the serializer by the fragment's `metadata.mime_type`.
 */
export class ContentCodec {
  readonly defaultMimeType: string;
  private readonly formats: ReadonlyMap<string, ContentFormat>;
  private readonly options: ContentCodecOptions;
  private readonly logger: Logger;

  constructor(
    formats: Iterable<ContentFormat> = BUILTIN_FORMATS,
    options: ContentCodecOptions = {}
  ) {
    this.formats = new Map(
      [...formats].map((f): [string, ContentFormat] => [f.mimeType, f])
    );
    this.defaultMimeType = options.defaultMimeType ?? DEFAULT_MIME_TYPE;
    this.options = options;
    this.logger = (options.logger ?? getLogger()).child({ component: "codec" });
  }

  get mimeTypes(): string[] {
    return [...this.formats.keys()];
  }

  supports(mimeType: string): boolean {
    return this.formats.has(mimeType);
  }

  /** New codec with `format` added, replacing any format with the same mime type */
  withFormat(format: ContentFormat): ContentCodec {
    return new ContentCodec([...this.formats.values(), format], this.options);
  }

  /**
   * Encode `data` into a content fragment.
   *
   * Absent data (null or undefined) yields an empty fragment. A `null`
   * mime type stores the data untouched and leaves `metadata` out.
   */
  encode(
    data: unknown,
    mimeType: string | null = this.defaultMimeType
  ): ContentFragment {
    if (data === undefined || data === null) return {};
    if (mimeType === null) return { data };

    const format = this.lookup(mimeType);
    return { data: format.encode(data), metadata: { mime_type: mimeType } };
  }

  /**
   * Recover the payload carried by `content`.
   *
   * Throws RemoteReportedError when the content reports an error, whatever
   * its data. Untagged data is read as native-object serialization.
   */
  decode(content: Record<string, unknown> | undefined): unknown {
    if (!content) return undefined;

    const error = content["error"];
    if (error !== undefined && error !== null) {
      throw new RemoteReportedError(error);
    }

    const metadata = content["metadata"];
    const tagged = isRecord(metadata) ? metadata["mime_type"] : undefined;
    const format = this.lookup(tagged === undefined ? DEFAULT_MIME_TYPE : tagged);

    const data = content["data"];
    if (data === undefined || data === null) return undefined;
    return format.decode(data);
  }

  private lookup(mimeType: unknown): ContentFormat {
    const format = typeof mimeType === "string" ? this.formats.get(mimeType) : undefined;
    if (!format) {
      this.logger.debug({ mimeType }, "Unsupported content format");
      throw new UnsupportedFormatError(String(mimeType));
    }
    return format;
  }
}

let defaultCodec: ContentCodec | undefined;

/** Codec with the built-in formats, created on first use */
export function getDefaultCodec(): ContentCodec {
  defaultCodec ??= new ContentCodec(BUILTIN_FORMATS, {
    defaultMimeType: loadConfig().defaultMimeType,
  });
  return defaultCodec;
}

export function encodeContent(
  data: unknown,
  mimeType?: string | null
): ContentFragment {
  return getDefaultCodec().encode(data, mimeType);
}

export function decodeContent(
  content: Record<string, unknown> | undefined
): unknown {
  return getDefaultCodec().decode(content);
}
