import { z } from "zod/v4";
import {
  buildSharedDefinitions,
  ConnectReplyContentSchema,
  ExecuteReplyContentSchema,
  ExecuteRequestContentSchema,
  type SharedDefinitions,
} from "./schema.js";
import { DEFAULT_PROTOCOL_VERSION, type Envelope } from "./types.js";

/**
 * Describes one message type. `constraints` receives the registry's shared
 * definitions and returns what the type adds on top of the base envelope;
 * omit it for types with no extra requirements.
 */
export interface MessageTypeDefinition {
  type: string;
  description: string;
  constraints?: (defs: SharedDefinitions) => z.ZodType;
}

/** Serializable description of a registry, one JSON Schema per message type */
export interface RegistryDocument {
  version: string;
  messageTypes: {
    type: string;
    description: string;
    schema: Record<string, unknown>;
  }[];
}

export const BUILTIN_DEFINITIONS: readonly MessageTypeDefinition[] = [
  {
    type: "connect_request",
    description:
      "Request basic information about the plugin hub, such as the ports its sockets listen on",
  },
  {
    type: "connect_reply",
    description: "Basic information about the plugin hub",
    constraints: (defs) =>
      z.looseObject({
        parent_header: defs.header,
        content: ConnectReplyContentSchema,
      }),
  },
  {
    type: "execute_request",
    description: "Request to perform an execution",
    constraints: () => z.looseObject({ content: ExecuteRequestContentSchema }),
  },
  {
    type: "execute_reply",
    description: "Response from an execution request",
    constraints: (defs) =>
      z.looseObject({
        parent_header: defs.header,
        content: ExecuteReplyContentSchema,
      }),
  },
];

/**
 * Holds one composed schema per message type. Each composed schema is the
 * conjunction of the shared base envelope and the type's own constraints, so
 * every base requirement still applies.
 *
 * Immutable once constructed.
 */
export class MessageRegistry {
  readonly types: readonly string[];
  readonly definitions: SharedDefinitions;
  private readonly entries: ReadonlyMap<
    string,
    { definition: MessageTypeDefinition; schema: z.ZodType }
  >;

  constructor(messageTypes: readonly MessageTypeDefinition[]) {
    const [first, ...rest] = messageTypes.map((d) => d.type);
    if (first === undefined) {
      throw new Error("A message registry needs at least one message type");
    }
    const tags: [string, ...string[]] = [first, ...rest];

    this.definitions = buildSharedDefinitions(tags);

    const entries = new Map<
      string,
      { definition: MessageTypeDefinition; schema: z.ZodType }
    >();
    for (const definition of messageTypes) {
      if (entries.has(definition.type)) {
        throw new Error(`Duplicate message type: ${definition.type}`);
      }
      const schema = definition.constraints
        ? z.intersection(
            this.definitions.baseMessage,
            definition.constraints(this.definitions)
          )
        : this.definitions.baseMessage;
      entries.set(definition.type, { definition, schema });
    }

    this.types = Object.freeze(tags);
    this.entries = entries;
    Object.freeze(this);
  }

  /** Schema every envelope must satisfy, whatever its type */
  get baseSchema(): z.ZodType<Envelope> {
    return this.definitions.baseMessage;
  }

  has(type: string): boolean {
    return this.entries.has(type);
  }

  /** Composed base-and-type schema, or undefined for an unregistered type */
  getSchema(type: string): z.ZodType | undefined {
    return this.entries.get(type)?.schema;
  }

  describe(type: string): string | undefined {
    return this.entries.get(type)?.definition.description;
  }

  /**
   * Render the composed schema for `type` as a JSON Schema document.
   * A new object is returned on every call.
   */
  toJSONSchema(type: string): Record<string, unknown> | undefined {
    const schema = this.getSchema(type);
    if (!schema) return undefined;
    return z.toJSONSchema(schema, { io: "input" });
  }

  /** Describe every registered message type */
  toDocument(version: string = DEFAULT_PROTOCOL_VERSION): RegistryDocument {
    return {
      version,
      messageTypes: [...this.entries.values()].map(({ definition, schema }) => ({
        type: definition.type,
        description: definition.description,
        schema: z.toJSONSchema(schema, { io: "input" }),
      })),
    };
  }
}

let defaultRegistry: MessageRegistry | undefined;

/** Registry of the built-in message types, created on first use */
export function getDefaultRegistry(): MessageRegistry {
  defaultRegistry ??= new MessageRegistry(BUILTIN_DEFINITIONS);
  return defaultRegistry;
}
