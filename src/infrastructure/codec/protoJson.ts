import protobuf from "protobufjs";
import { EncodingError } from "../../domain/errors.js";
import type { DelimitedCodec } from "./types.js";

export interface ProtoJsonOptions {
  /** How 64-bit integers are rendered (default String, which keeps precision) */
  longs?: StringConstructor | NumberConstructor;
  /** How enum values are rendered (default String, i.e. the value name) */
  enums?: StringConstructor | NumberConstructor;
  /** Include fields that hold their default value (default false) */
  emitDefaults?: boolean;
}

/**
 * Build a function that replaces every protobufjs message found in a value
 * tree with its plain-object form. Envelopes, arrays and plain objects are
 * walked; other values are returned untouched.
 */
export function createMessageNormalizer(options: ProtoJsonOptions = {}): (value: unknown) => unknown {
  const conversion: protobuf.IConversionOptions = {
    longs: options.longs ?? String,
    enums: options.enums ?? String,
    bytes: String,
    defaults: options.emitDefaults ?? false,
    arrays: true,
    objects: true,
    oneofs: true,
    json: true,
  };

  const normalize = (value: unknown): unknown => {
    if (value instanceof protobuf.Message) {
      return value.$type.toObject(value, conversion);
    }
    if (Array.isArray(value)) {
      return value.map(normalize);
    }
    if (isPlainObject(value)) {
      const out: Record<string, unknown> = {};
      for (const [key, inner] of Object.entries(value)) out[key] = normalize(inner);
      return out;
    }
    return value;
  };

  return normalize;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * JSON codec aware of protobuf messages: messages are converted with the
 * conversion options given here rather than protobufjs' toJSON defaults, and
 * request bodies can be decoded straight into a message type.
 */
export function createProtoJsonCodec(options: ProtoJsonOptions = {}): DelimitedCodec {
  const normalize = createMessageNormalizer(options);

  return {
    marshal(value: unknown): Uint8Array {
      const text = JSON.stringify(normalize(value));
      if (text === undefined) throw new EncodingError("value has no JSON representation");
      return Buffer.from(text, "utf8");
    },

    unmarshal(data: Uint8Array, type?: protobuf.Type): unknown {
      const parsed: unknown = JSON.parse(Buffer.from(data).toString("utf8"));
      if (!type) return parsed;
      if (!isPlainObject(parsed)) {
        throw new EncodingError(`expected a JSON object for ${type.fullName.replace(/^\./, "")}`);
      }
      try {
        return type.fromObject(parsed);
      } catch (e) {
        throw EncodingError.from("unmarshal", e);
      }
    },

    contentType(): string {
      return "application/json";
    },

    delimiter(): Uint8Array {
      return Buffer.from("\n");
    },
  };
}
