import { EncodingError } from "../../domain/errors.js";
import type { Codec } from "./types.js";

/**
 * Plain JSON. protobufjs messages serialize through their own toJSON, so this
 * codec also works for upstream responses as long as the default conversion
 * (string longs and enums) is acceptable.
 */
export const jsonCodec: Codec = {
  marshal(value: unknown): Uint8Array {
    const text = JSON.stringify(value);
    if (text === undefined) throw new EncodingError("value has no JSON representation");
    return Buffer.from(text, "utf8");
  },
  unmarshal(data: Uint8Array): unknown {
    return JSON.parse(Buffer.from(data).toString("utf8"));
  },
  contentType(): string {
    return "application/json";
  },
};
