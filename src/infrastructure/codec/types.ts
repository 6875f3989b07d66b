import type protobuf from "protobufjs";

export const DEFAULT_CONTENT_TYPE = "application/json";

/**
 * Pluggable wire encoding. Implementations throw on failure; callers turn
 * whatever they throw into an EncodingError.
 *
 * A codec instance is shared by every request, so it must not keep
 * per-call state.
 */
export interface Codec {
  marshal(value: unknown): Uint8Array;
  /** @param type message type to build, when the caller knows it */
  unmarshal(data: Uint8Array, type?: protobuf.Type): unknown;
  contentType(): string;
}

/**
 * Optional capability: bytes written after every element of a streamed
 * response. Codecs without it get a single newline.
 */
export interface DelimitedCodec extends Codec {
  delimiter(): Uint8Array;
}

export function isDelimitedCodec(codec: Codec): codec is DelimitedCodec {
  return "delimiter" in codec && typeof codec.delimiter === "function";
}

export function delimiterOf(codec: Codec): Uint8Array {
  return isDelimitedCodec(codec) ? codec.delimiter() : Buffer.from("\n");
}

/**
 * The codec's content type, or {@link DEFAULT_CONTENT_TYPE} when the codec
 * reports none or fails to compute one.
 */
export function contentTypeOf(codec: Codec): string {
  try {
    return codec.contentType() || DEFAULT_CONTENT_TYPE;
  } catch {
    return DEFAULT_CONTENT_TYPE;
  }
}
