import type { IncomingHttpHeaders } from "node:http";
import { jsonCodec } from "./json.js";
import { createProtoJsonCodec } from "./protoJson.js";
import { yamlCodec } from "./yaml.js";
import type { Codec } from "./types.js";

/** Registering a codec under this key makes it the default. */
export const MIME_WILDCARD = "*";

export type CodecName = "json" | "protojson" | "yaml";

export interface NegotiatedCodecs {
  /** Decodes the request body (chosen from Content-Type) */
  inbound: Codec;
  /** Encodes the response (chosen from Accept) */
  outbound: Codec;
}

/**
 * Immutable MIME type to codec table. Built once at startup and shared by
 * every request.
 */
export interface CodecRegistry {
  readonly defaultCodec: Codec;
  get(mime: string): Codec | undefined;
  mimeTypes(): string[];
  forRequest(headers: IncomingHttpHeaders): NegotiatedCodecs;
}

function normalizeMime(value: string): string {
  return value.split(";")[0].trim().toLowerCase();
}

type AcceptItem = { type: string; q: number; order: number };

function parseAccept(accept: string): AcceptItem[] {
  const items = accept
    .split(",")
    .map((part, order) => {
      const [type, ...params] = part.split(";");
      const qParam = params.find(p => p.trim().startsWith("q="));
      const q = qParam ? parseFloat(qParam.trim().slice(2)) : 1;
      return { type: type.trim().toLowerCase(), q: Number.isNaN(q) ? 1 : q, order };
    })
    .filter(item => item.type.length > 0 && item.q > 0);
  items.sort((x, y) => y.q - x.q || x.order - y.order);
  return items;
}

export function createCodecRegistry(defaultCodec: Codec, entries: Record<string, Codec> = {}): CodecRegistry {
  const table = new Map<string, Codec>();
  let fallback = defaultCodec;
  for (const [mime, codec] of Object.entries(entries)) {
    if (mime === MIME_WILDCARD) fallback = codec;
    else table.set(normalizeMime(mime), codec);
  }

  const get = (mime: string): Codec | undefined => table.get(normalizeMime(mime));

  const outboundFor = (accept: string | undefined): Codec => {
    if (!accept) return fallback;
    for (const item of parseAccept(accept)) {
      if (item.type === "*/*") return fallback;
      const codec = table.get(item.type);
      if (codec) return codec;
    }
    return fallback;
  };

  return Object.freeze({
    defaultCodec: fallback,
    get,
    mimeTypes: () => Array.from(table.keys()),
    forRequest(headers: IncomingHttpHeaders): NegotiatedCodecs {
      const contentType = headers["content-type"];
      return {
        inbound: (contentType && get(contentType)) || fallback,
        outbound: outboundFor(headers.accept),
      };
    },
  });
}

export function codecByName(name: CodecName): Codec {
  switch (name) {
    case "json":
      return jsonCodec;
    case "protojson":
      return createProtoJsonCodec();
    case "yaml":
      return yamlCodec;
  }
}

/**
 * The registry the gateway runs with: JSON (plain or protobuf-aware, per
 * `defaultName`) and YAML, with `defaultName` answering requests that name no
 * known type.
 */
export function createDefaultCodecRegistry(defaultName: CodecName = "json"): CodecRegistry {
  const defaultCodec = codecByName(defaultName);
  const json = defaultName === "yaml" ? jsonCodec : defaultCodec;
  return createCodecRegistry(defaultCodec, {
    "application/json": json,
    "application/yaml": yamlCodec,
    "application/x-yaml": yamlCodec,
    "text/yaml": yamlCodec,
  });
}
