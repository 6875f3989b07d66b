import * as grpc from "@grpc/grpc-js";
import type { IncomingHttpHeaders } from "node:http";

const METADATA_HEADER_PREFIX = "grpc-metadata-";

/** Forwarded under this prefix so they cannot clash with gRPC's own headers. */
const PERMANENT_HEADER_PREFIX = "gateway-";

/**
 * Standard HTTP request headers worth passing upstream. Everything else has to
 * opt in with a `Grpc-Metadata-` prefix.
 */
const PERMANENT_HEADERS = new Set([
  "accept",
  "accept-charset",
  "accept-language",
  "accept-ranges",
  "cache-control",
  "content-type",
  "cookie",
  "date",
  "expect",
  "from",
  "host",
  "if-match",
  "if-modified-since",
  "if-none-match",
  "if-schedule-tag-match",
  "if-unmodified-since",
  "max-forwards",
  "origin",
  "pragma",
  "referer",
  "user-agent",
  "via",
  "warning",
]);

const VALID_KEY = /^[0-9a-z_.-]+$/;

/** grpc-js refuses text metadata outside printable ASCII. */
const VALID_TEXT_VALUE = /^[ -~]*$/;

function headerValue(value: string | string[] | undefined): string | undefined {
  if (value === undefined) return undefined;
  return Array.isArray(value) ? value.join(", ") : value;
}

function setText(md: grpc.Metadata, key: string, value: string): void {
  if (VALID_TEXT_VALUE.test(value)) md.set(key, value);
}

function setEntry(md: grpc.Metadata, key: string, value: string): void {
  if (!VALID_KEY.test(key)) return;
  if (key.endsWith("-bin")) md.set(key, Buffer.from(value, "base64"));
  else setText(md, key, value);
}

/**
 * Build the outgoing call metadata for an HTTP request.
 *
 * - `Authorization` passes through unchanged
 * - other permanent HTTP headers are prefixed with `gateway-`
 * - `Grpc-Metadata-<key>` headers are forwarded as `<key>`
 * - `X-Forwarded-Host` / `X-Forwarded-For` are filled in from the request
 *
 * Text values outside printable ASCII are dropped.
 */
export function metadataFromHeaders(headers: IncomingHttpHeaders, remoteAddress?: string): grpc.Metadata {
  const md = new grpc.Metadata();

  for (const [name, raw] of Object.entries(headers)) {
    const value = headerValue(raw);
    if (value === undefined) continue;
    const key = name.toLowerCase();
    if (key === "authorization") {
      setEntry(md, key, value);
    } else if (PERMANENT_HEADERS.has(key)) {
      setEntry(md, `${PERMANENT_HEADER_PREFIX}${key}`, value);
    } else if (key.startsWith(METADATA_HEADER_PREFIX)) {
      setEntry(md, key.slice(METADATA_HEADER_PREFIX.length), value);
    }
  }

  const host = headerValue(headers["x-forwarded-host"]) ?? headers.host;
  if (host) setText(md, "x-forwarded-host", host);

  if (remoteAddress) {
    const forwardedFor = headerValue(headers["x-forwarded-for"]);
    setText(md, "x-forwarded-for", forwardedFor ? `${forwardedFor}, ${remoteAddress}` : remoteAddress);
  }

  return md;
}

const TIMEOUT_UNIT_NANOS: Record<string, number> = {
  H: 3_600_000_000_000,
  M: 60_000_000_000,
  S: 1_000_000_000,
  m: 1_000_000,
  u: 1_000,
  n: 1,
};

/**
 * Decode a gRPC timeout header value (`<digits><unit>`, at most 8 digits) to
 * milliseconds.
 *
 * @returns undefined when the value is malformed
 */
export function parseGrpcTimeout(value: string): number | undefined {
  const match = /^(\d{1,8})([HMSmun])$/.exec(value.trim());
  if (!match) return undefined;
  return (Number(match[1]) * TIMEOUT_UNIT_NANOS[match[2]]) / 1_000_000;
}
