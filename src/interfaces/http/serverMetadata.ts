import * as grpc from "@grpc/grpc-js";
import type { ServerMetadata } from "../../domain/types/forwarding.js";
import { HEADERS, METADATA_HEADER_PREFIX, METADATA_TRAILER_PREFIX } from "./constants.js";
import { isTrailerWriter, type ResponseSink } from "./responseSink.js";

export function createServerMetadata(): ServerMetadata {
  return { header: new grpc.Metadata(), trailer: new grpc.Metadata() };
}

function metadataEntries(md: grpc.Metadata): Array<[string, string]> {
  return Object.entries(md.getMap()).map(([key, value]) => [
    key,
    typeof value === "string" ? value : value.toString("base64"),
  ]);
}

/**
 * Copy upstream header metadata into `Grpc-Metadata-*` response headers.
 * Must run before the status line is written.
 */
export function applyHeaderMetadata(res: ResponseSink, md: ServerMetadata | undefined): void {
  if (!md) return;
  for (const [key, value] of metadataEntries(md.header)) {
    res.setHeader(`${METADATA_HEADER_PREFIX}${key}`, value);
  }
}

/** Announce the trailer names known so far in the `Trailer` header. */
export function announceTrailers(res: ResponseSink, md: ServerMetadata | undefined): void {
  if (!md) return;
  const names = metadataEntries(md.trailer).map(([key]) => `${METADATA_TRAILER_PREFIX}${key}`);
  if (names.length > 0) res.setHeader(HEADERS.TRAILER, names.join(", "));
}

/**
 * Queue upstream trailer metadata as HTTP trailers. Sinks that cannot send
 * trailers are left alone.
 */
export function applyTrailerMetadata(res: ResponseSink, md: ServerMetadata | undefined): void {
  if (!md || !isTrailerWriter(res)) return;
  const entries = metadataEntries(md.trailer);
  if (entries.length === 0) return;
  const trailers: Record<string, string> = {};
  for (const [key, value] of entries) trailers[`${METADATA_TRAILER_PREFIX}${key}`] = value;
  res.addTrailers(trailers);
}
