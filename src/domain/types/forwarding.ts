/**
 * Request-scoped types shared by the unary and streaming forwarders.
 *
 * Nothing here outlives a single HTTP request.
 */

import type * as grpc from "@grpc/grpc-js";
import type { RpcStatus } from "../errors.js";

/**
 * One result of pulling from a response stream. `end` and `error` are
 * terminal; `message` may repeat any number of times before one of them.
 */
export type RecvOutcome<T> =
  | { kind: "message"; message: T }
  | { kind: "end" }
  | { kind: "error"; error: unknown };

/**
 * Pulls the next outcome from the underlying call. The forwarder calls it once
 * per outcome and never again after a terminal one.
 */
export type Recv<T> = () => Promise<RecvOutcome<T>>;

/**
 * Response metadata collected from the upstream call. Header entries are
 * merged into the HTTP headers before the first write; trailer entries are
 * sent as HTTP trailers after the body.
 */
export interface ServerMetadata {
  header: grpc.Metadata;
  trailer: grpc.Metadata;
}

export interface ForwardContext {
  /** Upstream response metadata to flush into the HTTP response */
  metadata?: ServerMetadata;

  /**
   * Aborted when the client goes away. The forwarders never read it; receive
   * sources observe it and surface a CANCELLED failure.
   */
  signal?: AbortSignal;
}

/** Success container: consumers tell chunks apart by key alone. */
export interface ResultEnvelope<T> {
  result: T;
}

/** Failure container, the counterpart of {@link ResultEnvelope}. */
export interface ErrorEnvelope {
  error: RpcStatus;
}

export function resultEnvelope<T>(message: T): ResultEnvelope<T> {
  return { result: message };
}

export function errorEnvelope(status: RpcStatus): ErrorEnvelope {
  return { error: status };
}
