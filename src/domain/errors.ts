import * as grpc from "@grpc/grpc-js";
import { codeFromName, isCanonicalCode, type Code } from "./status.js";

export type FailureKind =
  | "EncodingFailure"
  | "TransportFailure"
  | "StatusFailure"
  | "ProtocolInvariantViolation";

/**
 * The (code, message) pair every failure is reduced to before it is written
 * to a client, either as a whole error response or as a trailing stream chunk.
 */
export interface RpcStatus {
  code: Code;
  message: string;
  details?: unknown[];
}

export abstract class GatewayError extends Error {
  abstract readonly kind: FailureKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A failure that carries a canonical RPC code, e.g. one raised by a route
 * handler or reconstructed from an upstream status.
 */
export class StatusError extends GatewayError {
  readonly kind = "StatusFailure";

  constructor(
    readonly code: Code,
    message: string,
    readonly details?: unknown[],
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** A codec could not marshal or unmarshal a value. */
export class EncodingError extends GatewayError {
  readonly kind = "EncodingFailure";

  static from(operation: "marshal" | "unmarshal", cause: unknown): EncodingError {
    if (cause instanceof EncodingError) return cause;
    return new EncodingError(`failed to ${operation}: ${describeFailure(cause)}`, { cause });
  }
}

/** The receive source failed without attaching a canonical code. */
export class TransportError extends GatewayError {
  readonly kind = "TransportFailure";
}

/** A codec broke its own contract on the error path. Logged, never sent. */
export class ProtocolInvariantError extends GatewayError {
  readonly kind = "ProtocolInvariantViolation";
}

/**
 * Textual description of an arbitrary thrown value. Never throws, even for
 * objects whose toString does.
 */
export function describeFailure(failure: unknown): string {
  if (failure instanceof Error) return failure.message || failure.name;
  if (typeof failure === "string") return failure;
  try {
    return String(failure);
  } catch {
    return "unknown error";
  }
}

function isAbortError(failure: unknown): boolean {
  return failure instanceof Error && failure.name === "AbortError";
}

/**
 * grpc-js ServiceError and anything shaped like it: a numeric canonical code,
 * with the upstream status text in `details` and a decorated `message`
 * ("5 NOT_FOUND: no such resource").
 */
function canonicalCodeOf(failure: unknown): Code | undefined {
  if (failure instanceof StatusError) return failure.code;
  if (isAbortError(failure)) return grpc.status.CANCELLED;
  if (typeof failure !== "object" || failure === null || !("code" in failure)) return undefined;
  const { code } = failure;
  if (isCanonicalCode(code)) return code;
  if (typeof code === "string") return codeFromName(code);
  return undefined;
}

export function hasCanonicalCode(failure: unknown): boolean {
  return canonicalCodeOf(failure) !== undefined;
}

function messageOf(failure: unknown): string {
  if (failure instanceof StatusError) return failure.message;
  if (typeof failure === "object" && failure !== null) {
    if ("details" in failure && typeof failure.details === "string" && failure.details) {
      return failure.details;
    }
    if ("message" in failure && typeof failure.message === "string") {
      return failure.message;
    }
  }
  return describeFailure(failure);
}

function detailsOf(failure: unknown): unknown[] | undefined {
  if (failure instanceof StatusError) return failure.details;
  if (typeof failure === "object" && failure !== null && "details" in failure && Array.isArray(failure.details)) {
    return failure.details;
  }
  return undefined;
}

/**
 * Reduce any failure to an {@link RpcStatus}.
 *
 * Failures that already carry a canonical code keep it verbatim; everything
 * else becomes INTERNAL with the failure's description as message.
 */
export function statusFromError(failure: unknown): RpcStatus {
  const code = canonicalCodeOf(failure);
  if (code === undefined) {
    return { code: grpc.status.INTERNAL, message: describeFailure(failure) };
  }
  const status: RpcStatus = { code, message: messageOf(failure) };
  const details = detailsOf(failure);
  if (details && details.length > 0) status.details = details;
  return status;
}
