import * as grpc from "@grpc/grpc-js";

export type Code = grpc.status;

const MIN_CODE = grpc.status.OK;
const MAX_CODE = grpc.status.UNAUTHENTICATED;

/**
 * Canonical code names as they appear on the wire in the different RPC
 * dialects: gRPC uses SCREAMING_SNAKE_CASE ("NOT_FOUND"), Connect uses
 * snake_case ("not_found") and spells CANCELLED with a single "l".
 */
const CODE_BY_NAME: Record<string, Code> = {
  ok: grpc.status.OK,
  cancelled: grpc.status.CANCELLED,
  canceled: grpc.status.CANCELLED,
  unknown: grpc.status.UNKNOWN,
  invalid_argument: grpc.status.INVALID_ARGUMENT,
  deadline_exceeded: grpc.status.DEADLINE_EXCEEDED,
  not_found: grpc.status.NOT_FOUND,
  already_exists: grpc.status.ALREADY_EXISTS,
  permission_denied: grpc.status.PERMISSION_DENIED,
  resource_exhausted: grpc.status.RESOURCE_EXHAUSTED,
  failed_precondition: grpc.status.FAILED_PRECONDITION,
  aborted: grpc.status.ABORTED,
  out_of_range: grpc.status.OUT_OF_RANGE,
  unimplemented: grpc.status.UNIMPLEMENTED,
  internal: grpc.status.INTERNAL,
  unavailable: grpc.status.UNAVAILABLE,
  data_loss: grpc.status.DATA_LOSS,
  unauthenticated: grpc.status.UNAUTHENTICATED,
};

export function isCanonicalCode(value: unknown): value is Code {
  return typeof value === "number" && Number.isInteger(value) && value >= MIN_CODE && value <= MAX_CODE;
}

/**
 * Resolve a canonical code from its name in either dialect.
 *
 * @returns the code, or undefined when the name is not a canonical code name
 */
export function codeFromName(name: string): Code | undefined {
  const key = name.trim().toLowerCase();
  return Object.prototype.hasOwnProperty.call(CODE_BY_NAME, key) ? CODE_BY_NAME[key] : undefined;
}

export function codeName(code: number): string {
  return isCanonicalCode(code) ? grpc.status[code] : "UNKNOWN";
}

/**
 * Map a canonical RPC code to the HTTP status used when the failure can still
 * decide the response status (nothing has been written yet).
 *
 * Total and deterministic: codes outside the canonical range map to 500.
 */
export function httpStatusFromCode(code: number): number {
  switch (code) {
    case grpc.status.OK:
      return 200;
    case grpc.status.CANCELLED:
      return 408;
    case grpc.status.UNKNOWN:
      return 500;
    case grpc.status.INVALID_ARGUMENT:
      return 400;
    case grpc.status.DEADLINE_EXCEEDED:
      return 504;
    case grpc.status.NOT_FOUND:
      return 404;
    case grpc.status.ALREADY_EXISTS:
      return 409;
    case grpc.status.PERMISSION_DENIED:
      return 403;
    case grpc.status.UNAUTHENTICATED:
      return 401;
    case grpc.status.RESOURCE_EXHAUSTED:
      return 429;
    case grpc.status.FAILED_PRECONDITION:
      return 400;
    case grpc.status.ABORTED:
      return 409;
    case grpc.status.OUT_OF_RANGE:
      return 400;
    case grpc.status.UNIMPLEMENTED:
      return 501;
    case grpc.status.INTERNAL:
      return 500;
    case grpc.status.UNAVAILABLE:
      return 503;
    case grpc.status.DATA_LOSS:
      return 500;
    default:
      return 500;
  }
}
