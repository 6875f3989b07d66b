import { ProtocolInvariantError, describeFailure, statusFromError } from "../../domain/errors.js";
import { httpStatusFromCode } from "../../domain/status.js";
import { errorEnvelope, type ForwardContext } from "../../domain/types/forwarding.js";
import { DEFAULT_CONTENT_TYPE, contentTypeOf, type Codec } from "../../infrastructure/codec/types.js";
import { FALLBACK_ERROR_BODY, HEADERS, HTTP_STATUS } from "./constants.js";
import type { Gateway, GatewayRequest } from "./gateway.js";
import type { ResponseSink } from "./responseSink.js";
import { announceTrailers, applyHeaderMetadata, applyTrailerMetadata } from "./serverMetadata.js";

/**
 * Default error handler: write a whole HTTP error response for `error`.
 *
 * The status comes from the failure's canonical code. The body is
 * `{"error": {code, message, details?}}` encoded with `codec`. If the codec
 * cannot encode it, the response degrades to {@link FALLBACK_ERROR_BODY} with
 * status 500 and a JSON content type instead of failing a second time.
 *
 * The content type is read from the codec after encoding, so codecs that pick
 * a type based on what they encoded report the right one.
 *
 * Headers are written once and the body is written once.
 */
export function writeHttpError(
  ctx: ForwardContext,
  gateway: Gateway,
  codec: Codec,
  res: ResponseSink,
  _req: GatewayRequest,
  error: unknown,
): void {
  const status = statusFromError(error);
  let httpStatus = httpStatusFromCode(status.code);
  let body: Uint8Array;
  let contentType: string;

  try {
    body = codec.marshal(errorEnvelope(status));
    contentType = contentTypeOf(codec);
  } catch (e) {
    const violation = new ProtocolInvariantError("failed to marshal error message", { cause: e });
    gateway.errorLogger(`${violation.message}:`, describeFailure(e), "(original error:", status.message + ")");
    body = Buffer.from(FALLBACK_ERROR_BODY, "utf8");
    contentType = DEFAULT_CONTENT_TYPE;
    httpStatus = HTTP_STATUS.INTERNAL_ERROR;
  }

  applyHeaderMetadata(res, ctx.metadata);
  announceTrailers(res, ctx.metadata);
  res.setHeader(HEADERS.CONTENT_TYPE, contentType);
  res.writeHead(httpStatus);
  applyTrailerMetadata(res, ctx.metadata);
  res.end(body);
}
