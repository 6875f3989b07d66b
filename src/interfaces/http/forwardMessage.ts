import { EncodingError } from "../../domain/errors.js";
import { resultEnvelope, type ForwardContext } from "../../domain/types/forwarding.js";
import { contentTypeOf, type Codec } from "../../infrastructure/codec/types.js";
import { HEADERS, HTTP_STATUS } from "./constants.js";
import { runForwardHooks, type Gateway, type GatewayRequest } from "./gateway.js";
import type { ResponseSink } from "./responseSink.js";
import { announceTrailers, applyHeaderMetadata, applyTrailerMetadata } from "./serverMetadata.js";

/**
 * Forward the single response of a unary call as `{"result": message}`.
 *
 * Hook and encoding failures happen before anything is written, so they are
 * handed to the gateway's error handler and still decide the status.
 */
export function forwardResponseMessage(
  ctx: ForwardContext,
  gateway: Gateway,
  codec: Codec,
  res: ResponseSink,
  req: GatewayRequest,
  message: unknown,
): void {
  applyHeaderMetadata(res, ctx.metadata);
  announceTrailers(res, ctx.metadata);

  let body: Uint8Array;
  try {
    runForwardHooks(ctx, gateway, res, message);
  } catch (e) {
    gateway.errorHandler(ctx, gateway, codec, res, req, e);
    return;
  }
  try {
    body = codec.marshal(resultEnvelope(message));
  } catch (e) {
    gateway.errorLogger("failed to marshal response:", e);
    gateway.errorHandler(ctx, gateway, codec, res, req, EncodingError.from("marshal", e));
    return;
  }

  res.setHeader(HEADERS.CONTENT_TYPE, contentTypeOf(codec));
  res.writeHead(HTTP_STATUS.OK);
  applyTrailerMetadata(res, ctx.metadata);
  res.end(body);
}
