import { EncodingError, describeFailure, statusFromError } from "../../domain/errors.js";
import { codeName } from "../../domain/status.js";
import { errorEnvelope, resultEnvelope, type ForwardContext, type Recv } from "../../domain/types/forwarding.js";
import { receive } from "../../domain/usecases/receive.js";
import { contentTypeOf, delimiterOf, type Codec } from "../../infrastructure/codec/types.js";
import { FALLBACK_ERROR_BODY, HEADERS, HTTP_STATUS } from "./constants.js";
import { runForwardHooks, type Gateway, type GatewayRequest } from "./gateway.js";
import { isFlusher, waitForDrain, type ResponseSink } from "./responseSink.js";
import { announceTrailers, applyHeaderMetadata, applyTrailerMetadata } from "./serverMetadata.js";

type StreamState = "init" | "streaming";

/**
 * Forward a server stream as a chunked HTTP body.
 *
 * Every element is written as `{"result": message}` followed by the codec's
 * delimiter and flushed on its own. What happens on failure depends on whether
 * the status line is already out:
 *
 * - failure before the first element: nothing has been written, so the
 *   gateway's error handler produces an ordinary error response with the
 *   status mapped from the failure;
 * - failure after the first element: the status (200) is committed, so the
 *   failure is written in-band as one last `{"error": ...}` chunk and the
 *   status stays 200.
 *
 * `recv` is called once per outcome and never after a terminal one.
 */
export async function forwardResponseStream<T>(
  ctx: ForwardContext,
  gateway: Gateway,
  codec: Codec,
  res: ResponseSink,
  req: GatewayRequest,
  recv: Recv<T>,
): Promise<void> {
  const delimiter = delimiterOf(codec);
  let state: StreamState = "init";

  const commit = () => {
    applyHeaderMetadata(res, ctx.metadata);
    announceTrailers(res, ctx.metadata);
    res.setHeader(HEADERS.CONTENT_TYPE, contentTypeOf(codec));
    res.setHeader(HEADERS.TRANSFER_ENCODING, "chunked");
    res.writeHead(HTTP_STATUS.OK);
    state = "streaming";
  };

  const writeChunk = async (chunk: Uint8Array) => {
    const accepted = res.write(Buffer.concat([chunk, delimiter]));
    if (isFlusher(res)) res.flush();
    if (!accepted) await waitForDrain(res);
  };

  const writeError = async (error: unknown) => {
    const status = statusFromError(error);
    gateway.errorLogger(`stream failed after first message (${codeName(status.code)}):`, status.message);
    let chunk: Uint8Array;
    try {
      chunk = codec.marshal(errorEnvelope(status));
    } catch (e) {
      gateway.errorLogger("failed to marshal stream error:", describeFailure(e));
      chunk = Buffer.from(FALLBACK_ERROR_BODY, "utf8");
    }
    await writeChunk(chunk);
  };

  const finish = () => {
    applyTrailerMetadata(res, ctx.metadata);
    res.end();
  };

  for (;;) {
    const outcome = await receive(recv);

    if (outcome.kind === "end") {
      if (state === "init") commit();
      finish();
      return;
    }

    if (outcome.kind === "error") {
      if (state === "init") {
        gateway.errorHandler(ctx, gateway, codec, res, req, outcome.error);
        return;
      }
      await writeError(outcome.error);
      finish();
      return;
    }

    let chunk: Uint8Array;
    try {
      runForwardHooks(ctx, gateway, res, outcome.message);
      chunk = marshalResult(codec, outcome.message);
    } catch (e) {
      if (state === "init") {
        gateway.errorHandler(ctx, gateway, codec, res, req, e);
        return;
      }
      await writeError(e);
      finish();
      return;
    }

    if (state === "init") commit();
    await writeChunk(chunk);
  }
}

function marshalResult(codec: Codec, message: unknown): Uint8Array {
  try {
    return codec.marshal(resultEnvelope(message));
  } catch (e) {
    throw EncodingError.from("marshal", e);
  }
}
