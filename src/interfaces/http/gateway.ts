import type { IncomingHttpHeaders } from "node:http";
import type { ForwardContext } from "../../domain/types/forwarding.js";
import { createDefaultCodecRegistry, type CodecRegistry } from "../../infrastructure/codec/registry.js";
import type { Codec } from "../../infrastructure/codec/types.js";
import { err, log, type LogFn } from "../../utils/logger.js";
import { writeHttpError } from "./errorWriter.js";
import type { ResponseSink } from "./responseSink.js";

/** What the forwarders need to know about the originating request. */
export interface GatewayRequest {
  method?: string;
  url?: string;
  headers: IncomingHttpHeaders;
}

/**
 * Writes a complete error response for a failure that happened before any
 * byte of the response was sent.
 */
export type HttpErrorHandler = (
  ctx: ForwardContext,
  gateway: Gateway,
  codec: Codec,
  res: ResponseSink,
  req: GatewayRequest,
  error: unknown,
) => void;

/**
 * Runs before each response message is written (once for unary calls, once
 * per element for streams). Throwing aborts the response with that failure.
 */
export type ForwardResponseHook = (ctx: ForwardContext, res: ResponseSink, message: unknown) => void;

export interface GatewayOptions {
  codecs?: CodecRegistry;
  errorHandler?: HttpErrorHandler;
  forwardResponseOptions?: ForwardResponseHook[];
  logger?: LogFn;
  errorLogger?: LogFn;
}

/**
 * Process-wide forwarding configuration. Frozen at creation and shared by all
 * concurrent requests.
 */
export interface Gateway {
  readonly codecs: CodecRegistry;
  readonly errorHandler: HttpErrorHandler;
  readonly forwardResponseOptions: readonly ForwardResponseHook[];
  readonly logger: LogFn;
  readonly errorLogger: LogFn;
}

export function createGateway(options: GatewayOptions = {}): Gateway {
  return Object.freeze({
    codecs: options.codecs ?? createDefaultCodecRegistry(),
    errorHandler: options.errorHandler ?? writeHttpError,
    forwardResponseOptions: Object.freeze([...(options.forwardResponseOptions ?? [])]),
    logger: options.logger ?? log,
    errorLogger: options.errorLogger ?? err,
  });
}

export function runForwardHooks(ctx: ForwardContext, gateway: Gateway, res: ResponseSink, message: unknown): void {
  for (const hook of gateway.forwardResponseOptions) hook(ctx, res, message);
}
