import { createServer } from "node:http";
import type { IncomingMessage, Server, ServerResponse } from "node:http";
import type { AddressInfo } from "node:net";
import * as grpc from "@grpc/grpc-js";
import { EncodingError, StatusError, describeFailure, statusFromError } from "../domain/errors.js";
import { codeName } from "../domain/status.js";
import type { ForwardContext, Recv } from "../domain/types/forwarding.js";
import { receive } from "../domain/usecases/receive.js";
import { forwardResponseMessage } from "../interfaces/http/forwardMessage.js";
import { forwardResponseStream } from "../interfaces/http/forwardStream.js";
import type { Gateway } from "../interfaces/http/gateway.js";
import { HEADERS, HTTP_STATUS } from "../interfaces/http/constants.js";
import { createServerMetadata } from "../interfaces/http/serverMetadata.js";
import type { LogFn } from "../utils/logger.js";
import type { Codec } from "./codec/types.js";
import { metadataFromHeaders, parseGrpcTimeout } from "./metadata.js";
import { routeKey } from "./routeLoader.js";
import type { BoundMethod, UpstreamCallOptions } from "./upstream.js";

/** A route file entry joined with the upstream method it calls. */
export interface GatewayRoute {
  method: string;
  path: string;
  body?: "*";
  binding: BoundMethod;
}

export interface GatewayServerConfig {
  port: number;
  /** Listen host (default all interfaces) */
  host?: string;
  routes: GatewayRoute[];
  gateway: Gateway;
  /** Request bodies above this size are rejected with RESOURCE_EXHAUSTED */
  maxBodyBytes?: number;
  /** Deadline for upstream calls whose request carries no Grpc-Timeout */
  requestTimeoutMs?: number;
  corsEnabled?: boolean;
  corsOrigins?: string[];
  corsMethods?: string[];
  corsHeaders?: string[];
  logger: LogFn;
  errorLogger: LogFn;
}

export interface GatewayMetrics {
  requests_total: number;
  unary_total: number;
  streams_total: number;
  errors_total: number;
  stream_errors_total: number;
}

export interface GatewayServer {
  server: Server;
  start(): Promise<void>;
  stop(): Promise<void>;
  isListening(): boolean;
  getMetrics(): GatewayMetrics;
  /** Bound address once listening, null before */
  address(): AddressInfo | null;
}

const DEFAULT_MAX_BODY_BYTES = 4 * 1024 * 1024;

/**
 * HTTP front of the gateway. Each configured route maps one method and path
 * onto one upstream RPC; unary responses go out whole, server streams go out
 * as a chunked body.
 */
export function createGatewayServer(config: GatewayServerConfig): GatewayServer {
  const {
    port,
    host,
    gateway,
    maxBodyBytes = DEFAULT_MAX_BODY_BYTES,
    requestTimeoutMs = 0,
    corsEnabled = false,
    corsOrigins = ["*"],
    corsMethods = ["GET", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"],
    corsHeaders = ["*"],
    logger,
    errorLogger,
  } = config;

  const routes = new Map<string, GatewayRoute>();
  for (const route of config.routes) routes.set(routeKey(route.method, route.path), route);

  const metrics: GatewayMetrics = {
    requests_total: 0,
    unary_total: 0,
    streams_total: 0,
    errors_total: 0,
    stream_errors_total: 0,
  };

  const httpServer = createServer((req, res) => {
    handleRequest(req, res).catch(e => {
      errorLogger("Unhandled gateway error:", describeFailure(e));
      if (!res.writableEnded) res.end();
    });
  });
  httpServer.keepAliveTimeout = 65000;
  httpServer.headersTimeout = 66000;

  async function handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    if (corsEnabled && req.method === "OPTIONS") {
      addCorsHeaders(res);
      res.writeHead(HTTP_STATUS.NO_CONTENT);
      res.end();
      return;
    }
    if (corsEnabled) addCorsHeaders(res);

    const url = new URL(req.url ?? "/", "http://gateway.local");
    if (req.method === "GET" && url.pathname === "/health") {
      res.writeHead(HTTP_STATUS.OK, { [HEADERS.CONTENT_TYPE]: "application/json" });
      res.end(JSON.stringify({ status: "serving", routes: routes.size }));
      return;
    }

    metrics.requests_total++;
    const { inbound, outbound } = gateway.codecs.forRequest(req.headers);
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableEnded) controller.abort();
    });
    const ctx: ForwardContext = { metadata: createServerMetadata(), signal: controller.signal };

    const fail = (error: unknown) => {
      metrics.errors_total++;
      const status = statusFromError(error);
      errorLogger(`${req.method} ${url.pathname} failed (${codeName(status.code)}):`, status.message);
      if (res.headersSent) {
        if (!res.writableEnded) res.end();
        return;
      }
      gateway.errorHandler(ctx, gateway, outbound, res, req, error);
    };

    const route = routes.get(routeKey(req.method ?? "GET", url.pathname));
    if (!route) {
      fail(new StatusError(grpc.status.NOT_FOUND, `no route for ${req.method} ${url.pathname}`));
      return;
    }

    try {
      const request = route.body === "*" ? await readMessage(req, inbound) : queryMessage(url.searchParams);
      const options = callOptions(req, ctx);
      const { binding } = route;

      if (binding.kind === "unary") {
        metrics.unary_total++;
        const message = await binding.call(request, options);
        forwardResponseMessage(ctx, gateway, outbound, res, req, message);
        return;
      }

      metrics.streams_total++;
      await forwardResponseStream(ctx, gateway, outbound, res, req, countStreamErrors(binding.open(request, options)));
    } catch (e) {
      fail(e);
    }
  }

  function callOptions(req: IncomingMessage, ctx: ForwardContext): UpstreamCallOptions {
    const header = req.headers["grpc-timeout"];
    const fromHeader = typeof header === "string" ? parseGrpcTimeout(header) : undefined;
    return {
      metadata: metadataFromHeaders(req.headers, req.socket.remoteAddress),
      timeoutMs: fromHeader ?? (requestTimeoutMs > 0 ? requestTimeoutMs : undefined),
      signal: ctx.signal,
      serverMetadata: ctx.metadata,
    };
  }

  function countStreamErrors<T>(recv: Recv<T>): Recv<T> {
    return async () => {
      const outcome = await receive(recv);
      if (outcome.kind === "error") metrics.stream_errors_total++;
      return outcome;
    };
  }

  async function readMessage(req: IncomingMessage, codec: Codec): Promise<Record<string, unknown>> {
    const body = await readBody(req, maxBodyBytes);
    if (body.length === 0) return {};
    let decoded: unknown;
    try {
      decoded = codec.unmarshal(body);
    } catch (e) {
      const cause = EncodingError.from("unmarshal", e);
      throw new StatusError(grpc.status.INVALID_ARGUMENT, cause.message, undefined, { cause });
    }
    if (!isRecord(decoded)) {
      throw new StatusError(grpc.status.INVALID_ARGUMENT, "request body must be an object");
    }
    return decoded;
  }

  function addCorsHeaders(res: ServerResponse) {
    const origin = corsOrigins.includes("*") ? "*" : corsOrigins.join(",");
    res.setHeader("Access-Control-Allow-Origin", origin);
    res.setHeader("Access-Control-Allow-Methods", corsMethods.join(","));
    res.setHeader("Access-Control-Allow-Headers", corsHeaders.join(","));
    res.setHeader("Access-Control-Expose-Headers", "Grpc-Metadata-*,Grpc-Trailer-*");
    res.setHeader("Access-Control-Max-Age", "86400");
  }

  async function start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const onError = (e: NodeJS.ErrnoException) => {
        reject(e.code === "EADDRINUSE" ? new Error(`Failed to start server. Is port ${port} in use?`) : e);
      };
      httpServer.once("error", onError);
      httpServer.listen(port, host, () => {
        httpServer.removeListener("error", onError);
        const bound = address();
        logger(`Gateway listening on ${bound ? `${bound.address}:${bound.port}` : port}`);
        resolve();
      });
    });
  }

  async function stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!httpServer.listening) {
        resolve();
        return;
      }
      httpServer.close(e => {
        if (e) {
          reject(e);
        } else {
          logger("Gateway stopped");
          resolve();
        }
      });
      httpServer.closeAllConnections();
    });
  }

  function address(): AddressInfo | null {
    const bound = httpServer.address();
    return typeof bound === "object" ? bound : null;
  }

  return {
    server: httpServer,
    start,
    stop,
    isListening: () => httpServer.listening,
    getMetrics: () => ({ ...metrics }),
    address,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Query parameters as request fields; a repeated key becomes a list. */
export function queryMessage(params: URLSearchParams): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const key of new Set(params.keys())) {
    const values = params.getAll(key);
    out[key] = values.length === 1 ? values[0] : values;
  }
  return out;
}

/**
 * Buffer a request body.
 *
 * @throws StatusError RESOURCE_EXHAUSTED once the body exceeds `limit` bytes
 */
export function readBody(req: IncomingMessage, limit: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const tooLarge = () =>
      new StatusError(grpc.status.RESOURCE_EXHAUSTED, `request body exceeds ${limit} bytes`);

    const declared = Number(req.headers["content-length"]);
    if (Number.isFinite(declared) && declared > limit) {
      req.resume();
      reject(tooLarge());
      return;
    }

    const chunks: Buffer[] = [];
    let size = 0;
    const onData = (chunk: Buffer) => {
      size += chunk.length;
      if (size > limit) {
        req.off("data", onData);
        req.resume();
        reject(tooLarge());
        return;
      }
      chunks.push(chunk);
    };
    req.on("data", onData);
    req.once("end", () => resolve(Buffer.concat(chunks)));
    req.once("error", reject);
  });
}
