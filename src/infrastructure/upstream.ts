import * as grpc from "@grpc/grpc-js";
import type { EventEmitter } from "node:events";
import protobuf from "protobufjs";
import { StatusError, describeFailure } from "../domain/errors.js";
import type { Recv, ServerMetadata } from "../domain/types/forwarding.js";
import { recvFromIterable } from "../domain/usecases/receive.js";

/**
 * Resolved shape of one RPC method, taken from the protobuf root.
 */
export interface MethodDescriptor {
  /** Wire path, e.g. "/demo.Echo/Say" */
  path: string;
  requestType: protobuf.Type;
  responseType: protobuf.Type;
  requestStream: boolean;
  responseStream: boolean;
}

export interface UpstreamCallOptions {
  /** Outgoing call metadata */
  metadata?: grpc.Metadata;
  /** Relative deadline; absent means none, 0 expires at once */
  timeoutMs?: number;
  /** Cancels the call when aborted */
  signal?: AbortSignal;
  /** Receives the call's response headers and trailers */
  serverMetadata?: ServerMetadata;
}

export interface UnaryBinding {
  kind: "unary";
  call(request: Record<string, unknown>, options: UpstreamCallOptions): Promise<unknown>;
}

export interface ServerStreamBinding {
  kind: "serverStream";
  open(request: Record<string, unknown>, options: UpstreamCallOptions): Recv<unknown>;
}

export type BoundMethod = UnaryBinding | ServerStreamBinding;

export interface Upstream {
  bind(fullMethodName: string): BoundMethod;
  close(): void;
}

/**
 * Look up `package.Service/Method` in a protobuf root.
 *
 * @throws Error when the service, the method, or one of its types is missing
 */
export function resolveMethod(root: protobuf.Root, fullMethodName: string): MethodDescriptor {
  const match = /^\/?([^/]+)\/([^/]+)$/.exec(fullMethodName);
  if (!match) throw new Error(`Invalid method name "${fullMethodName}", expected package.Service/Method`);
  const [, serviceName, methodName] = match;

  const service = root.lookupService(serviceName);
  const method: protobuf.Method | undefined = service.methods[methodName];
  if (!method) throw new Error(`Method ${methodName} not found on ${serviceName}`);
  method.resolve();

  const requestType = method.resolvedRequestType;
  const responseType = method.resolvedResponseType;
  if (!requestType || !responseType) {
    throw new Error(`Could not resolve message types of ${serviceName}/${methodName}`);
  }

  return {
    path: `/${service.fullName.replace(/^\./, "")}/${method.name}`,
    requestType,
    responseType,
    requestStream: Boolean(method.requestStream),
    responseStream: Boolean(method.responseStream),
  };
}

function callOptionsOf(options: UpstreamCallOptions): grpc.CallOptions {
  return options.timeoutMs === undefined ? {} : { deadline: Date.now() + Math.max(0, options.timeoutMs) };
}

function cancelOnAbort(signal: AbortSignal | undefined, call: { cancel(): void }): void {
  if (!signal) return;
  if (signal.aborted) {
    call.cancel();
    return;
  }
  signal.addEventListener("abort", () => call.cancel(), { once: true });
}

function collectServerMetadata(call: EventEmitter, target?: ServerMetadata): void {
  if (!target) return;
  call.on("metadata", (md: grpc.Metadata) => target.header.merge(md));
  call.on("status", (status: grpc.StatusObject) => target.trailer.merge(status.metadata));
}

/**
 * Generic gRPC client for every method reachable from `root`. Messages are
 * encoded and decoded with protobufjs, so no generated stubs are needed.
 */
export function createUpstream(
  address: string,
  root: protobuf.Root,
  credentials: grpc.ChannelCredentials = grpc.credentials.createInsecure(),
): Upstream {
  const client = new grpc.Client(address, credentials);

  function bind(fullMethodName: string): BoundMethod {
    const descriptor = resolveMethod(root, fullMethodName);
    const { path, requestType, responseType } = descriptor;

    if (descriptor.requestStream) {
      throw new StatusError(
        grpc.status.UNIMPLEMENTED,
        `${fullMethodName} is client or bidi streaming, which cannot be served over HTTP/JSON`,
      );
    }

    const serialize = (value: protobuf.Message) => Buffer.from(requestType.encode(value).finish());
    const deserialize = (buffer: Buffer) => responseType.decode(buffer);
    const toRequest = (body: Record<string, unknown>) => {
      try {
        return requestType.fromObject(body);
      } catch (e) {
        throw new StatusError(grpc.status.INVALID_ARGUMENT, `invalid ${requestType.name}: ${describeFailure(e)}`, undefined, {
          cause: e,
        });
      }
    };

    if (descriptor.responseStream) {
      return {
        kind: "serverStream",
        open(request: Record<string, unknown>, options: UpstreamCallOptions): Recv<unknown> {
          const call = client.makeServerStreamRequest(
            path,
            serialize,
            deserialize,
            toRequest(request),
            options.metadata ?? new grpc.Metadata(),
            callOptionsOf(options),
          );
          collectServerMetadata(call, options.serverMetadata);
          cancelOnAbort(options.signal, call);
          return recvFromIterable<unknown>(call);
        },
      };
    }

    return {
      kind: "unary",
      call(request: Record<string, unknown>, options: UpstreamCallOptions): Promise<unknown> {
        return new Promise<unknown>((resolve, reject) => {
          const call = client.makeUnaryRequest(
            path,
            serialize,
            deserialize,
            toRequest(request),
            options.metadata ?? new grpc.Metadata(),
            callOptionsOf(options),
            (error: grpc.ServiceError | null, response?: protobuf.Message) => {
              if (error) reject(error);
              else resolve(response);
            },
          );
          collectServerMetadata(call, options.serverMetadata);
          cancelOnAbort(options.signal, call);
        });
      },
    };
  }

  return {
    bind,
    close: () => client.close(),
  };
}
