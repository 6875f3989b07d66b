/**
 * Upstream binding against an in-process gRPC server, and the whole gateway
 * in front of it.
 */

import { describe, test, expect, beforeAll, afterAll } from "vitest";
import * as grpc from "@grpc/grpc-js";
import protobuf from "protobufjs";
import { StatusError, statusFromError } from "../src/domain/errors.js";
import { createGatewayServer, type GatewayServer } from "../src/infrastructure/gatewayServer.js";
import { createUpstream, resolveMethod, type Upstream } from "../src/infrastructure/upstream.js";
import { createGateway } from "../src/interfaces/http/gateway.js";
import { createServerMetadata } from "../src/interfaces/http/serverMetadata.js";
import { silent } from "../src/utils/logger.js";
import { httpRequest } from "./helpers/httpClient.js";

const ECHO_PROTO = `
syntax = "proto3";
package demo;

service Echo {
  rpc Say(EchoRequest) returns (EchoReply);
  rpc Repeat(RepeatRequest) returns (stream EchoReply);
  rpc Collect(stream EchoRequest) returns (EchoReply);
}

message EchoRequest { string text = 1; }
message RepeatRequest { string text = 1; int32 times = 2; }
message EchoReply { string text = 1; int32 index = 2; }
`;

const root = protobuf.parse(ECHO_PROTO, { keepCase: true }).root;

/** Most a Repeat call will send before failing with OUT_OF_RANGE. */
const REPEAT_LIMIT = 3;

function methodDefinition(name: string): grpc.MethodDefinition<protobuf.Message, Record<string, unknown>> {
  const d = resolveMethod(root, `demo.Echo/${name}`);
  return {
    path: d.path,
    requestStream: d.requestStream,
    responseStream: d.responseStream,
    requestSerialize: value => Buffer.from(d.requestType.encode(value).finish()),
    requestDeserialize: bytes => d.requestType.decode(bytes),
    responseSerialize: value => Buffer.from(d.responseType.encode(d.responseType.fromObject(value)).finish()),
    responseDeserialize: bytes => d.responseType.toObject(d.responseType.decode(bytes)),
  };
}

function fieldsOf(message: protobuf.Message): Record<string, unknown> {
  return message.$type.toObject(message);
}

function startEchoServer(): Promise<{ server: grpc.Server; port: number }> {
  const server = new grpc.Server();
  server.addService(
    { Say: methodDefinition("Say"), Repeat: methodDefinition("Repeat"), Collect: methodDefinition("Collect") },
    {
      Say: (
        call: grpc.ServerUnaryCall<protobuf.Message, Record<string, unknown>>,
        callback: grpc.sendUnaryData<Record<string, unknown>>,
      ) => {
        const text = String(fieldsOf(call.request).text ?? "");
        if (text === "missing") {
          callback({ code: grpc.status.NOT_FOUND, details: "no such echo" });
          return;
        }
        const header = new grpc.Metadata();
        header.set("x-served-by", "echo");
        call.sendMetadata(header);
        const trailer = new grpc.Metadata();
        trailer.set("x-cost", "1");
        callback(null, { text: `echo: ${text}` }, trailer);
      },
      Repeat: (call: grpc.ServerWritableStream<protobuf.Message, Record<string, unknown>>) => {
        const request = fieldsOf(call.request);
        const times = Number(request.times ?? 0);
        for (let i = 1; i <= Math.min(times, REPEAT_LIMIT); i++) call.write({ text: request.text, index: i });
        if (times > REPEAT_LIMIT) {
          call.emit("error", { code: grpc.status.OUT_OF_RANGE, details: "too far" });
          return;
        }
        call.end();
      },
      Collect: (
        _call: grpc.ServerReadableStream<protobuf.Message, Record<string, unknown>>,
        callback: grpc.sendUnaryData<Record<string, unknown>>,
      ) => {
        callback(null, {});
      },
    },
  );
  return new Promise((resolve, reject) => {
    server.bindAsync("127.0.0.1:0", grpc.ServerCredentials.createInsecure(), (e, port) => {
      if (e) reject(e);
      else resolve({ server, port });
    });
  });
}

function asMessage(value: unknown): protobuf.Message {
  if (!(value instanceof protobuf.Message)) throw new Error(`expected a message, got ${String(value)}`);
  return value;
}

describe("upstream binding", () => {
  let echoServer: grpc.Server;
  let upstream: Upstream;

  beforeAll(async () => {
    const started = await startEchoServer();
    echoServer = started.server;
    upstream = createUpstream(`127.0.0.1:${started.port}`, root);
  });

  afterAll(() => {
    upstream.close();
    echoServer.forceShutdown();
  });

  test("resolves the wire path and streaming flags", () => {
    const d = resolveMethod(root, "demo.Echo/Repeat");
    expect(d.path).toBe("/demo.Echo/Repeat");
    expect(d.requestStream).toBe(false);
    expect(d.responseStream).toBe(true);
  });

  test("unary calls return the decoded response and collect metadata", async () => {
    const binding = upstream.bind("demo.Echo/Say");
    if (binding.kind !== "unary") throw new Error("expected a unary binding");
    const serverMetadata = createServerMetadata();

    const response = await binding.call({ text: "hi" }, { serverMetadata });

    expect(fieldsOf(asMessage(response))).toEqual({ text: "echo: hi" });
    expect(serverMetadata.header.get("x-served-by")).toEqual(["echo"]);
    expect(serverMetadata.trailer.get("x-cost")).toEqual(["1"]);
  });

  test("an upstream status comes back with its code and text", async () => {
    const binding = upstream.bind("demo.Echo/Say");
    if (binding.kind !== "unary") throw new Error("expected a unary binding");

    const failure = await binding.call({ text: "missing" }, {}).then(
      () => undefined,
      (e: unknown) => e,
    );

    expect(statusFromError(failure)).toEqual({ code: grpc.status.NOT_FOUND, message: "no such echo" });
  });

  test("a zero timeout fails the call with DEADLINE_EXCEEDED", async () => {
    const binding = upstream.bind("demo.Echo/Say");
    if (binding.kind !== "unary") throw new Error("expected a unary binding");

    const failure = await binding.call({ text: "hi" }, { timeoutMs: 0 }).then(
      () => undefined,
      (e: unknown) => e,
    );

    expect(statusFromError(failure).code).toBe(grpc.status.DEADLINE_EXCEEDED);
  });

  test("server streams are read through recv until end", async () => {
    const binding = upstream.bind("demo.Echo/Repeat");
    if (binding.kind !== "serverStream") throw new Error("expected a stream binding");
    const recv = binding.open({ text: "yo", times: 2 }, {});

    const received: unknown[] = [];
    for (;;) {
      const outcome = await recv();
      if (outcome.kind !== "message") {
        expect(outcome.kind).toBe("end");
        break;
      }
      received.push(fieldsOf(asMessage(outcome.message)));
    }
    expect(received).toEqual([
      { text: "yo", index: 1 },
      { text: "yo", index: 2 },
    ]);
  });

  test("a stream that fails reports the upstream status", async () => {
    const binding = upstream.bind("demo.Echo/Repeat");
    if (binding.kind !== "serverStream") throw new Error("expected a stream binding");
    const recv = binding.open({ text: "yo", times: 5 }, {});

    let outcome = await recv();
    let messages = 0;
    while (outcome.kind === "message") {
      messages++;
      outcome = await recv();
    }

    expect(messages).toBe(REPEAT_LIMIT);
    expect(outcome.kind).toBe("error");
    const error = outcome.kind === "error" ? outcome.error : undefined;
    expect(statusFromError(error)).toEqual({ code: grpc.status.OUT_OF_RANGE, message: "too far" });
  });

  test("an aborted signal cancels the call", async () => {
    const binding = upstream.bind("demo.Echo/Repeat");
    if (binding.kind !== "serverStream") throw new Error("expected a stream binding");
    const controller = new AbortController();
    controller.abort();

    const outcome = await binding.open({ text: "yo", times: 1 }, { signal: controller.signal })();

    expect(outcome.kind).toBe("error");
    const error = outcome.kind === "error" ? outcome.error : undefined;
    expect(statusFromError(error).code).toBe(grpc.status.CANCELLED);
  });

  test("client streaming methods cannot be bound", () => {
    expect(() => upstream.bind("demo.Echo/Collect")).toThrow(StatusError);
    try {
      upstream.bind("demo.Echo/Collect");
    } catch (e) {
      expect(statusFromError(e).code).toBe(grpc.status.UNIMPLEMENTED);
    }
  });

  test("unknown methods are rejected at bind time", () => {
    expect(() => upstream.bind("demo.Echo/Nope")).toThrow("Method Nope not found on demo.Echo");
    expect(() => upstream.bind("not-a-method")).toThrow('Invalid method name "not-a-method"');
  });
});

describe("gateway in front of a gRPC server", () => {
  let echoServer: grpc.Server;
  let upstream: Upstream;
  let gatewayServer: GatewayServer;
  let port = 0;

  beforeAll(async () => {
    const started = await startEchoServer();
    echoServer = started.server;
    upstream = createUpstream(`127.0.0.1:${started.port}`, root);
    gatewayServer = createGatewayServer({
      port: 0,
      host: "127.0.0.1",
      routes: [
        { method: "POST", path: "/v1/echo", body: "*", binding: upstream.bind("demo.Echo/Say") },
        { method: "GET", path: "/v1/echo/repeat", binding: upstream.bind("demo.Echo/Repeat") },
      ],
      gateway: createGateway({ logger: silent, errorLogger: silent }),
      logger: silent,
      errorLogger: silent,
    });
    await gatewayServer.start();
    port = gatewayServer.address()?.port ?? 0;
  });

  afterAll(async () => {
    await gatewayServer.stop();
    upstream.close();
    echoServer.forceShutdown();
  });

  test("unary success", async () => {
    const res = await httpRequest(port, "POST", "/v1/echo", { body: '{"text":"hi"}' });
    expect(res.status).toBe(200);
    expect(res.headers["grpc-metadata-x-served-by"]).toBe("echo");
    expect(res.body).toBe('{"result":{"text":"echo: hi"}}');
  });

  test("unary failure keeps the upstream code", async () => {
    const res = await httpRequest(port, "POST", "/v1/echo", { body: '{"text":"missing"}' });
    expect(res.status).toBe(404);
    expect(res.body).toBe('{"error":{"code":5,"message":"no such echo"}}');
  });

  test("server stream", async () => {
    const res = await httpRequest(port, "GET", "/v1/echo/repeat?text=yo&times=2");
    expect(res.status).toBe(200);
    expect(res.body).toBe('{"result":{"text":"yo","index":1}}\n{"result":{"text":"yo","index":2}}\n');
  });

  test("server stream failing after the first message", async () => {
    const res = await httpRequest(port, "GET", "/v1/echo/repeat?text=yo&times=5");
    expect(res.status).toBe(200);
    expect(res.body).toBe(
      '{"result":{"text":"yo","index":1}}\n' +
        '{"result":{"text":"yo","index":2}}\n' +
        '{"result":{"text":"yo","index":3}}\n' +
        '{"error":{"code":11,"message":"too far"}}\n',
    );
  });
});
