/**
 * The part of node:http's ServerResponse the forwarders write through.
 * ServerResponse satisfies it structurally; tests use a recorder.
 */
export interface ResponseSink {
  readonly headersSent: boolean;
  setHeader(name: string, value: number | string | readonly string[]): unknown;
  getHeader(name: string): number | string | string[] | undefined;
  writeHead(statusCode: number): unknown;
  write(chunk: Uint8Array): boolean;
  end(chunk?: Uint8Array): unknown;
}

/** Sinks that buffer (e.g. behind compression) and need an explicit push. */
export interface Flusher {
  flush(): void;
}

export interface TrailerWriter {
  addTrailers(headers: Record<string, string>): void;
}

/** Sinks that report backpressure the way Writable streams do. */
export interface Drainable {
  readonly destroyed: boolean;
  once(event: "drain" | "close", listener: () => void): unknown;
  off(event: "drain" | "close", listener: () => void): unknown;
}

export function isFlusher(sink: ResponseSink): sink is ResponseSink & Flusher {
  return "flush" in sink && typeof sink.flush === "function";
}

export function isTrailerWriter(sink: ResponseSink): sink is ResponseSink & TrailerWriter {
  return "addTrailers" in sink && typeof sink.addTrailers === "function";
}

export function isDrainable(sink: ResponseSink): sink is ResponseSink & Drainable {
  return "once" in sink && typeof sink.once === "function" && "off" in sink && typeof sink.off === "function";
}

/**
 * Resolve once a sink that refused a write has drained, or once it has gone
 * away. Returns immediately for sinks without backpressure.
 */
export function waitForDrain(sink: ResponseSink): Promise<void> {
  if (!isDrainable(sink) || sink.destroyed) return Promise.resolve();
  return new Promise(resolve => {
    const done = () => {
      sink.off("drain", done);
      sink.off("close", done);
      resolve();
    };
    sink.once("drain", done);
    sink.once("close", done);
  });
}
