import type { Flusher, ResponseSink, TrailerWriter } from "../../src/interfaces/http/responseSink.js";

/**
 * In-memory ResponseSink. Records what the forwarders write and in which order.
 */
export class ResponseRecorder implements ResponseSink, Flusher, TrailerWriter {
  statusCode = 0;
  headersSent = false;
  ended = false;
  readonly headers: Record<string, string | number | string[]> = {};
  readonly chunks: Buffer[] = [];
  readonly trailers: Record<string, string> = {};
  headerWrites = 0;
  bodyWrites = 0;
  flushCount = 0;

  setHeader(name: string, value: number | string | readonly string[]): this {
    if (this.headersSent) throw new Error(`header ${name} set after headers were sent`);
    this.headers[name.toLowerCase()] = typeof value === "string" || typeof value === "number" ? value : [...value];
    return this;
  }

  getHeader(name: string): number | string | string[] | undefined {
    return this.headers[name.toLowerCase()];
  }

  header(name: string): string | undefined {
    const value = this.getHeader(name);
    return value === undefined ? undefined : String(value);
  }

  writeHead(statusCode: number): this {
    if (this.headersSent) throw new Error("writeHead called twice");
    this.statusCode = statusCode;
    this.headersSent = true;
    this.headerWrites++;
    return this;
  }

  write(chunk: Uint8Array): boolean {
    if (this.ended) throw new Error("write after end");
    if (!this.headersSent) this.writeHead(200);
    this.chunks.push(Buffer.from(chunk));
    this.bodyWrites++;
    return true;
  }

  end(chunk?: Uint8Array): this {
    if (this.ended) throw new Error("end called twice");
    if (!this.headersSent) this.writeHead(200);
    if (chunk) {
      this.chunks.push(Buffer.from(chunk));
      this.bodyWrites++;
    }
    this.ended = true;
    return this;
  }

  flush(): void {
    this.flushCount++;
  }

  addTrailers(headers: Record<string, string>): void {
    Object.assign(this.trailers, headers);
  }

  get body(): string {
    return Buffer.concat(this.chunks).toString("utf8");
  }
}
