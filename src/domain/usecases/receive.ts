import { TransportError, describeFailure, hasCanonicalCode } from "../errors.js";
import type { Recv, RecvOutcome } from "../types/forwarding.js";

/**
 * Adapt an async iterable (a generator, a grpc-js ClientReadableStream, any
 * object-mode Readable) into a {@link Recv} callback.
 *
 * Exhaustion becomes `end`, a thrown error becomes `error`. Failures without a
 * canonical code are wrapped in {@link TransportError}. Once a terminal
 * outcome has been produced it is repeated without touching the iterator
 * again.
 */
export function recvFromIterable<T>(source: AsyncIterable<T>): Recv<T> {
  const iterator = source[Symbol.asyncIterator]();
  let terminal: RecvOutcome<T> | undefined;

  return async () => {
    if (terminal) return terminal;
    try {
      const next = await iterator.next();
      if (next.done) {
        terminal = { kind: "end" };
        return terminal;
      }
      return { kind: "message", message: next.value };
    } catch (error) {
      terminal = { kind: "error", error: asTransportFailure(error) };
      return terminal;
    }
  };
}

export function asTransportFailure(error: unknown): unknown {
  if (hasCanonicalCode(error)) return error;
  return new TransportError(`receive failed: ${describeFailure(error)}`, { cause: error });
}

/**
 * Call `recv` once, folding a rejected promise into an `error` outcome so the
 * caller only has to deal with the three outcome kinds.
 */
export async function receive<T>(recv: Recv<T>): Promise<RecvOutcome<T>> {
  try {
    return await recv();
  } catch (error) {
    return { kind: "error", error };
  }
}
