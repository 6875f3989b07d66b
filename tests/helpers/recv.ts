import type { Recv, RecvOutcome } from "../../src/domain/types/forwarding.js";

/**
 * Recv that replays `script` and counts how often it was called. Calling it
 * past the end of the script rejects, which shows up in the call count.
 */
export function scriptedRecv<T>(script: RecvOutcome<T>[]): { recv: Recv<T>; calls(): number } {
  let calls = 0;
  const recv: Recv<T> = async () => {
    const outcome = script[calls];
    calls++;
    if (!outcome) throw new Error(`recv called ${calls} times, script has ${script.length}`);
    return outcome;
  };
  return { recv, calls: () => calls };
}

export const msg = <T>(message: T): RecvOutcome<T> => ({ kind: "message", message });
export const end: RecvOutcome<never> = { kind: "end" };
export const fail = (error: unknown): RecvOutcome<never> => ({ kind: "error", error });
