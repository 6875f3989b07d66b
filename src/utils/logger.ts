export type LogFn = (...args: unknown[]) => void;

export const log: LogFn = (...a) => console.log("[gatewire]", ...a);
export const err: LogFn = (...a) => console.error("[gatewire]", ...a);

// Used where a component needs a logger but the caller did not supply one.
export const silent: LogFn = () => {};
