import type { LogLevel } from "./config.js";

const rank: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export type Logger = {
  debug: (message: string, data?: unknown) => void;
  info: (message: string, data?: unknown) => void;
  warn: (message: string, data?: unknown) => void;
  error: (message: string, data?: unknown) => void;
  child: (scope: string) => Logger;
};

export const createLogger = (scope: string, level: LogLevel = "info"): Logger => {
  const prefix = `[${scope}]`;
  const enabled = (target: LogLevel) => rank[target] >= rank[level];
  const emit =
    (target: LogLevel, sink: (...args: unknown[]) => void) =>
    (message: string, data?: unknown) => {
      if (!enabled(target)) return;
      if (data === undefined) sink(`${prefix} ${message}`);
      else sink(`${prefix} ${message}`, data);
    };
  return {
    debug: emit("debug", console.debug),
    info: emit("info", console.log),
    warn: emit("warn", console.warn),
    error: emit("error", console.error),
    child: (child) => createLogger(`${scope}:${child}`, level),
  };
};

// Tests pass this where a collaborator wants a logger but output is noise.
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};
