import { setTimeout as delay } from "node:timers/promises";

/**
 * Registers shutdown handlers for SIGINT/SIGTERM.
 * Useful for every long-running process.
 */
export function onShutdown(fn: (signal: NodeJS.Signals) => Promise<void> | void) {
    const handler = async (signal: NodeJS.Signals) => {
      try {
        await fn(signal);
      } finally {
        // Ensure the process exits after cleanup
        process.exit(0);
      }
    };
  
    process.once("SIGINT", handler);
    process.once("SIGTERM", handler);
  }

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Resolves after `ms`. Rejects with an AbortError when `signal` fires first.
 */
export const sleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}
