// Typed deferred: a promise whose resolver is handed to someone other than the executor.
// StreamSampler uses it to settle a reset requested while an iteration is in flight.

import type { Deferred } from "../types.js";

export function createDeferred<T>(): Deferred<T> {
  let settle: ((value: T) => void) | null = null;
  const promise = new Promise<T>((r) => {
    settle = r;
  });
  return {
    promise,
    resolve: (value: T) => {
      settle?.(value);
    },
  };
}
