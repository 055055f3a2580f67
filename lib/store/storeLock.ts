/**
 * Per-path write serialization for CSV stores.
 *
 * Writers to the same store run one at a time in arrival order; writers to
 * different stores do not wait on each other. Per-process only: separate
 * server instances writing the same file are not coordinated.
 */

import path from "path";

const tails = new Map<string, Promise<void>>();

export async function withStoreLock<T>(storePath: string, fn: () => Promise<T>): Promise<T> {
  const key = path.resolve(storePath);
  const previous = tails.get(key) ?? Promise.resolve();

  const result = previous.then(fn);
  // The queue only needs to know when this writer is done; its outcome is
  // returned to the caller below
  const tail = result.then(
    () => undefined,
    () => undefined
  );
  tails.set(key, tail);

  try {
    return await result;
  } finally {
    if (tails.get(key) === tail) tails.delete(key);
  }
}

export function pendingStoreLocks(): number {
  return tails.size;
}
