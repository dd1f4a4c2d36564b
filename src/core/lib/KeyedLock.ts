import { Effect } from "effect";
import { resolve } from "node:path";

export interface KeyedLock {
  /** Runs `self` while holding the lock for `key`. Different keys never block each other. */
  readonly withLock: (key: string) => <A, E, R>(self: Effect.Effect<A, E, R>) => Effect.Effect<A, E, R>;
  readonly size: Effect.Effect<number>;
}

/** One single-permit semaphore per key, created on first use. Path keys are normalized. */
export const makeKeyedLock: Effect.Effect<KeyedLock> = Effect.sync(() => {
  const semaphores = new Map<string, Effect.Semaphore>();

  const semaphoreFor = (key: string) =>
    Effect.sync(() => {
      const normalized = resolve(key);
      const existing = semaphores.get(normalized);
      if (existing) {
        return existing;
      }
      const created = Effect.unsafeMakeSemaphore(1);
      semaphores.set(normalized, created);
      return created;
    });

  return {
    withLock:
      (key) =>
      (self) =>
        Effect.flatMap(semaphoreFor(key), (semaphore) => semaphore.withPermits(1)(self)),
    size: Effect.sync(() => semaphores.size)
  };
});
