import { Chunk, Duration, Effect, Fiber, Option, Queue, Ref, Scope, pipe } from "effect";

/**
 * A fixed set of worker fibers draining an unbounded queue.
 *
 * Lifecycle: submit* → close → await(deadline) → (cancel if it did not finish).
 * Workers are forked into the surrounding Scope, so closing the scope stops them.
 */
export interface WorkerPool<A, B> {
  readonly submit: (item: A) => Effect.Effect<void>;
  /** No more work: each worker exits once the queue is empty. */
  readonly close: Effect.Effect<void>;
  /** `true` if every worker finished before the deadline. */
  readonly await: (deadline: Duration.DurationInput) => Effect.Effect<boolean>;
  /** Stops the workers and returns the items that never started. In-flight items finish first. */
  readonly cancel: Effect.Effect<ReadonlyArray<A>>;
  readonly results: Effect.Effect<ReadonlyArray<B>>;
  readonly submitted: Effect.Effect<number>;
}

export interface WorkerPoolOptions<A, B, R> {
  readonly concurrency: number;
  readonly process: (item: A) => Effect.Effect<B, never, R>;
}

export const makeWorkerPool = <A, B, R>(
  options: WorkerPoolOptions<A, B, R>
): Effect.Effect<WorkerPool<A, B>, never, Scope.Scope | R> =>
  Effect.gen(function* () {
    const workerCount = Math.max(1, Math.floor(options.concurrency));
    const queue = yield* Queue.unbounded<Option.Option<A>>();
    const results = yield* Ref.make(Chunk.empty<B>());
    const submitted = yield* Ref.make(0);
    const closed = yield* Ref.make(false);

    // None is the end-of-work marker; one is queued per worker on close.
    // Only the wait for an item can be interrupted: once taken, an item is
    // processed and recorded before the worker can stop.
    const step: Effect.Effect<boolean, never, R> = Effect.uninterruptibleMask((restore) =>
      pipe(
        restore(Queue.take(queue)),
        Effect.flatMap(
          Option.match({
            onNone: () => Effect.succeed(false),
            onSome: (item) =>
              pipe(
                options.process(item),
                Effect.flatMap((result) => Ref.update(results, Chunk.append(result))),
                Effect.as(true)
              )
          })
        )
      )
    );

    const worker: Effect.Effect<void, never, R> = Effect.suspend(() =>
      Effect.flatMap(step, (more) => (more ? worker : Effect.void))
    );

    const fibers = yield* Effect.forEach(Array.from({ length: workerCount }), () =>
      Effect.forkScoped(worker)
    );

    return {
      submit: (item) =>
        pipe(
          Ref.update(submitted, (n) => n + 1),
          Effect.zipRight(Queue.offer(queue, Option.some(item))),
          Effect.asVoid
        ),

      close: Effect.gen(function* () {
        if (yield* Ref.getAndSet(closed, true)) {
          return;
        }
        yield* Queue.offerAll(
          queue,
          Array.from({ length: workerCount }, () => Option.none<A>())
        );
      }),

      await: (deadline) =>
        pipe(Fiber.awaitAll(fibers), Effect.timeoutOption(deadline), Effect.map(Option.isSome)),

      cancel: Effect.gen(function* () {
        yield* Ref.set(closed, true);
        yield* Fiber.interruptAll(fibers);
        const pending = yield* Queue.takeAll(queue);
        return Chunk.toReadonlyArray(Chunk.compact(pending));
      }),

      results: Effect.map(Ref.get(results), Chunk.toReadonlyArray),

      submitted: Ref.get(submitted)
    };
  });
