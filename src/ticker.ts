import * as Duration from "effect/Duration";
import * as Effect from "effect/Effect";
import * as Fiber from "effect/Fiber";
import * as Option from "effect/Option";
import type * as Scope from "effect/Scope";
import * as SynchronizedRef from "effect/SynchronizedRef";

/**
 * A cancellable periodic task: wait one interval, run the tick, repeat.
 */
export interface Ticker {
  readonly start: Effect.Effect<void>;
  readonly stop: Effect.Effect<void>;
  readonly isRunning: Effect.Effect<boolean>;
}

/**
 * Build a ticker. A failing tick is logged and the next one still runs.
 * The ticker is stopped when the enclosing scope closes.
 */
export const makeTicker = (
  name: string,
  interval: Duration.DurationInput,
  tick: Effect.Effect<unknown, unknown>,
): Effect.Effect<Ticker, never, Scope.Scope> =>
  Effect.gen(function* () {
    const fiber = yield* SynchronizedRef.make(
      Option.none<Fiber.RuntimeFiber<never>>(),
    );

    const loop = Effect.sleep(interval).pipe(
      Effect.zipRight(tick),
      Effect.catchAllCause((cause) =>
        Effect.logWarning(`${name} tick failed`, cause),
      ),
      Effect.forever,
      // Interruptible even when forked from an uninterruptible region
      Effect.interruptible,
    );

    const start = SynchronizedRef.updateEffect(fiber, (current) =>
      Option.match(current, {
        onNone: () =>
          Effect.forkDaemon(loop).pipe(
            Effect.tap(() =>
              Effect.logDebug(
                `${name} ticker started (every ${Duration.format(interval)})`,
              ),
            ),
            Effect.map(Option.some),
          ),
        onSome: () => Effect.succeed(current),
      }),
    );

    const stop = SynchronizedRef.getAndSet(fiber, Option.none()).pipe(
      Effect.flatMap((current) =>
        Option.match(current, {
          onNone: () => Effect.void,
          onSome: (running) =>
            Fiber.interrupt(running).pipe(
              Effect.zipRight(Effect.logDebug(`${name} ticker stopped`)),
            ),
        }),
      ),
    );

    yield* Effect.addFinalizer(() => stop);

    return {
      start,
      stop,
      isRunning: Effect.map(SynchronizedRef.get(fiber), Option.isSome),
    };
  });
