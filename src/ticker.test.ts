import { describe, test, expect } from "vitest";
import * as Effect from "effect/Effect";
import * as Either from "effect/Either";
import * as TestClock from "effect/TestClock";
import * as TestContext from "effect/TestContext";
import { makeTicker } from "./ticker";

const run = <A, E>(effect: Effect.Effect<A, E>): Promise<A> =>
  Effect.runPromise(effect.pipe(Effect.provide(TestContext.TestContext)));

describe("makeTicker", () => {
  test("runs the tick once per interval after start", async () => {
    let ticks = 0;

    await run(
      Effect.gen(function* () {
        const ticker = yield* makeTicker(
          "test",
          "1 second",
          Effect.sync(() => {
            ticks += 1;
          }),
        );
        yield* ticker.start;

        yield* TestClock.adjust("1 second");
        yield* TestClock.adjust("1 second");
        yield* TestClock.adjust("1 second");
      }).pipe(Effect.scoped),
    );

    expect(ticks).toBe(3);
  });

  test("a failing tick does not stop the ticker", async () => {
    let attempts = 0;

    await run(
      Effect.gen(function* () {
        const ticker = yield* makeTicker(
          "test",
          "1 second",
          Effect.suspend((): Effect.Effect<void, string> => {
            attempts += 1;
            return attempts === 1 ? Effect.fail("boom") : Effect.void;
          }),
        );
        yield* ticker.start;

        yield* TestClock.adjust("1 second");
        yield* TestClock.adjust("1 second");
      }).pipe(Effect.scoped),
    );

    expect(attempts).toBe(2);
  });

  test("closing the scope stops the ticker", async () => {
    let ticks = 0;

    await run(
      Effect.gen(function* () {
        const running = yield* Effect.gen(function* () {
          const ticker = yield* makeTicker(
            "test",
            "1 second",
            Effect.sync(() => {
              ticks += 1;
            }),
          );
          yield* ticker.start;
          return ticker;
        }).pipe(Effect.scoped, Effect.flatMap((ticker) => ticker.isRunning));

        expect(running).toBe(false);
        yield* TestClock.adjust("5 seconds");
      }),
    );

    expect(ticks).toBe(0);
  });

  test("stops when started from an uninterruptible region", async () => {
    const result = await Effect.runPromise(
      Effect.gen(function* () {
        const ticker = yield* makeTicker("test", "1 hour", Effect.void);
        yield* Effect.acquireRelease(ticker.start, () => Effect.void);

        return yield* ticker.stop.pipe(
          Effect.timeout("1 second"),
          Effect.zipRight(ticker.isRunning),
          Effect.either,
        );
      }).pipe(Effect.scoped),
    );

    expect(result).toEqual(Either.right(false));
  });
});
