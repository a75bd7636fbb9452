import { describe, test, expect } from "vitest";
import * as Duration from "effect/Duration";
import * as Effect from "effect/Effect";
import * as Layer from "effect/Layer";
import * as TestClock from "effect/TestClock";
import * as TestContext from "effect/TestContext";
import { CrunchConfig } from "./config";
import { makeMemorySink } from "./outputSink";
import { SweepScheduler } from "./sweepScheduler";
import { TraceRegistry, TraceRegistryLive } from "./traceStore/service";

const setup = () => {
  const sink = makeMemorySink();

  const layer = SweepScheduler.Live.pipe(
    Layer.provideMerge(TraceRegistryLive),
    Layer.provide(
      Layer.merge(
        sink.layer,
        CrunchConfig.make({ sweepInterval: Duration.seconds(2), idleCredits: 2 }),
      ),
    ),
  );

  const run = <A, E>(
    effect: Effect.Effect<A, E, SweepScheduler | TraceRegistry>,
  ): Promise<A> =>
    Effect.runPromise(
      effect.pipe(Effect.provide(layer), Effect.provide(TestContext.TestContext)),
    );

  return { sink, run };
};

const event = (traceId: string, timestamp: number) => ({
  traceId,
  timestamp,
  clock: [1],
  category: "op",
});

describe("SweepScheduler", () => {
  test("finalizes a silent trace after idle-credit intervals", async () => {
    const { sink, run } = setup();

    await run(
      Effect.gen(function* () {
        const scheduler = yield* SweepScheduler;
        const registry = yield* TraceRegistry;

        yield* registry.add(event("t1", 0));
        yield* scheduler.start;

        yield* TestClock.adjust("2 seconds");
        expect(sink.lines).toEqual([]);

        yield* TestClock.adjust("2 seconds");
      }),
    );

    expect(sink.lines).toEqual(["t1: op -- 0ms, 1 call, 1 level"]);
  });

  test("activity between sweeps keeps a trace open", async () => {
    const { sink, run } = setup();

    await run(
      Effect.gen(function* () {
        const scheduler = yield* SweepScheduler;
        const registry = yield* TraceRegistry;

        yield* registry.add(event("t1", 0));
        yield* scheduler.start;

        yield* TestClock.adjust("2 seconds");
        yield* registry.add(event("t1", 30));
        yield* TestClock.adjust("2 seconds");
        expect(sink.lines).toEqual([]);

        yield* TestClock.adjust("2 seconds");
      }),
    );

    expect(sink.lines).toEqual(["t1: op -- 30ms, 2 calls, 1 level"]);
  });

  test("nothing is swept before start or after stop", async () => {
    const { sink, run } = setup();

    const running = await run(
      Effect.gen(function* () {
        const scheduler = yield* SweepScheduler;
        const registry = yield* TraceRegistry;

        yield* registry.add(event("t1", 0));
        yield* TestClock.adjust("10 seconds");

        yield* scheduler.start;
        yield* scheduler.start;
        yield* scheduler.stop;
        yield* TestClock.adjust("10 seconds");

        return yield* scheduler.isRunning;
      }),
    );

    expect(running).toBe(false);
    expect(sink.lines).toEqual([]);
  });
});
