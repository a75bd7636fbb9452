import * as Context from "effect/Context";
import * as Effect from "effect/Effect";
import * as Layer from "effect/Layer";
import { CrunchConfig } from "./config";
import { makeTicker } from "./ticker";
import { TraceRegistry } from "./traceStore/service";

/**
 * Drives `TraceRegistry.sweep(false)` once per sweep interval.
 */
export class SweepScheduler extends Context.Tag("trace-crunch/SweepScheduler")<
  SweepScheduler,
  {
    readonly start: Effect.Effect<void>;
    readonly stop: Effect.Effect<void>;
    readonly isRunning: Effect.Effect<boolean>;
  }
>() {
  static readonly Live: Layer.Layer<
    SweepScheduler,
    never,
    TraceRegistry | CrunchConfig
  > = Layer.scoped(
    SweepScheduler,
    Effect.gen(function* () {
      const registry = yield* TraceRegistry;
      const { sweepInterval } = yield* CrunchConfig;
      return yield* makeTicker("sweep", sweepInterval, registry.sweep(false));
    }),
  );
}
