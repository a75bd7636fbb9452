/**
 * EventIngestHandler
 *
 * Takes raw events off the transport, drops the ones that cannot be
 * aggregated, and forwards the rest to the TraceRegistry. Owns the heartbeat
 * that keeps the upstream connection from being reaped as idle.
 */

import * as Clock from "effect/Clock";
import * as Context from "effect/Context";
import * as Effect from "effect/Effect";
import * as Either from "effect/Either";
import * as Exit from "effect/Exit";
import * as Layer from "effect/Layer";
import * as Option from "effect/Option";
import * as Scope from "effect/Scope";
import * as SynchronizedRef from "effect/SynchronizedRef";
import { CrunchConfig } from "./config";
import type { TransportError } from "./errors";
import { describeSkip, toLogEvent } from "./logEvent";
import { makeTicker } from "./ticker";
import { TraceRegistry } from "./traceStore/service";
import { TraceTransport } from "./transport";

export interface EventIngestHandlerService {
  readonly onEvent: (raw: unknown) => Effect.Effect<void>;
  /** Subscribe upstream and start the heartbeat; a no-op while running */
  readonly start: Effect.Effect<void, TransportError>;
  /**
   * Stop the heartbeat, flush every in-flight trace, then unsubscribe.
   * A no-op when not running.
   */
  readonly stop: Effect.Effect<void>;
}

const make = Effect.gen(function* () {
  const registry = yield* TraceRegistry;
  const transport = yield* TraceTransport;
  const { heartbeatInterval } = yield* CrunchConfig;

  // Present while subscribed; closing it unsubscribes
  const subscription = yield* SynchronizedRef.make(
    Option.none<Scope.CloseableScope>(),
  );

  const sendHeartbeat = Clock.currentTimeMillis.pipe(
    Effect.flatMap((timestamp) => transport.send({ timestamp })),
    Effect.catchAll((error) =>
      Effect.logWarning("Heartbeat failed; retrying on next tick").pipe(
        Effect.annotateLogs("cause", String(error.cause)),
      ),
    ),
  );

  const heartbeat = yield* makeTicker(
    "heartbeat",
    heartbeatInterval,
    sendHeartbeat,
  );

  const onEvent = (raw: unknown): Effect.Effect<void> =>
    Either.match(toLogEvent(raw), {
      onLeft: (reason) => Effect.logInfo(describeSkip(reason)),
      onRight: registry.add,
    });

  const subscribe = Effect.gen(function* () {
    const scope = yield* Scope.make();
    yield* transport
      .subscribe(onEvent)
      .pipe(
        Scope.extend(scope),
        Effect.tapError(() => Scope.close(scope, Exit.void)),
      );
    yield* heartbeat.start;
    return Option.some(scope);
  });

  const start = SynchronizedRef.updateEffect(subscription, (current) =>
    Option.match(current, {
      onNone: () => subscribe,
      onSome: () => Effect.succeed(current),
    }),
  );

  const stop = SynchronizedRef.getAndSet(subscription, Option.none()).pipe(
    Effect.flatMap((current) =>
      Option.match(current, {
        onNone: () => Effect.void,
        onSome: (scope) =>
          Effect.gen(function* () {
            yield* heartbeat.stop;
            const flushed = yield* registry.stop();
            yield* Effect.logInfo(
              `Flushed ${flushed.length} in-flight trace(s)`,
            );
            yield* Scope.close(scope, Exit.void);
          }),
      }),
    ),
  );

  return { onEvent, start, stop };
});

export class EventIngestHandler extends Context.Tag(
  "trace-crunch/EventIngestHandler",
)<EventIngestHandler, EventIngestHandlerService>() {
  static readonly Live: Layer.Layer<
    EventIngestHandler,
    never,
    TraceRegistry | TraceTransport | CrunchConfig
  > = Layer.scoped(EventIngestHandler, make);
}
