/**
 * trace-crunch Runtime
 *
 * Wires the registry, ingest handler and sweep scheduler together and runs
 * them until interrupted. On shutdown the sweep ticker is cancelled first,
 * then the ingest handler flushes every in-flight trace and unsubscribes.
 */

import * as Duration from "effect/Duration";
import * as Effect from "effect/Effect";
import * as Layer from "effect/Layer";
import * as Option from "effect/Option";
import * as NodeFileSystem from "@effect/platform-node/NodeFileSystem";
import * as NodeSocket from "@effect/platform-node/NodeSocket";
import { CrunchConfig, type CrunchSettings } from "./config";
import { EventIngestHandler } from "./ingestHandler";
import { OutputSink } from "./outputSink";
import { SweepScheduler } from "./sweepScheduler";
import { TraceRegistryLive } from "./traceStore/service";
import { TraceTransport } from "./transport";

/**
 * The main Effect program that:
 * 1. Subscribes to the tracing service and starts the heartbeat
 * 2. Starts the periodic sweep
 * 3. Waits until interrupted, then releases both in reverse order
 */
export const program = Effect.gen(function* () {
  const ingest = yield* EventIngestHandler;
  const scheduler = yield* SweepScheduler;
  const { url, sweepInterval, idleCredits } = yield* CrunchConfig;

  // Finalizers run in reverse: the sweep stops before the ingest flush
  yield* ingest.start;
  yield* Effect.addFinalizer(() => ingest.stop);
  yield* scheduler.start;
  yield* Effect.addFinalizer(() => scheduler.stop);

  yield* Effect.logInfo(
    `Crunching traces from ${url}: finalizing after ${idleCredits} idle sweep(s)`,
  ).pipe(Effect.annotateLogs("sweepInterval", Duration.format(sweepInterval)));

  return yield* Effect.never;
}).pipe(Effect.scoped);

/**
 * Services the program needs, built from already-loaded settings.
 * Transport and sink are injectable so the same wiring runs in tests.
 */
export const makeAppLayer = <E, R>(
  settings: CrunchSettings,
  infrastructure: Layer.Layer<TraceTransport | OutputSink, E, R>,
) =>
  Layer.mergeAll(EventIngestHandler.Live, SweepScheduler.Live).pipe(
    Layer.provide(TraceRegistryLive),
    Layer.provide(infrastructure),
    Layer.provideMerge(CrunchConfig.make(settings)),
  );

/** WebSocket transport plus the console or file sink, on Node */
export const makeNodeInfrastructure = (settings: CrunchSettings) =>
  Layer.mergeAll(
    TraceTransport.webSocket(settings.url),
    Option.match(settings.output, {
      onNone: () => OutputSink.Console,
      onSome: (path) => OutputSink.file(path),
    }),
  ).pipe(
    Layer.provide(
      Layer.mergeAll(
        NodeSocket.layerWebSocketConstructor,
        NodeFileSystem.layer,
      ),
    ),
  );
