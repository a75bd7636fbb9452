import * as Socket from "@effect/platform/Socket";
import * as Context from "effect/Context";
import * as Effect from "effect/Effect";
import * as Either from "effect/Either";
import * as Fiber from "effect/Fiber";
import * as Layer from "effect/Layer";
import * as Ref from "effect/Ref";
import * as Schedule from "effect/Schedule";
import * as Schema from "effect/Schema";
import type * as Scope from "effect/Scope";
import { TransportError } from "./errors";
import type { LogAck } from "./logEvent";

/**
 * Upstream tracing service: delivers raw log events and accepts keep-alive
 * acknowledgements.
 */
export interface TraceTransportService {
  /**
   * Feed every incoming event to `onEvent` until the scope closes.
   */
  readonly subscribe: (
    onEvent: (raw: unknown) => Effect.Effect<void>,
  ) => Effect.Effect<void, TransportError, Scope.Scope>;
  readonly send: (ack: LogAck) => Effect.Effect<void, TransportError>;
}

export class TraceTransport extends Context.Tag("trace-crunch/TraceTransport")<
  TraceTransport,
  TraceTransportService
>() {
  static readonly webSocket = (
    url: string,
  ): Layer.Layer<TraceTransport, never, Socket.WebSocketConstructor> =>
    Layer.scoped(TraceTransport, makeWebSocketTransport(url));
}

// =============================================================================
// Wire Frames
// =============================================================================

/**
 * Frames are JSON objects tagged by `type`:
 *   -> { type: "subscribe" }
 *   -> { type: "logAck", timestamp }
 *   <- { type: "log", event: { ...wire event } }
 */
const IncomingFrame = Schema.parseJson(
  Schema.Struct({
    type: Schema.String,
    event: Schema.optional(Schema.Unknown),
  }),
);

const decodeFrame = Schema.decodeUnknownEither(IncomingFrame);

const SUBSCRIBE_FRAME = JSON.stringify({ type: "subscribe" });

const ackFrame = (ack: LogAck): string =>
  JSON.stringify({ type: "logAck", timestamp: ack.timestamp });

const decoder = new TextDecoder();

/**
 * Route one raw socket message to the subscriber
 */
export const handleMessage =
  (onEvent: (raw: unknown) => Effect.Effect<void>) =>
  (data: string | Uint8Array): Effect.Effect<void> => {
    const text = typeof data === "string" ? data : decoder.decode(data);
    return Either.match(decodeFrame(text), {
      onLeft: () => Effect.logInfo(`Skip unparseable frame: ${text.slice(0, 120)}`),
      onRight: (frame) =>
        frame.type === "log"
          ? onEvent(frame.event)
          : Effect.logDebug(`Ignoring ${frame.type} frame`),
    });
  };

// =============================================================================
// WebSocket Implementation
// =============================================================================

/** Reconnect backoff after the connection drops */
const reconnectSchedule = Schedule.exponential("500 millis").pipe(
  Schedule.union(Schedule.spaced("30 seconds")),
);

export const makeWebSocketTransport = (url: string) =>
  Effect.gen(function* () {
    const socket = yield* Socket.makeWebSocket(url);
    const write = yield* socket.writer;
    // True between a subscribe frame and the end of that connection
    const connected = yield* Ref.make(false);

    const send = (ack: LogAck): Effect.Effect<void, TransportError> =>
      Ref.get(connected).pipe(
        Effect.flatMap((open) =>
          open
            ? write(ackFrame(ack))
            : Effect.fail(new Error(`Not connected to ${url}`)),
        ),
        Effect.mapError((cause) => new TransportError({ operation: "send", cause })),
      );

    const subscribe = (onEvent: (raw: unknown) => Effect.Effect<void>) => {
      // Each run opens a fresh connection, so the subscription is re-sent per attempt
      const connection = Effect.gen(function* () {
        const reader = yield* Effect.fork(socket.runRaw(handleMessage(onEvent)));
        yield* write(SUBSCRIBE_FRAME);
        yield* Ref.set(connected, true);
        yield* Effect.logInfo(`Subscribed to ${url}`);
        yield* Fiber.join(reader);
      }).pipe(
        Effect.ensuring(Ref.set(connected, false)),
        Effect.mapError((cause) => new TransportError({ operation: "connect", cause })),
        // A clean close still leaves us without events
        Effect.zipRight(
          Effect.fail(
            new TransportError({ operation: "connect", cause: "closed by peer" }),
          ),
        ),
      );

      return connection.pipe(
        Effect.tapError((error) =>
          Effect.logWarning(`Connection to ${url} lost; reconnecting`).pipe(
            Effect.annotateLogs("cause", String(error.cause)),
          ),
        ),
        Effect.retry(reconnectSchedule),
        Effect.onInterrupt(() => Effect.logDebug(`Unsubscribed from ${url}`)),
        Effect.interruptible,
        Effect.forkScoped,
        Effect.asVoid,
      );
    };

    return TraceTransport.of({ send, subscribe });
  });

// =============================================================================
// Memory Implementation (for testing)
// =============================================================================

/**
 * Creates an in-process transport. `deliver` pushes a raw event to the current
 * subscriber; the first `failSends` sends fail.
 */
export const makeMemoryTransport = (options: { readonly failSends?: number } = {}) => {
  const sent: Array<LogAck> = [];
  let failuresLeft = options.failSends ?? 0;
  let subscriber: ((raw: unknown) => Effect.Effect<void>) | null = null;

  const layer = Layer.succeed(
    TraceTransport,
    TraceTransport.of({
      subscribe: (onEvent) =>
        Effect.acquireRelease(
          Effect.sync(() => {
            subscriber = onEvent;
          }),
          () =>
            Effect.sync(() => {
              subscriber = null;
            }),
        ),
      send: (ack) =>
        Effect.suspend(() => {
          if (failuresLeft > 0) {
            failuresLeft -= 1;
            return Effect.fail(
              new TransportError({ operation: "send", cause: "connection reset" }),
            );
          }
          sent.push(ack);
          return Effect.void;
        }),
    }),
  );

  return {
    layer,
    sent,
    isSubscribed: (): boolean => subscriber !== null,
    deliver: (raw: unknown): Effect.Effect<void> =>
      Effect.suspend(() => (subscriber === null ? Effect.void : subscriber(raw))),
  };
};
