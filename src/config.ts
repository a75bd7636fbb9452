/**
 * Configuration
 *
 * Every knob is optional and read from the environment through effect/Config.
 * Tests build the service directly with `CrunchConfig.make`.
 */

import * as Config from "effect/Config";
import * as Context from "effect/Context";
import * as Duration from "effect/Duration";
import * as Layer from "effect/Layer";
import * as LogLevel from "effect/LogLevel";
import * as Option from "effect/Option";
import { DEFAULT_IDLE_CREDITS } from "./traceStore/types";

export interface CrunchSettings {
  /** WebSocket URL of the upstream tracing service */
  readonly url: string;
  readonly sweepInterval: Duration.Duration;
  /** Sweep ticks of silence tolerated before a trace is finalized */
  readonly idleCredits: number;
  readonly heartbeatInterval: Duration.Duration;
  /** Append summaries to this file instead of stdout */
  readonly output: Option.Option<string>;
  readonly logLevel: LogLevel.LogLevel;
}

export const defaults: CrunchSettings = {
  url: "ws://localhost:52690",
  sweepInterval: Duration.seconds(2),
  idleCredits: DEFAULT_IDLE_CREDITS,
  heartbeatInterval: Duration.seconds(15),
  output: Option.none(),
  logLevel: LogLevel.Info,
};

const positiveDuration = (name: string, fallback: Duration.Duration) =>
  Config.duration(name).pipe(
    Config.withDefault(fallback),
    Config.validate({
      message: "Expected a positive duration",
      validation: (duration: Duration.Duration) =>
        Duration.greaterThan(duration, Duration.zero),
    }),
  );

export const settingsConfig: Config.Config<CrunchSettings> = Config.all({
  url: Config.string("TRACE_CRUNCH_URL").pipe(Config.withDefault(defaults.url)),
  sweepInterval: positiveDuration(
    "TRACE_CRUNCH_SWEEP_INTERVAL",
    defaults.sweepInterval,
  ),
  idleCredits: Config.integer("TRACE_CRUNCH_IDLE_CREDITS").pipe(
    Config.withDefault(defaults.idleCredits),
    Config.validate({
      message: "Expected at least one idle credit",
      validation: (credits: number) => credits >= 1,
    }),
  ),
  heartbeatInterval: positiveDuration(
    "TRACE_CRUNCH_HEARTBEAT_INTERVAL",
    defaults.heartbeatInterval,
  ),
  output: Config.option(Config.string("TRACE_CRUNCH_OUTPUT")),
  logLevel: Config.logLevel("TRACE_CRUNCH_LOG_LEVEL").pipe(
    Config.withDefault(defaults.logLevel),
  ),
});

export class CrunchConfig extends Context.Tag("trace-crunch/CrunchConfig")<
  CrunchConfig,
  CrunchSettings
>() {
  static readonly Live = Layer.effect(CrunchConfig, settingsConfig);

  static readonly make = (
    overrides: Partial<CrunchSettings> = {},
  ): Layer.Layer<CrunchConfig> =>
    Layer.succeed(CrunchConfig, { ...defaults, ...overrides });
}
