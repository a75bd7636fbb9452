import { describe, test, expect } from "vitest";
import * as ConfigProvider from "effect/ConfigProvider";
import * as Duration from "effect/Duration";
import * as Effect from "effect/Effect";
import * as Exit from "effect/Exit";
import * as LogLevel from "effect/LogLevel";
import * as Option from "effect/Option";
import { CrunchConfig, defaults, settingsConfig } from "./config";

const loadFrom = (env: Record<string, string>) =>
  Effect.runPromiseExit(
    settingsConfig.pipe(
      Effect.withConfigProvider(
        ConfigProvider.fromMap(new Map(Object.entries(env))),
      ),
    ),
  );

describe("settingsConfig", () => {
  test("falls back to defaults when nothing is set", async () => {
    const exit = await loadFrom({});

    expect(Exit.isSuccess(exit)).toBe(true);
    if (Exit.isSuccess(exit)) {
      const settings = exit.value;
      expect(settings.url).toBe("ws://localhost:52690");
      expect(Duration.toMillis(settings.sweepInterval)).toBe(2_000);
      expect(settings.idleCredits).toBe(2);
      expect(Duration.toMillis(settings.heartbeatInterval)).toBe(15_000);
      expect(Option.isNone(settings.output)).toBe(true);
      expect(settings.logLevel).toBe(LogLevel.Info);
    }
  });

  test("reads every TRACE_CRUNCH_ variable", async () => {
    const exit = await loadFrom({
      TRACE_CRUNCH_URL: "ws://tracing.test:9000",
      TRACE_CRUNCH_SWEEP_INTERVAL: "500 millis",
      TRACE_CRUNCH_IDLE_CREDITS: "4",
      TRACE_CRUNCH_HEARTBEAT_INTERVAL: "1 minute",
      TRACE_CRUNCH_OUTPUT: "/tmp/traces.log",
      TRACE_CRUNCH_LOG_LEVEL: "Debug",
    });

    expect(Exit.isSuccess(exit)).toBe(true);
    if (Exit.isSuccess(exit)) {
      const settings = exit.value;
      expect(settings.url).toBe("ws://tracing.test:9000");
      expect(Duration.toMillis(settings.sweepInterval)).toBe(500);
      expect(settings.idleCredits).toBe(4);
      expect(Duration.toMillis(settings.heartbeatInterval)).toBe(60_000);
      expect(settings.output).toEqual(Option.some("/tmp/traces.log"));
      expect(settings.logLevel).toBe(LogLevel.Debug);
    }
  });

  test.each([
    ["zero idle credits", { TRACE_CRUNCH_IDLE_CREDITS: "0" }],
    ["non-numeric idle credits", { TRACE_CRUNCH_IDLE_CREDITS: "lots" }],
    ["a zero sweep interval", { TRACE_CRUNCH_SWEEP_INTERVAL: "0 millis" }],
    ["an unparseable heartbeat", { TRACE_CRUNCH_HEARTBEAT_INTERVAL: "often" }],
    ["an unknown log level", { TRACE_CRUNCH_LOG_LEVEL: "Chatty" }],
  ])("rejects %s", async (_, env) => {
    const exit = await loadFrom(env);

    expect(Exit.isFailure(exit)).toBe(true);
  });
});

describe("CrunchConfig.make", () => {
  test("merges overrides onto the defaults", async () => {
    const settings = await Effect.runPromise(
      CrunchConfig.pipe(Effect.provide(CrunchConfig.make({ idleCredits: 5 }))),
    );

    expect(settings).toEqual({ ...defaults, idleCredits: 5 });
  });
});
