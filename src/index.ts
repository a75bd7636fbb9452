#!/usr/bin/env node
import * as NodeRuntime from "@effect/platform-node/NodeRuntime";
import * as Effect from "effect/Effect";
import * as Logger from "effect/Logger";
import { settingsConfig } from "./config";
import { makeAppLayer, makeNodeInfrastructure, program } from "./runtime";

/**
 * trace-crunch - one line per finished trace
 *
 * Configuration comes from TRACE_CRUNCH_* environment variables.
 * Ctrl+C flushes every in-flight trace before exiting.
 */
const main = Effect.gen(function* () {
  const settings = yield* settingsConfig;

  yield* program.pipe(
    Effect.provide(makeAppLayer(settings, makeNodeInfrastructure(settings))),
    Logger.withMinimumLogLevel(settings.logLevel),
  );
}).pipe(
  // Summaries own stdout; diagnostics go to stderr
  Effect.provide(
    Logger.replace(Logger.defaultLogger, Logger.prettyLogger({ stderr: true })),
  ),
);

NodeRuntime.runMain(main);
