/**
 * OutputSink - where finished-trace lines go
 *
 * Console for interactive use, append-to-file when TRACE_CRUNCH_OUTPUT is set.
 */

import * as Console from "effect/Console";
import * as Context from "effect/Context";
import * as Effect from "effect/Effect";
import * as Layer from "effect/Layer";
import * as FileSystem from "@effect/platform/FileSystem";
import { OutputError } from "./errors";

// =============================================================================
// Service Definition
// =============================================================================

export interface OutputSinkService {
  readonly write: (line: string) => Effect.Effect<void, OutputError>;
}

export class OutputSink extends Context.Tag("trace-crunch/OutputSink")<
  OutputSink,
  OutputSinkService
>() {
  static readonly Console: Layer.Layer<OutputSink> = Layer.succeed(OutputSink, {
    write: (line) => Console.log(line),
  });

  static readonly file = (
    path: string,
  ): Layer.Layer<OutputSink, never, FileSystem.FileSystem> =>
    Layer.effect(
      OutputSink,
      Effect.gen(function* () {
        const fs = yield* FileSystem.FileSystem;
        return {
          write: (line) =>
            fs
              .writeFileString(path, `${line}\n`, { flag: "a" })
              .pipe(Effect.mapError((cause) => new OutputError({ line, cause }))),
        };
      }),
    );
}

// =============================================================================
// Memory Implementation (for testing)
// =============================================================================

/**
 * Creates a sink that collects lines in an array.
 * Useful for asserting on registry output without touching stdout.
 */
export const makeMemorySink = (): {
  readonly lines: ReadonlyArray<string>;
  readonly layer: Layer.Layer<OutputSink>;
} => {
  const lines: Array<string> = [];
  return {
    lines,
    layer: Layer.succeed(OutputSink, {
      write: (line) =>
        Effect.sync(() => {
          lines.push(line);
        }),
    }),
  };
};
