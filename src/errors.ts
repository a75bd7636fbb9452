import * as Data from "effect/Data";

/** The upstream connection failed to connect, send, or close */
export class TransportError extends Data.TaggedError("TransportError")<{
  readonly operation: "connect" | "send" | "close";
  readonly cause: unknown;
}> {}

/** A finished-trace line could not be written */
export class OutputError extends Data.TaggedError("OutputError")<{
  readonly line: string;
  readonly cause: unknown;
}> {}

export class EventDecodeError extends Data.TaggedError("EventDecodeError")<{
  readonly message: string;
}> {}
