/**
 * Errors thrown by the timeline engine.
 *
 * Every error is a local precondition violation, thrown synchronously to
 * the caller. The operation that threw leaves no partial state behind.
 */

/** Machine-readable error code carried by every {@link TimelineError}. */
export type TimelineErrorCode =
  | "INVALID_DURATION"
  | "OUT_OF_RANGE_QUERY"
  | "UNKNOWN_KEY"
  | "INVALID_FRAMERATE";

/** Base class for all timeline engine errors. */
export class TimelineError extends Error {
  readonly code: TimelineErrorCode;

  constructor(code: TimelineErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** An action was queued with a negative or non-finite duration. */
export class InvalidDurationError extends TimelineError {
  readonly duration: number;

  constructor(duration: number) {
    super("INVALID_DURATION", `Invalid action duration: ${duration}`);
    this.duration = duration;
  }
}

/** A timeline was queried at a negative (or NaN) time. */
export class OutOfRangeQueryError extends TimelineError {
  readonly time: number;

  constructor(time: number) {
    super("OUT_OF_RANGE_QUERY", `Timeline queried at ${time}, expected a time >= 0`);
    this.time = time;
  }
}

/** A custom action kind returned a snapshot missing one of its start `extra` keys. */
export class UnknownKeyError extends TimelineError {
  readonly key: string;
  readonly actionType: string;

  constructor(actionType: string, key: string) {
    super(
      "UNKNOWN_KEY",
      `Action "${actionType}" dropped state key "${key}" present in its start state`,
    );
    this.actionType = actionType;
    this.key = key;
  }
}

/** A scene was given a framerate that is not a positive finite number. */
export class InvalidFramerateError extends TimelineError {
  readonly framerate: number;

  constructor(framerate: number) {
    super("INVALID_FRAMERATE", `Invalid framerate: ${framerate}`);
    this.framerate = framerate;
  }
}
