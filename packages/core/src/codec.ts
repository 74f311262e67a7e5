/**
 * State Codecs
 *
 * Every state-carrying transducer holds a codec next to its state. Codecs
 * save to frames (see `Frame`); frames of composed transducers nest as
 * `[outer, inner]` pairs, collapsing to `null` when neither side has
 * anything to save.
 */

import { Either, Schema } from "effect";
import { shapeMismatch, type DecodeError } from "./errors.js";
import type { Frame, StateCodec } from "./types.js";

// ============================================================================
// Frame Pairs
// ============================================================================

function describeFrame(frame: Frame): string {
  if (frame === null) return "null";
  if (Array.isArray(frame)) return `an array of length ${frame.length}`;
  return typeof frame;
}

const isFramePair = (frame: Frame): frame is readonly [Frame, Frame] => Array.isArray(frame) && frame.length === 2;

/**
 * Join two frames into one. Two empty frames stay empty.
 */
export function pairFrames(first: Frame, second: Frame): Frame {
  return first === null && second === null ? null : [first, second];
}

/**
 * Split a frame produced by `pairFrames`.
 */
export function splitFrame(frame: Frame): Either.Either<readonly [Frame, Frame], DecodeError> {
  if (frame === null) {
    return Either.right([null, null] as const);
  }
  if (isFramePair(frame)) {
    return Either.right([frame[0], frame[1]] as const);
  }
  return Either.left(shapeMismatch(`Expected a pair frame, got ${describeFrame(frame)}`));
}

// ============================================================================
// Codecs
// ============================================================================

/**
 * Codec backed by an Effect Schema. The schema's encoded side must be a
 * `Frame`: numbers, strings, booleans, null, arrays and plain objects.
 *
 * @example
 * ```ts
 * const counter = fromSchema(Schema.Number);
 * const held = fromSchema(Schema.Option(Schema.String));
 * ```
 */
export function fromSchema<S, I extends Frame>(schema: Schema.Schema<S, I, never>): StateCodec<S> {
  const encode = Schema.encodeSync(schema);
  const decode = Schema.decodeUnknownEither(schema);
  return {
    save: (state) => encode(state),
    load: (frame) => Either.mapLeft(decode(frame), (error) => shapeMismatch(error.message, error)),
  };
}

/**
 * Codec for non-resuming transducers: saves nothing and always loads the
 * given initial state.
 */
export function ignoring<S>(initial: S): StateCodec<S> {
  return {
    save: () => null,
    load: () => Either.right(initial),
  };
}

/**
 * Codec for a pair of states, saved as a pair of frames.
 */
export function pair<X, Y>(first: StateCodec<X>, second: StateCodec<Y>): StateCodec<readonly [X, Y]> {
  return {
    save: ([x, y]) => pairFrames(first.save(x), second.save(y)),
    load: (frame) =>
      Either.flatMap(splitFrame(frame), ([fx, fy]) => Either.all([first.load(fx), second.load(fy)] as const)),
  };
}

/**
 * Codec that saves its state in the first slot of a pair frame, leaving the
 * second slot empty. Used when a stateful transducer is composed with a
 * stateless one, so the saved layout matches the general composition.
 */
export function inFirst<S>(codec: StateCodec<S>): StateCodec<S> {
  return {
    save: (state) => pairFrames(codec.save(state), null),
    load: (frame) => Either.flatMap(splitFrame(frame), ([first]) => codec.load(first)),
  };
}

/** Mirror of `inFirst`. */
export function inSecond<S>(codec: StateCodec<S>): StateCodec<S> {
  return {
    save: (state) => pairFrames(null, codec.save(state)),
    load: (frame) => Either.flatMap(splitFrame(frame), ([, second]) => codec.load(second)),
  };
}
