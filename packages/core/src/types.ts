/**
 * Stepwise Core Types
 *
 * A transducer consumes one input per step and yields one output together
 * with its successor. It is a closed union of five representations so that
 * composition can keep the cheapest one that is still correct:
 * - Func / FuncEffect: stateless, pure or effectful
 * - State / StateEffect: explicit state carried by value, with its codec
 * - General: an arbitrary closure producing the successor itself
 */

import type { Effect, Either } from "effect";
import type { DecodeError } from "./errors.js";

// ============================================================================
// Frames
// ============================================================================

/**
 * The structural, msgpack-safe form a transducer's state is saved to before
 * it is packed into bytes. `null` means "nothing to save"; compositions
 * save a two-element array of their operands' frames.
 */
export type Frame = null | boolean | number | string | ReadonlyArray<Frame> | FrameRecord;

export interface FrameRecord {
  readonly [key: string]: Frame;
}

// ============================================================================
// State Codecs
// ============================================================================

/**
 * Saves a state value to a frame and loads it back.
 *
 * Declared with method syntax so that a codec for a concrete state type can
 * be stored where the state type has been erased.
 */
export interface StateCodec<S> {
  save(state: S): Frame;
  load(frame: Frame): Either.Either<S, DecodeError>;
}

// ============================================================================
// Step Output
// ============================================================================

/**
 * The full result of one step: the output value and the successor.
 */
export interface Output<A, B, E = never, R = never> {
  readonly result: B;
  readonly next: Transducer<A, B, E, R>;
}

// ============================================================================
// Variants
// ============================================================================

/** Stateless, pure: `a => b`. */
export interface Func<A, B> {
  readonly _tag: "Func";
  readonly f: (input: A) => B;
}

/** Stateless, effectful: `a => Effect<b>`. */
export interface FuncEffect<A, B, E = never, R = never> {
  readonly _tag: "FuncEffect";
  readonly f: (input: A) => Effect.Effect<B, E, R>;
}

/**
 * Explicit state, pure: `(a, s) => [b, s]`.
 * The union stores `State<A, B>`; `run`, `codec` and `state` agree on `S`.
 */
export interface State<A, B, S = unknown> {
  readonly _tag: "State";
  readonly codec: StateCodec<S>;
  run(input: A, state: S): readonly [B, S];
  readonly state: S;
}

/** Explicit state, effectful: `(a, s) => Effect<[b, s]>`. */
export interface StateEffect<A, B, E = never, R = never, S = unknown> {
  readonly _tag: "StateEffect";
  readonly codec: StateCodec<S>;
  run(input: A, state: S): Effect.Effect<readonly [B, S], E, R>;
  readonly state: S;
}

/**
 * General: the step closure returns the successor directly, so the state
 * lives inside the closure. `save` captures it; `load` is the recipe that
 * rebuilds an equivalent transducer from a frame.
 */
export interface General<A, B, E = never, R = never> {
  readonly _tag: "General";
  readonly step: (input: A) => Effect.Effect<Output<A, B, E, R>, E, R>;
  readonly save: () => Frame;
  readonly load: (frame: Frame) => Either.Either<Transducer<A, B, E, R>, DecodeError>;
}

export type Transducer<A, B, E = never, R = never> =
  | Func<A, B>
  | FuncEffect<A, B, E, R>
  | State<A, B>
  | StateEffect<A, B, E, R>
  | General<A, B, E, R>;

export type Variant = Transducer<unknown, unknown>["_tag"];

/** A transducer with no effect errors or requirements; it can be stepped synchronously. */
export type PureTransducer<A, B> = Transducer<A, B, never, never>;

// ============================================================================
// Type Helpers
// ============================================================================

/**
 * A natural transformation over the effect of a step, used by `hoist`.
 */
export type EffectTransform<E, R, E2, R2> = <X>(effect: Effect.Effect<X, E, R>) => Effect.Effect<X, E2, R2>;
