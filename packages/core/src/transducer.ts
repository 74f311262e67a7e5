/**
 * Transducer Constructors, Stepping and Serialization
 */

import { Effect, Either, Schema } from "effect";
import { Packr } from "msgpackr";
import { fromSchema, ignoring } from "./codec.js";
import { DecodeError } from "./errors.js";
import type {
  EffectTransform,
  Frame,
  Func,
  FuncEffect,
  General,
  Output,
  PureTransducer,
  State,
  StateCodec,
  StateEffect,
  Transducer,
  Variant,
} from "./types.js";

// ============================================================================
// Stateless Constructors
// ============================================================================

/**
 * Lift a pure function.
 *
 * @example
 * ```ts
 * const double = fromFunction((n: number) => n * 2);
 * ```
 */
export function fromFunction<A, B>(f: (input: A) => B): Func<A, B> {
  return { _tag: "Func", f };
}

/**
 * Lift an effectful function. The effect runs on every step.
 *
 * @example
 * ```ts
 * const logged = fromEffect((n: number) => Effect.as(Effect.log(`got ${n}`), n));
 * ```
 */
export function fromEffect<A, B, E = never, R = never>(f: (input: A) => Effect.Effect<B, E, R>): FuncEffect<A, B, E, R> {
  return { _tag: "FuncEffect", f };
}

/** Ignore the input and always output `value`. */
export function constant<B, A = unknown>(value: B): Func<A, B> {
  return fromFunction(() => value);
}

/** Ignore the input and run `effect` on every step. */
export function constantEffect<B, E = never, R = never, A = unknown>(
  effect: Effect.Effect<B, E, R>,
): FuncEffect<A, B, E, R> {
  return fromEffect(() => effect);
}

export function identity<A>(): Func<A, A> {
  return fromFunction((input: A) => input);
}

// ============================================================================
// Explicit-State Constructors
// ============================================================================

/**
 * Build a pure state transducer from an explicit codec.
 */
export function fromStateWith<A, B, S>(
  codec: StateCodec<S>,
  run: (input: A, state: S) => readonly [B, S],
  state: S,
): State<A, B, S> {
  return { _tag: "State", codec, run, state };
}

/**
 * Build an effectful state transducer from an explicit codec.
 */
export function fromStateEffectWith<A, B, S, E = never, R = never>(
  codec: StateCodec<S>,
  run: (input: A, state: S) => Effect.Effect<readonly [B, S], E, R>,
  state: S,
): StateEffect<A, B, E, R, S> {
  return { _tag: "StateEffect", codec, run, state };
}

/**
 * Resuming state transducer; the state is saved through `schema`.
 *
 * @example
 * ```ts
 * // running total, output is the total before this step
 * const total = fromState(Schema.Number, (n: number, sum) => [sum, sum + n] as const, 0);
 * ```
 */
export function fromState<A, B, S, I extends Frame>(
  schema: Schema.Schema<S, I, never>,
  run: (input: A, state: S) => readonly [B, S],
  initial: S,
): State<A, B, S> {
  return fromStateWith(fromSchema(schema), run, initial);
}

/**
 * Non-resuming state transducer: saves nothing, and decoding resets it to
 * `initial`.
 */
export function fromState_<A, B, S>(run: (input: A, state: S) => readonly [B, S], initial: S): State<A, B, S> {
  return fromStateWith(ignoring(initial), run, initial);
}

export function fromStateEffect<A, B, S, I extends Frame, E = never, R = never>(
  schema: Schema.Schema<S, I, never>,
  run: (input: A, state: S) => Effect.Effect<readonly [B, S], E, R>,
  initial: S,
): StateEffect<A, B, E, R, S> {
  return fromStateEffectWith(fromSchema(schema), run, initial);
}

export function fromStateEffect_<A, B, S, E = never, R = never>(
  run: (input: A, state: S) => Effect.Effect<readonly [B, S], E, R>,
  initial: S,
): StateEffect<A, B, E, R, S> {
  return fromStateEffectWith(ignoring(initial), run, initial);
}

// ============================================================================
// Accumulators
// ============================================================================

/**
 * Fold the inputs; the output is the accumulator after the step.
 *
 * @example
 * ```ts
 * const sum = accum(Schema.Number, (acc, n: number) => acc + n, 0);
 * // inputs 1, 2, 3 -> outputs 1, 3, 6
 * ```
 */
export function accum<A, B, I extends Frame>(
  schema: Schema.Schema<B, I, never>,
  f: (acc: B, input: A) => B,
  initial: B,
): State<A, B, B> {
  return fromState(schema, (input: A, acc: B) => duplicate(f(acc, input)), initial);
}

export function accum_<A, B>(f: (acc: B, input: A) => B, initial: B): State<A, B, B> {
  return fromState_((input: A, acc: B) => duplicate(f(acc, input)), initial);
}

/**
 * Fold the inputs; the output is the accumulator before the step ("delayed").
 *
 * @example
 * ```ts
 * const sum = accumD(Schema.Number, (acc, n: number) => acc + n, 0);
 * // inputs 1, 2, 3 -> outputs 0, 1, 3
 * ```
 */
export function accumD<A, B, I extends Frame>(
  schema: Schema.Schema<B, I, never>,
  f: (acc: B, input: A) => B,
  initial: B,
): State<A, B, B> {
  return fromState(schema, (input: A, acc: B) => [acc, f(acc, input)] as const, initial);
}

export function accumD_<A, B>(f: (acc: B, input: A) => B, initial: B): State<A, B, B> {
  return fromState_((input: A, acc: B) => [acc, f(acc, input)] as const, initial);
}

export function accumEffect<A, B, I extends Frame, E = never, R = never>(
  schema: Schema.Schema<B, I, never>,
  f: (acc: B, input: A) => Effect.Effect<B, E, R>,
  initial: B,
): StateEffect<A, B, E, R, B> {
  return fromStateEffect(schema, (input: A, acc: B) => Effect.map(f(acc, input), duplicate), initial);
}

export function accumEffect_<A, B, E = never, R = never>(
  f: (acc: B, input: A) => Effect.Effect<B, E, R>,
  initial: B,
): StateEffect<A, B, E, R, B> {
  return fromStateEffect_((input: A, acc: B) => Effect.map(f(acc, input), duplicate), initial);
}

export function accumDEffect<A, B, I extends Frame, E = never, R = never>(
  schema: Schema.Schema<B, I, never>,
  f: (acc: B, input: A) => Effect.Effect<B, E, R>,
  initial: B,
): StateEffect<A, B, E, R, B> {
  return fromStateEffect(schema, (input: A, acc: B) => Effect.map(f(acc, input), (next) => [acc, next] as const), initial);
}

export function accumDEffect_<A, B, E = never, R = never>(
  f: (acc: B, input: A) => Effect.Effect<B, E, R>,
  initial: B,
): StateEffect<A, B, E, R, B> {
  return fromStateEffect_((input: A, acc: B) => Effect.map(f(acc, input), (next) => [acc, next] as const), initial);
}

function duplicate<B>(value: B): readonly [B, B] {
  return [value, value];
}

// ============================================================================
// General Constructors
// ============================================================================

export interface GeneralOptions<A, B, E, R> {
  /** Step closure; returns the output and the ready-made successor. */
  readonly step: (input: A) => Effect.Effect<Output<A, B, E, R>, E, R>;
  /** Save the state hidden in the closure. */
  readonly save: () => Frame;
  /** Rebuild an equivalent transducer from a saved frame. */
  readonly load: (frame: Frame) => Either.Either<Transducer<A, B, E, R>, DecodeError>;
}

/**
 * Build a general transducer with an explicit save thunk and load recipe.
 *
 * @example
 * ```ts
 * // alternates between two functions
 * const flipFlop = (on: boolean): Transducer<number, number> =>
 *   general({
 *     step: (n) => Effect.succeed({ result: on ? n : -n, next: flipFlop(!on) }),
 *     save: () => on,
 *     load: (frame) =>
 *       typeof frame === "boolean" ? Either.right(flipFlop(frame)) : Either.left(shapeMismatch("expected a boolean")),
 *   });
 * ```
 */
export function general<A, B, E = never, R = never>(options: GeneralOptions<A, B, E, R>): General<A, B, E, R> {
  return {
    _tag: "General",
    step: options.step,
    save: options.save,
    load: options.load,
  };
}

/**
 * Non-resuming general transducer: saves nothing, and decoding returns the
 * transducer itself.
 */
export function general_<A, B, E = never, R = never>(
  stepFn: (input: A) => Effect.Effect<Output<A, B, E, R>, E, R>,
): General<A, B, E, R> {
  const self: General<A, B, E, R> = general<A, B, E, R>({
    step: stepFn,
    save: () => null,
    load: () => Either.right(self),
  });
  return self;
}

// ============================================================================
// Stepping
// ============================================================================

const withState = <A, B>(t: State<A, B>, state: unknown): State<A, B> => ({
  _tag: "State",
  codec: t.codec,
  run: t.run,
  state,
});

const withStateEffect = <A, B, E = never, R = never>(t: StateEffect<A, B, E, R>, state: unknown): StateEffect<A, B, E, R> => ({
  _tag: "StateEffect",
  codec: t.codec,
  run: t.run,
  state,
});

/**
 * Step a transducer once.
 *
 * Stateless variants return themselves as the successor; explicit-state
 * variants rebind the same step function and codec to the new state;
 * general variants return whatever successor their closure produced.
 * Effect failures are passed through unchanged.
 */
export function step<A, B, E = never, R = never>(t: Transducer<A, B, E, R>, input: A): Effect.Effect<Output<A, B, E, R>, E, R> {
  switch (t._tag) {
    case "Func":
      return Effect.sync(() => ({ result: t.f(input), next: t }));
    case "FuncEffect":
      return Effect.map(t.f(input), (result) => ({ result, next: t }));
    case "State":
      return Effect.sync(() => {
        const [result, state] = t.run(input, t.state);
        return { result, next: withState(t, state) };
      });
    case "StateEffect":
      return Effect.map(t.run(input, t.state), ([result, state]) => ({ result, next: withStateEffect(t, state) }));
    case "General":
      return t.step(input);
  }
}

/**
 * Step a transducer without effect errors or requirements synchronously.
 *
 * Pure variants are stepped directly. Effectful variants are run with
 * `Effect.runSync`, so an effect that suspends asynchronously throws.
 */
export function stepSync<A, B>(t: PureTransducer<A, B>, input: A): Output<A, B> {
  switch (t._tag) {
    case "Func":
      return { result: t.f(input), next: t };
    case "State": {
      const [result, state] = t.run(input, t.state);
      return { result, next: withState(t, state) };
    }
    case "FuncEffect":
    case "StateEffect":
    case "General":
      return Effect.runSync(step(t, input));
  }
}

// ============================================================================
// Introspection
// ============================================================================

/** Name of the internal representation. Useful to check what a composition produced. */
export function variantName<A, B, E = never, R = never>(t: Transducer<A, B, E, R>): Variant {
  return t._tag;
}

export function isStateless<A, B, E = never, R = never>(
  t: Transducer<A, B, E, R>,
): t is Func<A, B> | FuncEffect<A, B, E, R> {
  return t._tag === "Func" || t._tag === "FuncEffect";
}

export function isEffectful<A, B, E = never, R = never>(
  t: Transducer<A, B, E, R>,
): t is FuncEffect<A, B, E, R> | StateEffect<A, B, E, R> | General<A, B, E, R> {
  return t._tag === "FuncEffect" || t._tag === "StateEffect" || t._tag === "General";
}

// ============================================================================
// Save / Load (structural)
// ============================================================================

/**
 * Save the transducer's current state as a frame.
 */
export function save<A, B, E = never, R = never>(t: Transducer<A, B, E, R>): Frame {
  switch (t._tag) {
    case "Func":
    case "FuncEffect":
      return null;
    case "State":
    case "StateEffect":
      return t.codec.save(t.state);
    case "General":
      return t.save();
  }
}

/**
 * Load a frame relative to the template `t`: same behaviour, state read
 * from the frame. Stateless templates ignore the frame.
 */
export function load<A, B, E = never, R = never>(
  t: Transducer<A, B, E, R>,
  frame: Frame,
): Either.Either<Transducer<A, B, E, R>, DecodeError> {
  switch (t._tag) {
    case "Func":
    case "FuncEffect":
      return Either.right(t);
    case "State":
      return Either.map(t.codec.load(frame), (state) => withState(t, state));
    case "StateEffect":
      return Either.map(t.codec.load(frame), (state) => withStateEffect(t, state));
    case "General":
      return t.load(frame);
  }
}

// ============================================================================
// Encode / Decode (bytes)
// ============================================================================

const packr = new Packr({ useRecords: false });

const EMPTY = new Uint8Array(0);

/**
 * Encode the transducer's state into a checkpoint. Stateless transducers,
 * and compositions with nothing to save, encode to zero bytes.
 */
export function encode<A, B, E = never, R = never>(t: Transducer<A, B, E, R>): Uint8Array {
  const frame = save(t);
  if (frame === null) {
    return EMPTY;
  }
  return Uint8Array.from(packr.pack(frame));
}

const unpackFrame = (bytes: Uint8Array): Either.Either<Frame, DecodeError> =>
  Either.try({
    try: (): Frame => packr.unpack(bytes),
    catch: (cause) =>
      new DecodeError({
        reason: "MalformedBytes",
        message: `Checkpoint bytes could not be unpacked: ${cause instanceof Error ? cause.message : String(cause)}`,
        cause,
      }),
  });

/**
 * Resume the template `t` from a checkpoint produced by `encode`.
 *
 * Stateless templates always succeed and return themselves. Otherwise empty
 * bytes fail with `InsufficientBytes`, bytes that cannot be unpacked with
 * `MalformedBytes`, and bytes that do not fit the template's state layout
 * with `ShapeMismatch`.
 *
 * @example
 * ```ts
 * const sum = accum(Schema.Number, (acc, n: number) => acc + n, 0);
 * const bytes = encode(overListSync(sum, [1, 2, 3])[1]);
 * const resumed = Either.getOrThrow(decode(sum, bytes));
 * stepSync(resumed, 4).result; // 10
 * ```
 */
export function decode<A, B, E = never, R = never>(
  t: Transducer<A, B, E, R>,
  bytes: Uint8Array,
): Either.Either<Transducer<A, B, E, R>, DecodeError> {
  if (isStateless(t)) {
    return Either.right(t);
  }
  if (bytes.length === 0) {
    return Either.mapLeft(
      load(t, null),
      (error) =>
        new DecodeError({
          reason: "InsufficientBytes",
          message: `Checkpoint is empty but the ${t._tag} template expects state`,
          cause: error,
        }),
    );
  }
  return Either.flatMap(unpackFrame(bytes), (frame) => load(t, frame));
}

/** `decode` in the Effect error channel. */
export function decodeEffect<A, B, E = never, R = never>(
  t: Transducer<A, B, E, R>,
  bytes: Uint8Array,
): Effect.Effect<Transducer<A, B, E, R>, DecodeError> {
  return Effect.suspend(() => decode(t, bytes));
}

// ============================================================================
// Representation Utilities
// ============================================================================

/**
 * Re-express any transducer as a General one with the same behaviour and
 * the same saved layout.
 */
export function toGeneral<A, B, E = never, R = never>(t: Transducer<A, B, E, R>): General<A, B, E, R> {
  if (t._tag === "General") {
    return t;
  }
  return general<A, B, E, R>({
    step: (input) => Effect.map(step(t, input), (out) => ({ result: out.result, next: toGeneral(out.next) })),
    save: () => save(t),
    load: (frame) => Either.map(load(t, frame), toGeneral),
  });
}

/**
 * Transform the effect of every step. Pure variants are returned as-is.
 *
 * @example
 * ```ts
 * const quiet = hoist(noisy, (effect) => Effect.withLogSpan(effect, "noisy"));
 * ```
 */
export function hoist<A, B, E = never, R = never, E2 = never, R2 = never>(
  t: Transducer<A, B, E, R>,
  transform: EffectTransform<E, R, E2, R2>,
): Transducer<A, B, E2, R2> {
  switch (t._tag) {
    case "Func":
    case "State":
      return t;
    case "FuncEffect":
      return fromEffect((input: A) => transform(t.f(input)));
    case "StateEffect":
      return fromStateEffectWith(t.codec, (input: A, state) => transform(t.run(input, state)), t.state);
    case "General":
      return general<A, B, E2, R2>({
        step: (input) =>
          transform(Effect.map(t.step(input), (out) => ({ result: out.result, next: hoist(out.next, transform) }))),
        save: t.save,
        load: (frame) => Either.map(t.load(frame), (loaded) => hoist(loaded, transform)),
      });
  }
}
