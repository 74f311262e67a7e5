/**
 * Intervals - on/off gating of a value stream.
 *
 * An interval is a transducer whose output is an `Option`: `Some(x)` means
 * "on" with `x` for this step, `None` means "off". Sources here are
 * stateless or explicit-state transducers, so they compose flat and
 * serialize without falling back to General.
 */

import { Effect, Either, Option, Schema } from "effect";
import { isBlip, type Blip } from "./blip.js";
import { map, zipAll, zipWith } from "./compose.js";
import { constant, fromEffect, fromFunction, fromState, fromState_, fromStateEffectWith, fromStateWith, general } from "./transducer.js";
import type { Frame, Func, General, State, Transducer } from "./types.js";

export type Interval<A, B, E = never, R = never> = Transducer<A, Option.Option<B>, E, R>;

// ============================================================================
// Constant & Collapsing
// ============================================================================

/** Always off. */
export function off<A, B = never>(): Func<A, Option.Option<B>> {
  return constant(Option.none());
}

/** Always on, passing the input through. */
export function toOn<A>(): Func<A, Option.Option<A>> {
  return fromFunction((input: A) => Option.some(input));
}

/** Replace "off" with `onOff`. */
export function fromInterval<A>(onOff: A): Func<Option.Option<A>, A> {
  return fromFunction((input: Option.Option<A>) => Option.getOrElse(input, () => onOff));
}

/** `f(x)` while on, `onOff` while off. */
export function fromIntervalWith<A, B>(onOff: B, f: (value: A) => B): Func<Option.Option<A>, B> {
  return fromFunction((input: Option.Option<A>) => Option.match(input, { onNone: () => onOff, onSome: f }));
}

// ============================================================================
// Countdowns
// ============================================================================

/** Clamp a step count to a safe integer of at least 0. NaN counts as 0. */
function steps(n: number): number {
  if (Number.isNaN(n)) return 0;
  return Math.min(Number.MAX_SAFE_INTEGER, Math.max(0, Math.trunc(n)));
}

function onForStep<A>(input: A, remaining: number): readonly [Option.Option<A>, number] {
  return remaining === 0 ? [Option.none(), 0] : [Option.some(input), remaining - 1];
}

function offForStep<A>(input: A, remaining: number): readonly [Option.Option<A>, number] {
  return remaining === 0 ? [Option.some(input), 0] : [Option.none(), remaining - 1];
}

/**
 * On for the first `n` steps, then off forever.
 *
 * @example
 * ```ts
 * overListSync(onFor(2), [10, 20, 30, 40])[0];
 * // [Some(10), Some(20), None, None]
 * ```
 */
export function onFor<A>(n: number): State<A, Option.Option<A>, number> {
  return fromState(Schema.Int, onForStep<A>, steps(n));
}

export function onFor_<A>(n: number): State<A, Option.Option<A>, number> {
  return fromState_(onForStep<A>, steps(n));
}

/** Off for the first `n` steps, then on forever. */
export function offFor<A>(n: number): State<A, Option.Option<A>, number> {
  return fromState(Schema.Int, offForStep<A>, steps(n));
}

export function offFor_<A>(n: number): State<A, Option.Option<A>, number> {
  return fromState_(offForStep<A>, steps(n));
}

// ============================================================================
// Predicates
// ============================================================================

/** On exactly when `p` holds for the input. */
export function when<A>(p: (input: A) => boolean): Func<A, Option.Option<A>> {
  return fromFunction((input: A) => (p(input) ? Option.some(input) : Option.none()));
}

/** On exactly when `p` does not hold for the input. */
export function unless<A>(p: (input: A) => boolean): Func<A, Option.Option<A>> {
  return fromFunction((input: A) => (p(input) ? Option.none() : Option.some(input)));
}

// ============================================================================
// Event Triggered
// ============================================================================

function afterStep<A, X>(
  [input, event]: readonly [A, Blip<X>],
  seen: boolean,
): readonly [Option.Option<A>, boolean] {
  return seen || isBlip(event) ? [Option.some(input), true] : [Option.none(), false];
}

function beforeStep<A, X>(
  [input, event]: readonly [A, Blip<X>],
  seen: boolean,
): readonly [Option.Option<A>, boolean] {
  return seen || isBlip(event) ? [Option.none(), true] : [Option.some(input), false];
}

/** Off until the blip first occurs (inclusive of that step), then on forever. */
export function after<A, X>(): State<readonly [A, Blip<X>], Option.Option<A>, boolean> {
  return fromState(Schema.Boolean, afterStep<A, X>, false);
}

export function after_<A, X>(): State<readonly [A, Blip<X>], Option.Option<A>, boolean> {
  return fromState_(afterStep<A, X>, false);
}

/** On until the blip first occurs, then off forever (off on that step too). */
export function before<A, X>(): State<readonly [A, Blip<X>], Option.Option<A>, boolean> {
  return fromState(Schema.Boolean, beforeStep<A, X>, false);
}

export function before_<A, X>(): State<readonly [A, Blip<X>], Option.Option<A>, boolean> {
  return fromState_(beforeStep<A, X>, false);
}

function betweenStep<A, X, Y>(
  [input, [start, end]]: readonly [A, readonly [Blip<X>, Blip<Y>]],
  on: boolean,
): readonly [Option.Option<A>, boolean] {
  // end wins when both occur on the same step
  if (isBlip(end)) return [Option.none(), false];
  if (isBlip(start)) return [Option.some(input), true];
  return on ? [Option.some(input), true] : [Option.none(), false];
}

/**
 * Turns on when the start blip occurs and off when the end blip occurs.
 * Starts off.
 *
 * @example
 * ```ts
 * // counts 1..7, start at step 3, end at step 5
 * // -> [None, None, Some(3), Some(4), None, None, None]
 * ```
 */
export function between<A, X, Y>(): State<readonly [A, readonly [Blip<X>, Blip<Y>]], Option.Option<A>, boolean> {
  return fromState(Schema.Boolean, betweenStep<A, X, Y>, false);
}

export function between_<A, X, Y>(): State<readonly [A, readonly [Blip<X>, Blip<Y>]], Option.Option<A>, boolean> {
  return fromState_(betweenStep<A, X, Y>, false);
}

// ============================================================================
// Holding Events
// ============================================================================

function holdStep<A>(event: Blip<A>, last: Option.Option<A>): readonly [Option.Option<A>, Option.Option<A>] {
  const next = isBlip(event) ? Option.some(event.value) : last;
  return [next, next];
}

/**
 * Off until the first blip, then on with the most recent payload.
 */
export function hold<A, I extends Frame>(schema: Schema.Schema<A, I, never>): State<Blip<A>, Option.Option<A>, Option.Option<A>> {
  return fromState(Schema.Option(schema), holdStep<A>, Option.none());
}

export function hold_<A>(): State<Blip<A>, Option.Option<A>, Option.Option<A>> {
  return fromState_(holdStep<A>, Option.none());
}

type HoldForState<A> = readonly [Option.Option<A>, number];

function holdForStep<A>(n: number) {
  return (event: Blip<A>, [last, remaining]: HoldForState<A>): readonly [Option.Option<A>, HoldForState<A>] => {
    if (isBlip(event)) {
      const held = Option.some(event.value);
      return [held, [held, n]];
    }
    if (remaining === 0) {
      return [Option.none(), [Option.none(), 0]];
    }
    return [last, [last, remaining - 1]];
  };
}

/**
 * Like `hold`, but the payload is only held for `n` steps after the blip;
 * a new blip restarts the countdown.
 */
export function holdFor<A, I extends Frame>(
  schema: Schema.Schema<A, I, never>,
  n: number,
): State<Blip<A>, Option.Option<A>, HoldForState<A>> {
  return fromState(Schema.Tuple(Schema.Option(schema), Schema.Int), holdForStep<A>(steps(n)), holdForInitial<A>(n));
}

export function holdFor_<A>(n: number): State<Blip<A>, Option.Option<A>, HoldForState<A>> {
  return fromState_(holdForStep<A>(steps(n)), holdForInitial<A>(n));
}

function holdForInitial<A>(n: number): HoldForState<A> {
  return [Option.none(), steps(n)];
}

// ============================================================================
// Choosing
// ============================================================================

/**
 * The first interval's value while it is on, else the second's. Both step
 * every time.
 */
export function orElse<A, B, E = never, R = never>(
  preferred: Interval<A, B, E, R>,
  fallback: Interval<A, B, E, R>,
): Interval<A, B, E, R> {
  return zipWith(preferred, fallback, (x, y) => (Option.isSome(x) ? x : y));
}

/**
 * The interval's value while it is on, else the normal transducer's. Both
 * step every time.
 */
export function orDefault<A, B, E = never, R = never>(
  interval: Interval<A, B, E, R>,
  normal: Transducer<A, B, E, R>,
): Transducer<A, B, E, R> {
  return zipWith(interval, normal, (x, y) => Option.getOrElse(x, () => y));
}

/**
 * The value of the first interval that is on, or off if none is. Every
 * interval steps every time, even after one has been chosen.
 */
export function chooseInterval<A, B, E = never, R = never>(
  intervals: ReadonlyArray<Interval<A, B, E, R>>,
): Interval<A, B, E, R> {
  return map(zipAll(intervals), (outputs) => Option.firstSomeOf(outputs));
}

/**
 * The value of the first interval that is on, or `fallback`'s value if none
 * is. Every transducer steps every time.
 */
export function choose<A, B, E = never, R = never>(
  fallback: Transducer<A, B, E, R>,
  intervals: ReadonlyArray<Interval<A, B, E, R>>,
): Transducer<A, B, E, R> {
  return intervals.reduceRight<Transducer<A, B, E, R>>((acc, interval) => orDefault(interval, acc), fallback);
}

// ============================================================================
// Gating
// ============================================================================

/**
 * Step `inner` only while the incoming interval is on. While off, `inner`
 * is not stepped at all (its state is frozen) and the output is off.
 *
 * @example
 * ```ts
 * const sumWhileOn = gate(accum(Schema.Number, (acc, n: number) => acc + n, 0));
 * overListSync(sumWhileOn, [Option.some(1), Option.none(), Option.some(2)])[0];
 * // [Some(1), None, Some(3)]
 * ```
 */
export function gate<A, B, E = never, R = never>(inner: Transducer<A, B, E, R>): Interval<Option.Option<A>, B, E, R> {
  switch (inner._tag) {
    case "Func":
      return fromFunction((input: Option.Option<A>) => Option.map(input, inner.f));
    case "FuncEffect":
      return fromEffect(
        (input: Option.Option<A>): Effect.Effect<Option.Option<B>, E, R> =>
          Option.isSome(input) ? Effect.map(inner.f(input.value), (b) => Option.some(b)) : Effect.succeed(Option.none()),
      );
    case "State":
      return fromStateWith(
        inner.codec,
        (input: Option.Option<A>, s): readonly [Option.Option<B>, unknown] => {
          if (Option.isNone(input)) {
            return [Option.none(), s];
          }
          const [b, s2] = inner.run(input.value, s);
          return [Option.some(b), s2];
        },
        inner.state,
      );
    case "StateEffect":
      return fromStateEffectWith(
        inner.codec,
        (input: Option.Option<A>, s): Effect.Effect<readonly [Option.Option<B>, unknown], E, R> =>
          Option.isSome(input)
            ? Effect.map(inner.run(input.value, s), ([b, s2]) => [Option.some(b), s2] as const)
            : Effect.succeed([Option.none(), s] as const),
        inner.state,
      );
    case "General": {
      const self: General<Option.Option<A>, Option.Option<B>, E, R> = general<
        Option.Option<A>,
        Option.Option<B>,
        E,
        R
      >({
        step: (input) =>
          Option.isSome(input)
            ? Effect.map(inner.step(input.value), (out) => ({
                result: Option.some(out.result),
                next: gate<A, B, E, R>(out.next),
              }))
            : Effect.succeed({ result: Option.none(), next: self }),
        save: inner.save,
        load: (frame) => Either.map(inner.load(frame), (loaded) => gate<A, B, E, R>(loaded)),
      });
      return self;
    }
  }
}

/**
 * `gate` for an inner transducer that itself produces an interval: the
 * nested `Option` is flattened, so off if either the input or the inner
 * output is off.
 */
export function gateFlatten<A, B, E = never, R = never>(
  inner: Interval<A, B, E, R>,
): Interval<Option.Option<A>, B, E, R> {
  return map(gate(inner), (output) => Option.flatten(output));
}
