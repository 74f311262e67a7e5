/**
 * Composition Algebra
 *
 * Sequential, parallel and choice composition, plus the profunctor and
 * strength helpers. Every combinator keeps the most specific representation
 * its operands allow:
 * - pure stateless stays Func
 * - anything with explicit state stays State / StateEffect, states paired
 * - only a General operand widens the result to General
 *
 * Saved layouts do not depend on the representation chosen: a composition
 * always saves `[outer, inner]` (or `[first, second]` for parallel), so a
 * General composition whose successor specialises can still be resumed.
 */

import { Effect, Either } from "effect";
import { ignoring, inFirst, inSecond, pair, pairFrames, splitFrame } from "./codec.js";
import {
  constant,
  fromEffect,
  fromFunction,
  fromStateEffectWith,
  fromStateWith,
  general,
  isEffectful,
  isStateless,
  load,
  save,
  step,
} from "./transducer.js";
import type { Func, FuncEffect, General, State, StateCodec, StateEffect, Transducer } from "./types.js";

// ============================================================================
// Sequential Composition
// ============================================================================

/**
 * `g ∘ f`: feed every output of `f` into `g`.
 *
 * @example
 * ```ts
 * const sumThenDouble = compose(fromFunction((n: number) => n * 2), accum(Schema.Number, (a, n: number) => a + n, 0));
 * variantName(sumThenDouble); // "State"
 * ```
 */
export function compose<A, X, B, E = never, R = never>(
  g: Transducer<X, B, E, R>,
  f: Transducer<A, X, E, R>,
): Transducer<A, B, E, R> {
  switch (f._tag) {
    case "Func":
      return afterFunc(g, f);
    case "FuncEffect":
      return afterFuncEffect(g, f);
    case "State":
      return afterState(g, f);
    case "StateEffect":
      return afterStateEffect(g, f);
    case "General":
      return composeGeneral(g, f);
  }
}

/** `f` then `g`; the same as `compose(g, f)`. */
export function andThen<A, X, B, E = never, R = never>(
  f: Transducer<A, X, E, R>,
  g: Transducer<X, B, E, R>,
): Transducer<A, B, E, R> {
  return compose(g, f);
}

function afterFunc<A, X, B, E, R>(g: Transducer<X, B, E, R>, f: Func<A, X>): Transducer<A, B, E, R> {
  switch (g._tag) {
    case "Func":
      return fromFunction((input: A) => g.f(f.f(input)));
    case "FuncEffect":
      return fromEffect((input: A) => g.f(f.f(input)));
    case "State":
      return fromStateWith(inFirst(g.codec), (input: A, sg) => g.run(f.f(input), sg), g.state);
    case "StateEffect":
      return fromStateEffectWith(inFirst(g.codec), (input: A, sg) => g.run(f.f(input), sg), g.state);
    case "General":
      return composeGeneral(g, f);
  }
}

function afterFuncEffect<A, X, B, E, R>(
  g: Transducer<X, B, E, R>,
  f: FuncEffect<A, X, E, R>,
): Transducer<A, B, E, R> {
  switch (g._tag) {
    case "Func":
      return fromEffect((input: A) => Effect.map(f.f(input), g.f));
    case "FuncEffect":
      return fromEffect((input: A) => Effect.flatMap(f.f(input), g.f));
    case "State":
      return fromStateEffectWith(
        inFirst(g.codec),
        (input: A, sg) => Effect.map(f.f(input), (x) => g.run(x, sg)),
        g.state,
      );
    case "StateEffect":
      return fromStateEffectWith(
        inFirst(g.codec),
        (input: A, sg) => Effect.flatMap(f.f(input), (x) => g.run(x, sg)),
        g.state,
      );
    case "General":
      return composeGeneral(g, f);
  }
}

function afterState<A, X, B, E, R>(g: Transducer<X, B, E, R>, f: State<A, X>): Transducer<A, B, E, R> {
  switch (g._tag) {
    case "Func":
      return fromStateWith(
        inSecond(f.codec),
        (input: A, sf) => {
          const [x, sf2] = f.run(input, sf);
          return [g.f(x), sf2] as const;
        },
        f.state,
      );
    case "FuncEffect":
      return fromStateEffectWith(
        inSecond(f.codec),
        (input: A, sf) => {
          const [x, sf2] = f.run(input, sf);
          return Effect.map(g.f(x), (b) => [b, sf2] as const);
        },
        f.state,
      );
    case "State":
      return fromStateWith(
        pair(g.codec, f.codec),
        (input: A, [sg, sf]) => {
          const [x, sf2] = f.run(input, sf);
          const [b, sg2] = g.run(x, sg);
          return [b, [sg2, sf2] as const] as const;
        },
        [g.state, f.state] as const,
      );
    case "StateEffect":
      return fromStateEffectWith(
        pair(g.codec, f.codec),
        (input: A, [sg, sf]) => {
          const [x, sf2] = f.run(input, sf);
          return Effect.map(g.run(x, sg), ([b, sg2]) => [b, [sg2, sf2] as const] as const);
        },
        [g.state, f.state] as const,
      );
    case "General":
      return composeGeneral(g, f);
  }
}

function afterStateEffect<A, X, B, E, R>(
  g: Transducer<X, B, E, R>,
  f: StateEffect<A, X, E, R>,
): Transducer<A, B, E, R> {
  switch (g._tag) {
    case "Func":
      return fromStateEffectWith(
        inSecond(f.codec),
        (input: A, sf) => Effect.map(f.run(input, sf), ([x, sf2]) => [g.f(x), sf2] as const),
        f.state,
      );
    case "FuncEffect":
      return fromStateEffectWith(
        inSecond(f.codec),
        (input: A, sf) =>
          Effect.flatMap(f.run(input, sf), ([x, sf2]) => Effect.map(g.f(x), (b) => [b, sf2] as const)),
        f.state,
      );
    case "State":
      return fromStateEffectWith(
        pair(g.codec, f.codec),
        (input: A, [sg, sf]) =>
          Effect.map(f.run(input, sf), ([x, sf2]) => {
            const [b, sg2] = g.run(x, sg);
            return [b, [sg2, sf2] as const] as const;
          }),
        [g.state, f.state] as const,
      );
    case "StateEffect":
      return fromStateEffectWith(
        pair(g.codec, f.codec),
        (input: A, [sg, sf]) =>
          Effect.flatMap(f.run(input, sf), ([x, sf2]) =>
            Effect.map(g.run(x, sg), ([b, sg2]) => [b, [sg2, sf2] as const] as const),
          ),
        [g.state, f.state] as const,
      );
    case "General":
      return composeGeneral(g, f);
  }
}

/**
 * Fallback when either side is General: step both, and re-compose their
 * successors. Loading decodes both operands from their own templates.
 */
function composeGeneral<A, X, B, E, R>(
  g: Transducer<X, B, E, R>,
  f: Transducer<A, X, E, R>,
): General<A, B, E, R> {
  return general<A, B, E, R>({
    step: (input) =>
      Effect.flatMap(step(f, input), (outF) =>
        Effect.map(step(g, outF.result), (outG) => ({
          result: outG.result,
          next: compose(outG.next, outF.next),
        })),
      ),
    save: () => pairFrames(save(g), save(f)),
    load: (frame) =>
      Either.flatMap(splitFrame(frame), ([frameG, frameF]) =>
        Either.map(Either.all([load(g, frameG), load(f, frameF)] as const), ([g2, f2]) => compose(g2, f2)),
      ),
  });
}

// ============================================================================
// Profunctor
// ============================================================================

/** Post-compose a pure function. Keeps the representation. */
export function map<A, B, C, E = never, R = never>(t: Transducer<A, B, E, R>, g: (output: B) => C): Transducer<A, C, E, R> {
  switch (t._tag) {
    case "Func":
      return fromFunction((input: A) => g(t.f(input)));
    case "FuncEffect":
      return fromEffect((input: A) => Effect.map(t.f(input), g));
    case "State":
      return fromStateWith(
        t.codec,
        (input: A, s) => {
          const [b, s2] = t.run(input, s);
          return [g(b), s2] as const;
        },
        t.state,
      );
    case "StateEffect":
      return fromStateEffectWith(
        t.codec,
        (input: A, s) => Effect.map(t.run(input, s), ([b, s2]) => [g(b), s2] as const),
        t.state,
      );
    case "General":
      return general<A, C, E, R>({
        step: (input) => Effect.map(t.step(input), (out) => ({ result: g(out.result), next: map(out.next, g) })),
        save: t.save,
        load: (frame) => Either.map(t.load(frame), (loaded) => map(loaded, g)),
      });
  }
}

/** Pre-compose a pure function. Keeps the representation. */
export function contramap<A, B, C, E = never, R = never>(t: Transducer<A, B, E, R>, f: (input: C) => A): Transducer<C, B, E, R> {
  switch (t._tag) {
    case "Func":
      return fromFunction((input: C) => t.f(f(input)));
    case "FuncEffect":
      return fromEffect((input: C) => t.f(f(input)));
    case "State":
      return fromStateWith(t.codec, (input: C, s) => t.run(f(input), s), t.state);
    case "StateEffect":
      return fromStateEffectWith(t.codec, (input: C, s) => t.run(f(input), s), t.state);
    case "General":
      return general<C, B, E, R>({
        step: (input) =>
          Effect.map(t.step(f(input)), (out) => ({ result: out.result, next: contramap(out.next, f) })),
        save: t.save,
        load: (frame) => Either.map(t.load(frame), (loaded) => contramap(loaded, f)),
      });
  }
}

export function dimap<A, B, C, D, E = never, R = never>(
  t: Transducer<A, B, E, R>,
  f: (input: C) => A,
  g: (output: B) => D,
): Transducer<C, D, E, R> {
  return map(contramap(t, f), g);
}

// ============================================================================
// Strength
// ============================================================================

/** Run `t` on the first component of a pair, passing the second through. */
export function first<A, B, C, E = never, R = never>(
  t: Transducer<A, B, E, R>,
): Transducer<readonly [A, C], readonly [B, C], E, R> {
  switch (t._tag) {
    case "Func":
      return fromFunction(([a, c]: readonly [A, C]) => [t.f(a), c] as const);
    case "FuncEffect":
      return fromEffect(([a, c]: readonly [A, C]) => Effect.map(t.f(a), (b) => [b, c] as const));
    case "State":
      return fromStateWith(
        t.codec,
        ([a, c]: readonly [A, C], s) => {
          const [b, s2] = t.run(a, s);
          return [[b, c] as const, s2] as const;
        },
        t.state,
      );
    case "StateEffect":
      return fromStateEffectWith(
        t.codec,
        ([a, c]: readonly [A, C], s) => Effect.map(t.run(a, s), ([b, s2]) => [[b, c] as const, s2] as const),
        t.state,
      );
    case "General":
      return general<readonly [A, C], readonly [B, C], E, R>({
        step: ([a, c]) =>
          Effect.map(t.step(a), (out) => ({ result: [out.result, c] as const, next: first<A, B, C, E, R>(out.next) })),
        save: t.save,
        load: (frame) => Either.map(t.load(frame), (loaded) => first<A, B, C, E, R>(loaded)),
      });
  }
}

/** Run `t` on the second component of a pair, passing the first through. */
export function second<A, B, C, E = never, R = never>(
  t: Transducer<A, B, E, R>,
): Transducer<readonly [C, A], readonly [C, B], E, R> {
  return dimap(
    first<A, B, C, E, R>(t),
    ([c, a]: readonly [C, A]) => [a, c] as const,
    ([b, c]) => [c, b] as const,
  );
}

// ============================================================================
// Parallel Composition
// ============================================================================

interface PureView<A, B> {
  readonly codec: StateCodec<unknown>;
  readonly run: (input: A, state: unknown) => readonly [B, unknown];
  readonly state: unknown;
}

interface EffectView<A, B, E, R> {
  readonly codec: StateCodec<unknown>;
  readonly run: (input: A, state: unknown) => Effect.Effect<readonly [B, unknown], E, R>;
  readonly state: unknown;
}

const stateless: StateCodec<unknown> = ignoring(null);

function pureView<A, B>(t: Func<A, B> | State<A, B>): PureView<A, B> {
  return t._tag === "Func"
    ? { codec: stateless, run: (input, s) => [t.f(input), s], state: null }
    : { codec: t.codec, run: (input, s) => t.run(input, s), state: t.state };
}

function effectView<A, B, E = never, R = never>(
  t: Func<A, B> | FuncEffect<A, B, E, R> | State<A, B> | StateEffect<A, B, E, R>,
): EffectView<A, B, E, R> {
  switch (t._tag) {
    case "Func":
      return { codec: stateless, run: (input, s) => Effect.sync(() => [t.f(input), s] as const), state: null };
    case "FuncEffect":
      return { codec: stateless, run: (input, s) => Effect.map(t.f(input), (b) => [b, s] as const), state: null };
    case "State":
      return { codec: t.codec, run: (input, s) => Effect.sync(() => t.run(input, s)), state: t.state };
    case "StateEffect":
      return { codec: t.codec, run: (input, s) => t.run(input, s), state: t.state };
  }
}

function statelessEffect<A, B, E = never, R = never>(t: Func<A, B> | FuncEffect<A, B, E, R>) {
  return (input: A): Effect.Effect<B, E, R> =>
    t._tag === "Func" ? Effect.sync(() => t.f(input)) : t.f(input);
}

/**
 * Run `f` and `g` on the same input and combine their outputs. Both always
 * step, `f` first, so neither side's effects are skipped.
 *
 * @example
 * ```ts
 * const avg = zipWith(sum, count, (s, n) => s / n);
 * ```
 */
export function zipWith<A, B1, B2, C, E = never, R = never>(
  f: Transducer<A, B1, E, R>,
  g: Transducer<A, B2, E, R>,
  combine: (left: B1, right: B2) => C,
): Transducer<A, C, E, R> {
  if (f._tag === "General" || g._tag === "General") {
    return zipGeneral(f, g, combine);
  }
  if (f._tag === "Func" && g._tag === "Func") {
    return fromFunction((input: A) => combine(f.f(input), g.f(input)));
  }
  if (isStateless(f) && isStateless(g)) {
    const runF = statelessEffect(f);
    const runG = statelessEffect(g);
    return fromEffect((input: A) => Effect.zipWith(runF(input), runG(input), combine));
  }
  if (!isEffectful(f) && !isEffectful(g)) {
    const vf = pureView(f);
    const vg = pureView(g);
    return fromStateWith(
      pair(vf.codec, vg.codec),
      (input: A, [sf, sg]) => {
        const [b1, sf2] = vf.run(input, sf);
        const [b2, sg2] = vg.run(input, sg);
        return [combine(b1, b2), [sf2, sg2] as const] as const;
      },
      [vf.state, vg.state] as const,
    );
  }
  const vf = effectView(f);
  const vg = effectView(g);
  return fromStateEffectWith(
    pair(vf.codec, vg.codec),
    (input: A, [sf, sg]) =>
      Effect.zipWith(vf.run(input, sf), vg.run(input, sg), ([b1, sf2], [b2, sg2]) =>
        [combine(b1, b2), [sf2, sg2] as const] as const,
      ),
    [vf.state, vg.state] as const,
  );
}

function zipGeneral<A, B1, B2, C, E, R>(
  f: Transducer<A, B1, E, R>,
  g: Transducer<A, B2, E, R>,
  combine: (left: B1, right: B2) => C,
): General<A, C, E, R> {
  return general<A, C, E, R>({
    step: (input) =>
      Effect.zipWith(step(f, input), step(g, input), (outF, outG) => ({
        result: combine(outF.result, outG.result),
        next: zipWith(outF.next, outG.next, combine),
      })),
    save: () => pairFrames(save(f), save(g)),
    load: (frame) =>
      Either.flatMap(splitFrame(frame), ([frameF, frameG]) =>
        Either.map(Either.all([load(f, frameF), load(g, frameG)] as const), ([f2, g2]) => zipWith(f2, g2, combine)),
      ),
  });
}

/** Run both and pair their outputs. */
export function fanout<A, B1, B2, E = never, R = never>(
  f: Transducer<A, B1, E, R>,
  g: Transducer<A, B2, E, R>,
): Transducer<A, readonly [B1, B2], E, R> {
  return zipWith(f, g, (b1, b2) => [b1, b2] as const);
}

/**
 * Run every transducer on the same input, in order, and collect the outputs.
 */
export function zipAll<A, B, E = never, R = never>(
  ts: ReadonlyArray<Transducer<A, B, E, R>>,
): Transducer<A, ReadonlyArray<B>, E, R> {
  const empty: Transducer<A, ReadonlyArray<B>, E, R> = constant<ReadonlyArray<B>, A>([]);
  return ts.reduce<Transducer<A, ReadonlyArray<B>, E, R>>(
    (acc, t) => zipWith(acc, t, (bs, b) => [...bs, b]),
    empty,
  );
}

// ============================================================================
// Choice Composition
// ============================================================================

/**
 * Step `t` on `Left` inputs only; `Right` inputs pass through and `t` is
 * not stepped.
 */
export function left<A, B, C, E = never, R = never>(
  t: Transducer<A, B, E, R>,
): Transducer<Either.Either<C, A>, Either.Either<C, B>, E, R> {
  switch (t._tag) {
    case "Func":
      return fromFunction((input: Either.Either<C, A>) => Either.mapLeft(input, t.f));
    case "FuncEffect":
      return fromEffect(
        (input: Either.Either<C, A>): Effect.Effect<Either.Either<C, B>, E, R> =>
          Either.isLeft(input)
            ? Effect.map(t.f(input.left), (b) => Either.left(b))
            : Effect.succeed(Either.right(input.right)),
      );
    case "State":
      return fromStateWith(
        t.codec,
        (input: Either.Either<C, A>, s): readonly [Either.Either<C, B>, unknown] => {
          if (Either.isRight(input)) {
            return [Either.right(input.right), s];
          }
          const [b, s2] = t.run(input.left, s);
          return [Either.left(b), s2];
        },
        t.state,
      );
    case "StateEffect":
      return fromStateEffectWith(
        t.codec,
        (input: Either.Either<C, A>, s): Effect.Effect<readonly [Either.Either<C, B>, unknown], E, R> =>
          Either.isLeft(input)
            ? Effect.map(t.run(input.left, s), ([b, s2]) => [Either.left(b), s2] as const)
            : Effect.succeed([Either.right(input.right), s] as const),
        t.state,
      );
    case "General": {
      const self: General<Either.Either<C, A>, Either.Either<C, B>, E, R> = general<
        Either.Either<C, A>,
        Either.Either<C, B>,
        E,
        R
      >({
        step: (input) =>
          Either.isLeft(input)
            ? Effect.map(t.step(input.left), (out) => ({
                result: Either.left(out.result),
                next: left<A, B, C, E, R>(out.next),
              }))
            : Effect.succeed({ result: Either.right(input.right), next: self }),
        save: t.save,
        load: (frame) => Either.map(t.load(frame), (loaded) => left<A, B, C, E, R>(loaded)),
      });
      return self;
    }
  }
}

/** Mirror of `left`: step `t` on `Right` inputs only. */
export function right<A, B, C, E = never, R = never>(
  t: Transducer<A, B, E, R>,
): Transducer<Either.Either<A, C>, Either.Either<B, C>, E, R> {
  return dimap(
    left<A, B, C, E, R>(t),
    (input: Either.Either<A, C>) => Either.flip(input),
    (output) => Either.flip(output),
  );
}

/**
 * Route `Left` inputs to `onLeft` and `Right` inputs to `onRight`. Only the
 * selected branch steps.
 */
export function choice<A, B, D, E = never, R = never>(
  onLeft: Transducer<A, D, E, R>,
  onRight: Transducer<B, D, E, R>,
): Transducer<Either.Either<B, A>, D, E, R> {
  return map(andThen(left<A, D, B, E, R>(onLeft), right<B, D, D, E, R>(onRight)), (output) => Either.merge(output));
}
