/**
 * Runners
 *
 * Small driver loops for when the inputs are already in hand.
 */

import { Effect } from "effect";
import { step, stepSync } from "./transducer.js";
import type { PureTransducer, Transducer } from "./types.js";

/** The output of a single synchronous step. */
export function evalSync<A, B>(t: PureTransducer<A, B>, input: A): B {
  return stepSync(t, input).result;
}

/** The successor after a single synchronous step. */
export function execSync<A, B>(t: PureTransducer<A, B>, input: A): PureTransducer<A, B> {
  return stepSync(t, input).next;
}

/**
 * Feed every input in order, collecting the outputs. Returns the outputs and
 * the final successor.
 *
 * @example
 * ```ts
 * const [outputs, next] = overListSync(accum_((acc, n: number) => acc + n, 0), [1, 2, 3]);
 * // outputs: [1, 3, 6]
 * ```
 */
export function overListSync<A, B>(
  t: PureTransducer<A, B>,
  inputs: Iterable<A>,
): readonly [ReadonlyArray<B>, PureTransducer<A, B>] {
  const outputs: Array<B> = [];
  let current = t;
  for (const input of inputs) {
    const out = stepSync(current, input);
    outputs.push(out.result);
    current = out.next;
  }
  return [outputs, current];
}

/**
 * Effectful `overListSync`. Steps run in order; the first failure stops the
 * loop and is returned in the error channel.
 */
export function overList<A, B, E = never, R = never>(
  t: Transducer<A, B, E, R>,
  inputs: Iterable<A>,
): Effect.Effect<readonly [ReadonlyArray<B>, Transducer<A, B, E, R>], E, R> {
  return Effect.gen(function* () {
    const outputs: Array<B> = [];
    let current = t;
    for (const input of inputs) {
      const out = yield* step(current, input);
      outputs.push(out.result);
      current = out.next;
    }
    return [outputs, current] as const;
  });
}
