/**
 * Blip - a discrete event, at most one occurrence per step.
 *
 * Blips are plain values that flow through ordinary transducers; an event
 * source is a `Transducer<Input, Blip<Payload>>`.
 */

import { Schema } from "effect";

export interface NoBlip {
  readonly _tag: "NoBlip";
}

export interface Occurred<A> {
  readonly _tag: "Blip";
  readonly value: A;
}

export type Blip<A> = NoBlip | Occurred<A>;

// ============================================================================
// Constructors & Guards
// ============================================================================

const NO_BLIP: NoBlip = { _tag: "NoBlip" };

export function noBlip<A = never>(): Blip<A> {
  return NO_BLIP;
}

export function blip<A>(value: A): Blip<A> {
  return { _tag: "Blip", value };
}

export function isBlip<A>(b: Blip<A>): b is Occurred<A> {
  return b._tag === "Blip";
}

export function isNoBlip<A>(b: Blip<A>): b is NoBlip {
  return b._tag === "NoBlip";
}

// ============================================================================
// Operations
// ============================================================================

/**
 * Merge two blips. Present only if either is; when both are, the payloads
 * are combined with `f`.
 *
 * @example
 * ```ts
 * merge((x, y) => x + y, blip(1), blip(2)); // blip(3)
 * merge((x, y) => x + y, noBlip(), blip(2)); // blip(2)
 * ```
 */
export function merge<A>(f: (x: A, y: A) => A, a: Blip<A>, b: Blip<A>): Blip<A> {
  if (a._tag === "NoBlip") return b;
  if (b._tag === "NoBlip") return a;
  return blip(f(a.value, b.value));
}

/** Merge, keeping the left payload when both occur. */
export function mergeL<A>(a: Blip<A>, b: Blip<A>): Blip<A> {
  return merge((x: A) => x, a, b);
}

/** Merge, keeping the right payload when both occur. */
export function mergeR<A>(a: Blip<A>, b: Blip<A>): Blip<A> {
  return merge((_: A, y: A) => y, a, b);
}

/**
 * `f(payload)` if the blip occurred, else `onNoBlip`.
 */
export function destructure<A, B>(onNoBlip: B, f: (value: A) => B, b: Blip<A>): B {
  return b._tag === "Blip" ? f(b.value) : onNoBlip;
}

/** Object-style `destructure`. */
export function match<A, B>(b: Blip<A>, cases: { readonly onNoBlip: () => B; readonly onBlip: (value: A) => B }): B {
  return b._tag === "Blip" ? cases.onBlip(b.value) : cases.onNoBlip();
}

export function mapBlip<A, B>(b: Blip<A>, f: (value: A) => B): Blip<B> {
  return b._tag === "Blip" ? blip(f(b.value)) : NO_BLIP;
}

/** A blip of `input` when `p` holds for it. */
export function fromPredicate<A>(input: A, p: (input: A) => boolean): Blip<A> {
  return p(input) ? blip(input) : NO_BLIP;
}

// ============================================================================
// Schema
// ============================================================================

/**
 * Schema for a blip, for states that carry one.
 */
export function BlipSchema<A, I>(value: Schema.Schema<A, I, never>) {
  return Schema.Union(
    Schema.Struct({ _tag: Schema.Literal("NoBlip") }),
    Schema.Struct({ _tag: Schema.Literal("Blip"), value }),
  );
}
