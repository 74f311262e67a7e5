import { describe, it, expect } from "vitest";
import { Effect, Either, Option, Ref, Schema } from "effect";
import { blip, noBlip, type Blip } from "../src/blip.js";
import { shapeMismatch } from "../src/errors.js";
import {
  after,
  before,
  between,
  between_,
  choose,
  chooseInterval,
  fromInterval,
  fromIntervalWith,
  gate,
  gateFlatten,
  hold,
  holdFor,
  holdFor_,
  hold_,
  off,
  offFor,
  onFor,
  orDefault,
  orElse,
  toOn,
  unless,
  when,
  type Interval,
} from "../src/interval.js";
import { accumEffect_, encode, fromEffect, fromFunction, general, save, variantName } from "../src/transducer.js";
import { overListSync } from "../src/run.js";
import type { Transducer } from "../src/types.js";
import { advance, outputs, outputsEffect, resume, sum } from "./test-utils.js";

// ============================================================================
// Helpers
// ============================================================================

/** `null` for off, the value for on. */
const values = <A>(intervals: ReadonlyArray<Option.Option<A>>): ReadonlyArray<A | null> =>
  intervals.map((interval) => Option.getOrNull(interval));

const events = (...inputs: ReadonlyArray<number | null>): ReadonlyArray<Blip<number>> =>
  inputs.map((input) => (input === null ? noBlip() : blip(input)));

type Window = readonly [number, readonly [Blip<string>, Blip<string>]];

/** Counts 1..7 with a start event at `start` and an end event at `end`. */
const windows = (start: number, end: number): ReadonlyArray<Window> =>
  [1, 2, 3, 4, 5, 6, 7].map(
    (n): Window => [n, [n === start ? blip("start") : noBlip(), n === end ? blip("end") : noBlip()]],
  );

const flipFlop = (on: boolean): Transducer<number, number> =>
  general<number, number>({
    step: (n) => Effect.succeed({ result: on ? n : -n, next: flipFlop(!on) }),
    save: () => on,
    load: (frame) =>
      typeof frame === "boolean" ? Either.right(flipFlop(frame)) : Either.left(shapeMismatch("expected a boolean")),
  });

// ============================================================================
// Sources
// ============================================================================

describe("off / toOn / fromInterval", () => {
  it("is always off or always on", () => {
    expect(values(outputs(off<number, number>(), [1, 2]))).toEqual([null, null]);
    expect(values(outputs(toOn<number>(), [1, 2]))).toEqual([1, 2]);
  });

  it("collapses an interval", () => {
    const inputs = [Option.some(1), Option.none(), Option.some(3)];

    expect(outputs(fromInterval(0), inputs)).toEqual([1, 0, 3]);
    expect(outputs(fromIntervalWith("off", (n: number) => `on ${n}`), inputs)).toEqual(["on 1", "off", "on 3"]);
  });
});

describe("onFor / offFor", () => {
  it("is on for the first n steps", () => {
    expect(values(outputs(onFor<number>(2), [10, 20, 30, 40]))).toEqual([10, 20, null, null]);
  });

  it("is off for the first n steps", () => {
    expect(values(outputs(offFor<number>(2), [10, 20, 30, 40]))).toEqual([null, null, 30, 40]);
  });

  it("clamps negative counts at zero", () => {
    expect(values(outputs(onFor<number>(-3), [1, 2]))).toEqual([null, null]);
    expect(values(outputs(offFor<number>(-3), [1, 2]))).toEqual([1, 2]);
  });

  it("resumes the countdown", () => {
    const resumed = resume(advance(onFor<number>(3), [1, 2]), onFor<number>(3));

    expect(values(outputs(resumed, [3, 4]))).toEqual([3, null]);
  });

  it("caps unbounded counts so they still encode and resume", () => {
    const template = onFor<number>(Infinity);
    const advanced = advance(template, [1, 2, 3]);

    expect(save(advanced)).toBe(Number.MAX_SAFE_INTEGER - 3);
    expect(values(outputs(resume(advanced, template), [4, 5]))).toEqual([4, 5]);
  });

  it("treats a NaN count as zero", () => {
    expect(save(offFor<number>(NaN))).toBe(0);
    expect(values(outputs(offFor<number>(NaN), [1, 2]))).toEqual([1, 2]);
  });
});

describe("when / unless", () => {
  it("gates on a predicate", () => {
    expect(values(outputs(when((n: number) => n > 2), [1, 3, 2, 5]))).toEqual([null, 3, null, 5]);
    expect(values(outputs(unless((n: number) => n > 2), [1, 3, 2, 5]))).toEqual([1, null, 2, null]);
  });

  it("is stateless", () => {
    expect(variantName(when((n: number) => n > 2))).toBe("Func");
  });
});

// ============================================================================
// Event Triggered
// ============================================================================

describe("after / before", () => {
  const tagged: ReadonlyArray<readonly [number, Blip<string>]> = [
    [1, noBlip()],
    [2, blip("go")],
    [3, noBlip()],
  ];

  it("turns on at the first event", () => {
    expect(values(outputs(after<number, string>(), tagged))).toEqual([null, 2, 3]);
  });

  it("turns off at the first event", () => {
    expect(values(outputs(before<number, string>(), tagged))).toEqual([1, null, null]);
  });
});

describe("between", () => {
  it("is on from the start event until the end event", () => {
    expect(values(outputs(between<number, string, string>(), windows(3, 5)))).toEqual([
      null,
      null,
      3,
      4,
      null,
      null,
      null,
    ]);
  });

  it("lets the end event win when both occur on the same step", () => {
    expect(values(outputs(between<number, string, string>(), windows(2, 2)))).toEqual([
      null,
      null,
      null,
      null,
      null,
      null,
      null,
    ]);
  });

  it("resumes while on", () => {
    const all = windows(3, 6);
    const template = between<number, string, string>();
    const resumed = resume(advance(template, all.slice(0, 4)), template);

    expect(values(outputs(resumed, all.slice(4)))).toEqual([5, null, null]);
  });

  it("restarts off when non-resuming", () => {
    const all = windows(3, 6);
    const template = between_<number, string, string>();
    const resumed = resume(advance(template, all.slice(0, 4)), template);

    expect(values(outputs(resumed, all.slice(4)))).toEqual([null, null, null]);
  });
});

// ============================================================================
// Holding Events
// ============================================================================

describe("hold", () => {
  it("holds the last payload", () => {
    expect(values(outputs(hold(Schema.Number), events(null, null, 3, null, null)))).toEqual([null, null, 3, 3, 3]);
  });

  it("replaces the payload on a new event", () => {
    expect(values(outputs(hold(Schema.Number), events(1, null, 2)))).toEqual([1, 1, 2]);
  });

  it("resumes the held payload", () => {
    const resumed = resume(advance(hold(Schema.Number), events(null, 3)), hold(Schema.Number));

    expect(values(outputs(resumed, events(null)))).toEqual([3]);
  });

  it("forgets the payload when non-resuming", () => {
    const resumed = resume(advance(hold_<number>(), events(null, 3)), hold_<number>());

    expect(values(outputs(resumed, events(null)))).toEqual([null]);
  });
});

describe("holdFor", () => {
  it("holds the payload for n steps after the event", () => {
    expect(values(outputs(holdFor(Schema.Number, 2), events(null, null, 3, null, null, null, null)))).toEqual([
      null,
      null,
      3,
      3,
      3,
      null,
      null,
    ]);
  });

  it("restarts the countdown on a new event", () => {
    expect(values(outputs(holdFor(Schema.Number, 1), events(1, null, 2, null, null)))).toEqual([1, 1, 2, 2, null]);
  });

  it("resumes the payload and the countdown", () => {
    const template = holdFor(Schema.Number, 2);
    const resumed = resume(advance(template, events(3, null)), template);

    expect(values(outputs(resumed, events(null, null)))).toEqual([3, null]);
  });

  it("caps counts beyond the safe integer range", () => {
    const template = holdFor(Schema.Number, 2 ** 60);
    const resumed = resume(advance(template, events(7)), template);

    expect(save(template)).toEqual([{ _tag: "None" }, Number.MAX_SAFE_INTEGER]);
    expect(values(outputs(resumed, events(null, null)))).toEqual([7, 7]);
  });

  it("works without saving", () => {
    expect(values(outputs(holdFor_<number>(0), events(5, null)))).toEqual([5, null]);
  });
});

// ============================================================================
// Choosing
// ============================================================================

describe("orElse / orDefault", () => {
  it("prefers the first interval while it is on", () => {
    const hundredfold = fromFunction((n: number) => Option.some(n * 100));

    expect(values(outputs(orElse<number, number>(when((n: number) => n > 2), hundredfold), [1, 3]))).toEqual([100, 3]);
  });

  it("falls back to the normal transducer, which always steps", () => {
    expect(outputs(orDefault(onFor<number>(1), sum()), [4, 5])).toEqual([4, 9]);
  });
});

describe("chooseInterval", () => {
  it("picks the first interval that is on", () => {
    const chosen = chooseInterval<number, number>([onFor<number>(1), when((n: number) => n > 2)]);

    expect(values(outputs(chosen, [5, 1, 3]))).toEqual([5, null, 3]);
  });

  it("is off for no intervals", () => {
    const none: ReadonlyArray<Interval<number, number>> = [];

    expect(values(outputs(chooseInterval(none), [1]))).toEqual([null]);
  });

  it("steps every interval even after one is chosen", () => {
    const log = Effect.runSync(Ref.make<ReadonlyArray<string>>([]));
    const source = (tag: string): Interval<number, number> =>
      fromEffect((n: number) => Effect.as(Ref.update(log, (xs) => [...xs, tag]), Option.some(n)));

    expect(values(outputsEffect(chooseInterval([source("a"), source("b")]), [1, 2]))).toEqual([1, 2]);
    expect(Effect.runSync(Ref.get(log))).toEqual(["a", "b", "a", "b"]);
  });
});

describe("choose", () => {
  it("falls back when no interval is on", () => {
    const chosen = choose<number, number>(
      fromFunction((n: number) => -n),
      [when((n: number) => n > 10), onFor<number>(1)],
    );

    expect(outputs(chosen, [5, 20, 3])).toEqual([5, 20, -3]);
  });
});

// ============================================================================
// Gating
// ============================================================================

describe("gate", () => {
  const gated: ReadonlyArray<Option.Option<number>> = [Option.some(1), Option.none(), Option.some(2)];

  it("steps the inner transducer only while on", () => {
    expect(values(outputs(gate(sum()), gated))).toEqual([1, null, 3]);
  });

  it("freezes the inner state while off", () => {
    const frozen = advance(gate(sum()), [Option.some(1), Option.none(), Option.none()]);

    expect(encode(frozen)).toEqual(encode(advance(sum(), [1])));
    expect(values(outputs(resume(frozen, gate(sum())), [Option.some(4)]))).toEqual([5]);
  });

  it("feeds the inner transducer only the inputs seen while on", () => {
    const alternating = [1, 2, 3, 4, 5, 6, 7, 8].map((n) => (n % 2 === 1 ? Option.some(n) : Option.none()));
    const [gatedOutputs, next] = overListSync(gate(sum()), alternating);

    expect(values(gatedOutputs)).toEqual([1, null, 4, null, 9, null, 16, null]);
    expect(encode(next)).toEqual(encode(advance(sum(), [1, 3, 5, 7])));
    expect(values(outputs(resume(next, gate(sum())), [Option.some(2)]))).toEqual([18]);
  });

  it("keeps the inner representation", () => {
    expect(variantName(gate(fromFunction((n: number) => n * 2)))).toBe("Func");
    expect(variantName(gate(sum()))).toBe("State");
    expect(variantName(gate(accumEffect_((acc: number, n: number) => Effect.succeed(acc + n), 0)))).toBe(
      "StateEffect",
    );
    expect(variantName(gate(flipFlop(true)))).toBe("General");
  });

  it("does not step a general inner transducer while off", () => {
    expect(values(outputs(gate(flipFlop(true)), gated))).toEqual([1, null, -2]);
  });

  it("runs an effectful inner transducer only while on", () => {
    const total = gate(accumEffect_((acc: number, n: number) => Effect.succeed(acc + n), 0));

    expect(values(outputsEffect(total, gated))).toEqual([1, null, 3]);
  });
});

describe("gateFlatten", () => {
  it("is off when either the input or the inner output is off", () => {
    const inputs: ReadonlyArray<Option.Option<number>> = [
      Option.none(),
      Option.some(1),
      Option.none(),
      Option.some(2),
      Option.some(3),
    ];

    expect(values(outputs(gateFlatten(onFor<number>(2)), inputs))).toEqual([null, 1, null, 2, null]);
  });
});
