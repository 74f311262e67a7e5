import { describe, it, expect } from "vitest";
import { Either, Schema } from "effect";
import {
  BlipSchema,
  blip,
  destructure,
  fromPredicate,
  isBlip,
  isNoBlip,
  mapBlip,
  match,
  merge,
  mergeL,
  mergeR,
  noBlip,
  type Blip,
} from "../src/blip.js";
import { evalSync, execSync } from "../src/run.js";
import { decode, encode, fromState } from "../src/transducer.js";

const add = (x: number, y: number) => x + y;

describe("merge", () => {
  it("combines two occurrences", () => {
    expect(merge(add, blip(1), blip(2))).toEqual(blip(3));
  });

  it("keeps whichever side occurred", () => {
    expect(merge(add, noBlip(), blip(2))).toEqual(blip(2));
    expect(merge(add, blip(1), noBlip())).toEqual(blip(1));
    expect(isNoBlip(merge(add, noBlip(), noBlip()))).toBe(true);
  });

  it("has noBlip as identity on both sides", () => {
    const samples: ReadonlyArray<Blip<number>> = [noBlip(), blip(0), blip(5)];

    for (const b of samples) {
      expect(merge(add, noBlip(), b)).toEqual(b);
      expect(merge(add, b, noBlip())).toEqual(b);
    }
  });

  it("is associative for an associative combine", () => {
    const a = blip(1);
    const b = noBlip<number>();
    const c = blip(4);

    expect(merge(add, merge(add, a, b), c)).toEqual(merge(add, a, merge(add, b, c)));
    expect(merge(add, merge(add, a, c), a)).toEqual(blip(6));
  });

  it("keeps the left or right payload", () => {
    expect(mergeL(blip("a"), blip("b"))).toEqual(blip("a"));
    expect(mergeR(blip("a"), blip("b"))).toEqual(blip("b"));
    expect(mergeL(noBlip(), blip("b"))).toEqual(blip("b"));
  });
});

describe("destructure / match", () => {
  it("applies the function to an occurrence", () => {
    expect(destructure(0, (n: number) => n * 10, blip(4))).toBe(40);
    expect(match(blip(4), { onNoBlip: () => 0, onBlip: (n) => n * 10 })).toBe(40);
  });

  it("falls back without an occurrence", () => {
    expect(destructure(0, (n: number) => n * 10, noBlip())).toBe(0);
    expect(match(noBlip<number>(), { onNoBlip: () => -1, onBlip: (n) => n })).toBe(-1);
  });
});

describe("mapBlip / fromPredicate", () => {
  it("maps only occurrences", () => {
    expect(mapBlip(blip(2), (n) => `#${n}`)).toEqual(blip("#2"));
    expect(isNoBlip(mapBlip(noBlip<number>(), (n) => n + 1))).toBe(true);
  });

  it("fires when the predicate holds", () => {
    const even = (n: number) => n % 2 === 0;

    expect(isBlip(fromPredicate(4, even))).toBe(true);
    expect(isBlip(fromPredicate(3, even))).toBe(false);
  });
});

describe("BlipSchema", () => {
  it("saves a blip carried in state", () => {
    const lastEvent = fromState(
      BlipSchema(Schema.String),
      (input: Blip<string>, previous: Blip<string>) => [previous, isBlip(input) ? input : previous] as const,
      noBlip<string>(),
    );
    const advanced = execSync(execSync(lastEvent, blip("go")), noBlip());
    const resumed = Either.getOrThrow(decode(lastEvent, encode(advanced)));

    expect(evalSync(resumed, noBlip())).toEqual(blip("go"));
  });
});
