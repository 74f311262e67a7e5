import { describe, it, expect } from "vitest";
import { Effect, HashMap, Logger, Option } from "effect";
import { restoreCheckpoint, restoreOrReset, saveCheckpoint } from "../src/checkpoint.js";
import { evalSync } from "../src/run.js";
import { advance, sum } from "./test-utils.js";

interface LogEntry {
  readonly level: string;
  readonly label: unknown;
}

/** Run with a logger that records the level and checkpoint label of every entry. */
const runLogged = <A>(effect: Effect.Effect<A>): readonly [A, ReadonlyArray<LogEntry>] => {
  const entries: Array<LogEntry> = [];
  const recorder = Logger.make(({ logLevel, annotations }) => {
    entries.push({ level: logLevel.label, label: Option.getOrNull(HashMap.get(annotations, "checkpoint")) });
  });
  const result = Effect.runSync(effect.pipe(Effect.provide(Logger.replace(Logger.defaultLogger, recorder))));
  return [result, entries];
};

describe("saveCheckpoint / restoreCheckpoint", () => {
  it("resumes from saved bytes", () => {
    const restored = Effect.runSync(
      Effect.gen(function* () {
        const bytes = yield* saveCheckpoint(advance(sum(), [1, 2, 3]));
        return yield* restoreCheckpoint(sum(), bytes);
      }),
    );

    expect(evalSync(restored, 4)).toBe(10);
  });

  it("fails with a DecodeError for bytes that do not fit", () => {
    const error = Effect.runSync(Effect.flip(restoreCheckpoint(sum(), new Uint8Array(0))));

    expect(error._tag).toBe("DecodeError");
    expect(error.reason).toBe("InsufficientBytes");
  });
});

describe("restoreOrReset", () => {
  it("falls back to the template and logs a warning", () => {
    const template = sum();
    const [restored, entries] = runLogged(restoreOrReset(template, new Uint8Array(0), { label: "counter" }));

    expect(restored).toBe(template);
    expect(entries).toEqual([{ level: "WARN", label: "counter" }]);
  });

  it("labels entries with the default label", () => {
    const [, entries] = runLogged(restoreOrReset(sum(), new Uint8Array(0)));

    expect(entries).toEqual([{ level: "WARN", label: "transducer" }]);
  });

  it("resumes without warning when the bytes fit", () => {
    const bytes = Effect.runSync(saveCheckpoint(advance(sum(), [5])));
    const [restored, entries] = runLogged(restoreOrReset(sum(), bytes));

    expect(evalSync(restored, 1)).toBe(6);
    expect(entries.filter((entry) => entry.level === "WARN")).toEqual([]);
  });
});
