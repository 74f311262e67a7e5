import { Bench, type Task } from "tinybench";
import { Either, Schema } from "effect";

import { accum, compose, decode, encode, overListSync, toGeneral, type PureTransducer } from "../src/index.js";

// ============================================================================
// Transducers
// ============================================================================

const sum = () => accum(Schema.Number, (acc: number, n: number) => acc + n, 0);
const count = () => accum(Schema.Number, (c: number, _n: number) => c + 1, 0);

/** Specialised: State ∘ State stays one State with paired state. */
const specialised = (): PureTransducer<number, number> => compose(count(), sum());

/** The same pipeline forced through General at every step. */
const generalised = (): PureTransducer<number, number> => compose(toGeneral(count()), toGeneral(sum()));

const inputs = Array.from({ length: 1000 }, (_, i) => i);

// ============================================================================
// Helpers
// ============================================================================

function getOpsPerSec(task: Task | undefined): number | null {
  return task?.result ? task.result.hz : null;
}

function getMeanMicroseconds(task: Task | undefined): number | null {
  return task?.result ? task.result.mean * 1000 : null;
}

function formatOps(ops: number | null): string {
  if (ops === null) return "N/A";
  return ops.toLocaleString(undefined, { maximumFractionDigits: 0 });
}

function formatMean(mean: number | null): string {
  if (mean === null) return "N/A";
  return mean.toFixed(3);
}

function printComparison(label: string, fast: Task | undefined, slow: Task | undefined): void {
  const fastOps = getOpsPerSec(fast);
  const slowOps = getOpsPerSec(slow);
  if (fastOps === null || slowOps === null) return;

  console.log(`  ${label.padEnd(25)} specialised is ${(fastOps / slowOps).toFixed(2)}x the general rate`);
}

function printTable(bench: Bench): void {
  console.table(
    bench.tasks.map((task) => ({
      Task: task.name,
      "ops/sec": formatOps(getOpsPerSec(task)),
      "Mean (μs)": formatMean(getMeanMicroseconds(task)),
    })),
  );
}

// ============================================================================
// Verification
// ============================================================================

function verifyImplementations(): void {
  const [fastOutputs, fastNext] = overListSync(specialised(), inputs);
  const [slowOutputs, slowNext] = overListSync(generalised(), inputs);

  const sameOutputs = fastOutputs.every((output, i) => output === slowOutputs[i]);
  const sameBytes = encode(fastNext).join(",") === encode(slowNext).join(",");

  console.log(`  Outputs agree: ${sameOutputs ? "✓" : "✗"}`);
  console.log(`  Checkpoints agree: ${sameBytes ? "✓" : "✗"}\n`);
}

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<void> {
  console.log("\n" + "═".repeat(70));
  console.log("  TRANSDUCER BENCHMARK: specialised vs general representation");
  console.log("═".repeat(70) + "\n");

  verifyImplementations();

  // -------------------------------------------------------------------------
  // Stepping
  // -------------------------------------------------------------------------
  console.log("🔁 STEPPING (1000 inputs)\n");

  const stepBench = new Bench({ time: 200, warmupTime: 50 });

  stepBench.add("specialised: 1000 steps", () => {
    overListSync(specialised(), inputs);
  });

  stepBench.add("general: 1000 steps", () => {
    overListSync(generalised(), inputs);
  });

  await stepBench.run();
  printTable(stepBench);

  // -------------------------------------------------------------------------
  // Checkpointing
  // -------------------------------------------------------------------------
  console.log("\n\n💾 CHECKPOINT (encode + decode)\n");

  const fastAdvanced = overListSync(specialised(), inputs)[1];
  const slowAdvanced = overListSync(generalised(), inputs)[1];
  const fastTemplate = specialised();
  const slowTemplate = generalised();

  const checkpointBench = new Bench({ time: 200, warmupTime: 50 });

  checkpointBench.add("specialised: round trip", () => {
    Either.getOrThrow(decode(fastTemplate, encode(fastAdvanced)));
  });

  checkpointBench.add("general: round trip", () => {
    Either.getOrThrow(decode(slowTemplate, encode(slowAdvanced)));
  });

  await checkpointBench.run();
  printTable(checkpointBench);

  console.log("\n" + "─".repeat(70));
  printComparison("stepping", stepBench.getTask("specialised: 1000 steps"), stepBench.getTask("general: 1000 steps"));
  printComparison(
    "checkpoint",
    checkpointBench.getTask("specialised: round trip"),
    checkpointBench.getTask("general: round trip"),
  );
  console.log("─".repeat(70) + "\n");
}

main().catch(console.error);
