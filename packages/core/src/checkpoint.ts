/**
 * Checkpoints
 *
 * Driver-facing save/restore helpers. Unlike the kernel these log, through
 * Effect's logger, annotated with the checkpoint's label.
 */

import { Effect } from "effect";
import type { DecodeError } from "./errors.js";
import { decodeEffect, encode } from "./transducer.js";
import type { Transducer } from "./types.js";

export interface CheckpointOptions {
  /** Log annotation identifying the transducer. Defaults to `"transducer"`. */
  readonly label?: string;
}

const DEFAULT_LABEL = "transducer";

function annotate(options: CheckpointOptions | undefined) {
  return Effect.annotateLogs({ checkpoint: options?.label ?? DEFAULT_LABEL });
}

/**
 * Encode `t` into checkpoint bytes.
 */
export function saveCheckpoint<A, B, E = never, R = never>(
  t: Transducer<A, B, E, R>,
  options?: CheckpointOptions,
): Effect.Effect<Uint8Array> {
  return Effect.gen(function* () {
    const bytes = encode(t);
    yield* Effect.logDebug(`Saved ${t._tag} checkpoint (${bytes.length} bytes)`);
    return bytes;
  }).pipe(annotate(options));
}

/**
 * Resume `template` from checkpoint bytes, failing with `DecodeError` when
 * they do not fit it.
 */
export function restoreCheckpoint<A, B, E = never, R = never>(
  template: Transducer<A, B, E, R>,
  bytes: Uint8Array,
  options?: CheckpointOptions,
): Effect.Effect<Transducer<A, B, E, R>, DecodeError> {
  return Effect.gen(function* () {
    const restored = yield* decodeEffect(template, bytes);
    yield* Effect.logDebug(`Restored ${restored._tag} checkpoint (${bytes.length} bytes)`);
    return restored;
  }).pipe(annotate(options));
}

/**
 * Like `restoreCheckpoint`, but a checkpoint that cannot be decoded is
 * logged and the template is returned instead, starting over from its
 * initial state.
 *
 * @example
 * ```ts
 * const counter = yield* restoreOrReset(template, bytesFromDisk, { label: "counter" });
 * ```
 */
export function restoreOrReset<A, B, E = never, R = never>(
  template: Transducer<A, B, E, R>,
  bytes: Uint8Array,
  options?: CheckpointOptions,
): Effect.Effect<Transducer<A, B, E, R>> {
  return restoreCheckpoint(template, bytes, options).pipe(
    Effect.catchTag("DecodeError", (error) =>
      Effect.logWarning(`Discarding checkpoint (${error.reason}): ${error.message}`).pipe(
        Effect.as(template),
        annotate(options),
      ),
    ),
  );
}
