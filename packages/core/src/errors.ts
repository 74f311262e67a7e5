import { Data } from "effect";

// ============================================================================
// Decode Errors (Effect TaggedErrors)
// ============================================================================

/**
 * Why a checkpoint could not be read back into a transducer.
 *
 * - `InsufficientBytes`: the byte stream was empty but the template carries state
 * - `MalformedBytes`: the bytes are not a valid checkpoint encoding
 * - `ShapeMismatch`: the bytes decode, but not into the template's state layout
 */
export type DecodeErrorReason = "InsufficientBytes" | "MalformedBytes" | "ShapeMismatch";

/**
 * Error produced when decoding a checkpoint relative to a template fails.
 *
 * This is the only error the kernel defines. Failures of effectful steps
 * are the effect's own and pass through untouched.
 */
export class DecodeError extends Data.TaggedError("DecodeError")<{
  readonly reason: DecodeErrorReason;
  readonly message: string;
  readonly cause?: unknown;
}> {}

export function shapeMismatch(message: string, cause?: unknown): DecodeError {
  return new DecodeError({ reason: "ShapeMismatch", message, cause });
}
