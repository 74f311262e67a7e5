/**
 * Stepwise - composable, checkpointable stream transducers
 *
 * - One stepping contract over five representations
 * - Compositions keep the cheapest representation that is still correct
 * - Any transducer's state encodes to bytes and resumes against a template
 */

export * from "./types.js";
export * from "./errors.js";
export * from "./codec.js";
export * from "./transducer.js";
export * from "./compose.js";
export * from "./blip.js";
export * from "./interval.js";
export * from "./run.js";
export * from "./checkpoint.js";

// Re-export namespaces for organization
import * as Kernel from "./transducer.js";
import * as Compose from "./compose.js";
import * as Codec from "./codec.js";
import * as Blips from "./blip.js";
import * as Intervals from "./interval.js";
import * as Checkpoint from "./checkpoint.js";
export { Kernel, Compose, Codec, Blips, Intervals, Checkpoint };
