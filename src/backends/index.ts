/**
 * @module backends
 * @description Transform stages and the default tokenizer/encoder.
 */

export {
  SoftwareTransformStage,
  transformSync,
  applyGate,
} from "./software-transform.js";
export { FallbackTransformStage } from "./fallback-transform.js";
export type { FallbackTransformOptions } from "./fallback-transform.js";
export { BasicTokenizer } from "./basic-tokenizer.js";
export { HashTokenEncoder, tokenAngle } from "./token-encoder.js";
