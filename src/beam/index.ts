export { analyzeBeam, findExtreme } from "./analyze.js";
export type { AnalyzeOptions } from "./analyze.js";
export { validateLoadCase, KN_TO_N, GPA_TO_PA, CM4_TO_M4 } from "./validate.js";
export { solveReactions, totalVerticalLoad, udlResultant } from "./reactions.js";
export { evaluateField, shearAt, momentAt, cumulativeIntegral, DEFAULT_SAMPLES } from "./field.js";
export { describeSchematic, formatLabel } from "./schematic.js";
export { INPUT_LIMITS, applyInputLimits, clamp } from "./limits.js";
export { DomainError, LoadRangeError, describeItem } from "./errors.js";
export type { LoadItemKind, LoadItemRef } from "./errors.js";
export type * from "./types.js";
