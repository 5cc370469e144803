/**
 * @glucosmart/diabetes
 *
 * Dosing calculations, input decoding and storage for the GlucoSmart back end
 *
 * @example
 * ```typescript
 * import { suggestBolus, parseBolusRequestBody } from "@glucosmart/diabetes";
 *
 * const result = suggestBolus({ carbs: 60, currentGlucose: 180 });
 * // result.suggestedBolus === 7.6
 * ```
 */

// Models - Type definitions
export * from "./models/index.js";

// Dosing - Insulin calculations
export * from "./dosing/index.js";

// Parsers - Validation and wire decoding
export * from "./parsers/index.js";

// Storage - DynamoDB operations
export * from "./storage/index.js";
