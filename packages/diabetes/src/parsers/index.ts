/**
 * @glucosmart/diabetes - Parsers
 *
 * Validation and wire decoding for untrusted input
 */

// Validation utilities
export {
  checkPositiveNumber,
  checkOptionalPositiveNumber,
  collectIssues,
  validateBolusRequest,
  type FieldCheck,
} from "./validation.js";

// Request bodies
export { parseBolusRequestBody } from "./bolus-request.js";

// JSON helpers
export { isJsonObject, parseJsonBody } from "./json.js";
