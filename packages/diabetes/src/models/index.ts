/**
 * @glucosmart/diabetes - Models
 *
 * Type definitions shared by the calculator, storage and handlers
 */

// Bolus types
export type { BolusParameters, BolusRequest, BolusResult } from "./bolus.js";
export { DEFAULT_BOLUS_PARAMETERS } from "./bolus.js";

// Validation types
export type { ValidationReason, ValidationIssue } from "./validation.js";

// Share link types
export type { SharePayload, ShareLink } from "./share-link.js";
export { SHARE_LINK_TTL_HOURS } from "./share-link.js";
