/**
 * @glucosmart/diabetes - Dosing
 *
 * Insulin dose calculations
 */

export { suggestBolus, resolveBolusParameters, round2 } from "./bolus.js";
export { BolusValidationError, BolusComputationError } from "./errors.js";
