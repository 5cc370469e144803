/**
 * Bolus dose suggestion
 *
 * Simplified carb-counting + correction formula:
 *
 *   carbUnits       = carbs / carbRatio
 *   correctionUnits = max(0, currentGlucose - targetGlucose) / sensitivityFactor
 *   suggestedBolus  = carbUnits + correctionUnits
 *
 * No insulin-on-board or prediction. Glucose below target contributes zero
 * correction, never a negative dose.
 */

import type { BolusParameters, BolusRequest, BolusResult } from "../models/index.js";
import { DEFAULT_BOLUS_PARAMETERS } from "../models/index.js";
import { validateBolusRequest } from "../parsers/validation.js";
import { BolusComputationError, BolusValidationError } from "./errors.js";

/**
 * Round to 2 decimal places
 */
export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Fill omitted parameters with DEFAULT_BOLUS_PARAMETERS
 */
export function resolveBolusParameters(request: BolusRequest): BolusParameters {
  return {
    carbRatio: request.carbRatio ?? DEFAULT_BOLUS_PARAMETERS.carbRatio,
    sensitivityFactor: request.sensitivityFactor ?? DEFAULT_BOLUS_PARAMETERS.sensitivityFactor,
    targetGlucose: request.targetGlucose ?? DEFAULT_BOLUS_PARAMETERS.targetGlucose,
  };
}

/**
 * Suggest an insulin bolus for a meal at the current glucose.
 *
 * The total is rounded once from the unrounded components, so
 * suggestedBolus can differ by 0.01 from carbUnits + correctionUnits.
 *
 * @throws BolusValidationError if any input is missing, non-numeric, non-finite or <= 0
 * @throws BolusComputationError if the inputs overflow to a non-finite dose
 */
export function suggestBolus(request: BolusRequest): BolusResult {
  const issues = validateBolusRequest(request);
  if (issues.length > 0) {
    throw new BolusValidationError(issues);
  }

  const parameters = resolveBolusParameters(request);

  const carbUnits = request.carbs / parameters.carbRatio;
  const glucoseDiff = request.currentGlucose - parameters.targetGlucose;
  const correctionUnits = glucoseDiff > 0 ? glucoseDiff / parameters.sensitivityFactor : 0;
  const totalBolus = carbUnits + correctionUnits;

  const result = {
    suggestedBolus: round2(totalBolus),
    carbUnits: round2(carbUnits),
    correctionUnits: round2(correctionUnits),
  };

  // round2 scales by 100, which can overflow a finite total
  if (![result.suggestedBolus, result.carbUnits, result.correctionUnits].every(Number.isFinite)) {
    throw new BolusComputationError("Bolus calculation produced a non-finite dose");
  }

  return {
    ...result,
    parameters,
  };
}
