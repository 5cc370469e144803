/**
 * Decoder for bolus suggestion request bodies
 *
 * Wire format (snake_case JSON):
 *   { carbs, current_glucose, carb_ratio?, sensitivity_factor?, target_glucose? }
 */

import type { BolusRequest } from "../models/index.js";
import { DEFAULT_BOLUS_PARAMETERS } from "../models/index.js";
import { BolusValidationError } from "../dosing/errors.js";
import { isJsonObject } from "./json.js";
import { checkOptionalPositiveNumber, checkPositiveNumber, collectIssues } from "./validation.js";

/**
 * Decode an untrusted JSON body into a BolusRequest with defaults applied.
 * Issues name the snake_case wire field.
 *
 * @throws BolusValidationError listing every invalid field
 */
export function parseBolusRequestBody(body: unknown): Required<BolusRequest> {
  if (!isJsonObject(body)) {
    throw new BolusValidationError([
      { field: "body", reason: "not_an_object", message: "Request body must be a JSON object" },
    ]);
  }

  const carbs = checkPositiveNumber("carbs", body.carbs);
  const currentGlucose = checkPositiveNumber("current_glucose", body.current_glucose);
  const carbRatio = checkOptionalPositiveNumber(
    "carb_ratio",
    body.carb_ratio,
    DEFAULT_BOLUS_PARAMETERS.carbRatio
  );
  const sensitivityFactor = checkOptionalPositiveNumber(
    "sensitivity_factor",
    body.sensitivity_factor,
    DEFAULT_BOLUS_PARAMETERS.sensitivityFactor
  );
  const targetGlucose = checkOptionalPositiveNumber(
    "target_glucose",
    body.target_glucose,
    DEFAULT_BOLUS_PARAMETERS.targetGlucose
  );

  if (!carbs.ok || !currentGlucose.ok || !carbRatio.ok || !sensitivityFactor.ok || !targetGlucose.ok) {
    throw new BolusValidationError(
      collectIssues([carbs, currentGlucose, carbRatio, sensitivityFactor, targetGlucose])
    );
  }

  return {
    carbs: carbs.value,
    currentGlucose: currentGlucose.value,
    carbRatio: carbRatio.value,
    sensitivityFactor: sensitivityFactor.value,
    targetGlucose: targetGlucose.value,
  };
}
