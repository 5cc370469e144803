/**
 * Bolus suggestion types
 */

/**
 * Personalization parameters for the bolus formula
 */
export interface BolusParameters {
  /** Grams of carbohydrate covered by one unit of insulin */
  carbRatio: number;
  /** mg/dL drop produced by one unit of insulin */
  sensitivityFactor: number;
  /** Desired blood glucose in mg/dL */
  targetGlucose: number;
}

/**
 * Input to the bolus calculator. Omitted parameters fall back to
 * DEFAULT_BOLUS_PARAMETERS.
 */
export interface BolusRequest extends Partial<BolusParameters> {
  /** Meal carbohydrates in grams */
  carbs: number;
  /** Current blood glucose in mg/dL */
  currentGlucose: number;
}

/**
 * Suggested dose, all values in insulin units rounded to 2 decimals
 */
export interface BolusResult {
  suggestedBolus: number;
  carbUnits: number;
  /** Zero when glucose is at or below target */
  correctionUnits: number;
  /** Parameters actually used, defaults included */
  parameters: BolusParameters;
}

export const DEFAULT_BOLUS_PARAMETERS: Readonly<BolusParameters> = {
  carbRatio: 10,
  sensitivityFactor: 50,
  targetGlucose: 100,
};
