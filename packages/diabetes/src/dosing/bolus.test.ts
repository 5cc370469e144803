/**
 * Tests for the bolus suggestion formula
 */

import { describe, it, expect } from "vitest";
import { suggestBolus, resolveBolusParameters, round2 } from "./bolus.js";
import { BolusComputationError, BolusValidationError } from "./errors.js";
import type { BolusRequest } from "../models/index.js";

function captureValidationError(fn: () => unknown): BolusValidationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof BolusValidationError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected a BolusValidationError");
}

describe("suggestBolus", () => {
  it("adds carb coverage and correction for a high reading", () => {
    const result = suggestBolus({
      carbs: 60,
      currentGlucose: 180,
      carbRatio: 10,
      sensitivityFactor: 50,
      targetGlucose: 100,
    });

    expect(result).toEqual({
      suggestedBolus: 7.6,
      carbUnits: 6,
      correctionUnits: 1.6,
      parameters: { carbRatio: 10, sensitivityFactor: 50, targetGlucose: 100 },
    });
  });

  it("gives zero correction below target", () => {
    const result = suggestBolus({ carbs: 30, currentGlucose: 90, carbRatio: 10, sensitivityFactor: 50, targetGlucose: 100 });
    expect(result.carbUnits).toBe(3);
    expect(result.correctionUnits).toBe(0);
    expect(result.suggestedBolus).toBe(3);
  });

  it("gives zero correction exactly at target", () => {
    const result = suggestBolus({ carbs: 45, currentGlucose: 100, carbRatio: 15, sensitivityFactor: 40, targetGlucose: 100 });
    expect(result.carbUnits).toBe(3);
    expect(result.correctionUnits).toBe(0);
    expect(result.suggestedBolus).toBe(3);
  });

  it("applies default parameters when omitted", () => {
    const result = suggestBolus({ carbs: 20, currentGlucose: 150 });
    expect(result.parameters).toEqual({ carbRatio: 10, sensitivityFactor: 50, targetGlucose: 100 });
    expect(result.carbUnits).toBe(2);
    expect(result.correctionUnits).toBe(1);
    expect(result.suggestedBolus).toBe(3);
  });

  it("rounds the total from unrounded components", () => {
    // 1/3 + 1/3: each component rounds to 0.33, the total to 0.67
    const result = suggestBolus({
      carbs: 10,
      currentGlucose: 150,
      carbRatio: 30,
      sensitivityFactor: 150,
      targetGlucose: 100,
    });
    expect(result.carbUnits).toBe(0.33);
    expect(result.correctionUnits).toBe(0.33);
    expect(result.suggestedBolus).toBe(0.67);
  });

  it("is idempotent", () => {
    const request: BolusRequest = { carbs: 47, currentGlucose: 213, carbRatio: 12, sensitivityFactor: 35 };
    expect(suggestBolus(request)).toEqual(suggestBolus(request));
  });

  it("accepts the smallest positive carb value", () => {
    const result = suggestBolus({ carbs: Number.MIN_VALUE, currentGlucose: 100 });
    expect(result.suggestedBolus).toBe(0);
    expect(result.correctionUnits).toBe(0);
  });

  it("keeps a small carb dose above zero", () => {
    const result = suggestBolus({ carbs: 0.1, currentGlucose: 100 });
    expect(result.carbUnits).toBe(0.01);
    expect(result.suggestedBolus).toBe(0.01);
  });

  describe("non-negative dose", () => {
    const cases: Array<[currentGlucose: number, targetGlucose: number, carbRatio: number, sensitivityFactor: number]> = [
      [40, 100, 10, 50],
      [70, 120, 8, 30],
      [99.99, 100, 15, 40],
      [100, 100, 10, 50],
      [100.01, 100, 10, 50],
      [180, 100, 12, 45],
      [250, 90, 5, 20],
      [400, 110, 20, 100],
      [600, 80, 1, 1],
    ];

    it.each(cases)(
      "glucose %d, target %d, ratio %d, sensitivity %d",
      (currentGlucose, targetGlucose, carbRatio, sensitivityFactor) => {
        const result = suggestBolus({ carbs: 25, currentGlucose, targetGlucose, carbRatio, sensitivityFactor });

        expect(result.suggestedBolus).toBeGreaterThanOrEqual(0);
        expect(result.carbUnits).toBeGreaterThanOrEqual(0);
        expect(result.correctionUnits).toBeGreaterThanOrEqual(0);
        if (currentGlucose <= targetGlucose) {
          expect(result.correctionUnits).toBe(0);
        } else {
          expect(result.correctionUnits).toBe(round2((currentGlucose - targetGlucose) / sensitivityFactor));
        }
        expect(result.suggestedBolus).toBe(
          round2(25 / carbRatio + Math.max(0, currentGlucose - targetGlucose) / sensitivityFactor)
        );
      }
    );
  });

  describe("monotonicity", () => {
    const base = { carbs: 40, currentGlucose: 160, carbRatio: 10, sensitivityFactor: 50, targetGlucose: 100 };

    it("increases with carbs", () => {
      expect(suggestBolus({ ...base, carbs: 50 }).suggestedBolus).toBeGreaterThan(
        suggestBolus(base).suggestedBolus
      );
    });

    it("increases with glucose above target", () => {
      expect(suggestBolus({ ...base, currentGlucose: 210 }).suggestedBolus).toBeGreaterThan(
        suggestBolus(base).suggestedBolus
      );
    });

    it("decreases carb units as the carb ratio grows", () => {
      expect(suggestBolus({ ...base, carbRatio: 20 }).carbUnits).toBeLessThan(suggestBolus(base).carbUnits);
    });

    it("decreases correction as sensitivity grows", () => {
      expect(suggestBolus({ ...base, sensitivityFactor: 100 }).correctionUnits).toBeLessThan(
        suggestBolus(base).correctionUnits
      );
    });
  });

  describe("validation", () => {
    it("rejects zero carbs", () => {
      const error = captureValidationError(() => suggestBolus({ carbs: 0, currentGlucose: 120 }));
      expect(error.issues).toEqual([
        { field: "carbs", reason: "not_positive", message: "carbs must be greater than 0" },
      ]);
    });

    it("rejects negative glucose", () => {
      const error = captureValidationError(() => suggestBolus({ carbs: 50, currentGlucose: -5 }));
      expect(error.issues).toEqual([
        { field: "currentGlucose", reason: "not_positive", message: "currentGlucose must be greater than 0" },
      ]);
    });

    it("reports every invalid field", () => {
      const error = captureValidationError(() =>
        suggestBolus({ carbs: -1, currentGlucose: 120, carbRatio: 0, sensitivityFactor: Number.NaN, targetGlucose: Infinity })
      );
      expect(error.issues.map((issue) => [issue.field, issue.reason])).toEqual([
        ["carbs", "not_positive"],
        ["carbRatio", "not_positive"],
        ["sensitivityFactor", "not_a_number"],
        ["targetGlucose", "not_finite"],
      ]);
      expect(error.message).toBe(
        "carbs must be greater than 0; carbRatio must be greater than 0; " +
          "sensitivityFactor must be a number; targetGlucose must be a finite number"
      );
    });

    it("raises a computation error when the dose overflows", () => {
      expect(() => suggestBolus({ carbs: 1e308, currentGlucose: 100, carbRatio: 1e-308 })).toThrow(
        BolusComputationError
      );
    });

    it("raises a computation error when rounding overflows a finite dose", () => {
      // carbUnits is 1e308, finite, but 1e308 * 100 is not
      expect(() => suggestBolus({ carbs: 1e307, currentGlucose: 100, carbRatio: 0.1 })).toThrow(
        BolusComputationError
      );
    });
  });
});

describe("resolveBolusParameters", () => {
  it("keeps supplied parameters and fills the rest", () => {
    expect(resolveBolusParameters({ carbs: 10, currentGlucose: 100, sensitivityFactor: 30 })).toEqual({
      carbRatio: 10,
      sensitivityFactor: 30,
      targetGlucose: 100,
    });
  });
});

describe("round2", () => {
  it("rounds half up to 2 decimals", () => {
    expect(round2(0.125)).toBe(0.13);
    expect(round2(2.344)).toBe(2.34);
    expect(round2(7.6)).toBe(7.6);
  });
});
