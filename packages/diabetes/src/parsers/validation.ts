/**
 * Input validation for dosing values
 */

import type { BolusRequest, ValidationIssue } from "../models/index.js";
import { DEFAULT_BOLUS_PARAMETERS } from "../models/index.js";

/**
 * Outcome of checking a single field
 */
export type FieldCheck =
  | { ok: true; value: number }
  | { ok: false; issue: ValidationIssue };

/**
 * Check that a required value is a finite number greater than zero
 */
export function checkPositiveNumber(field: string, value: unknown): FieldCheck {
  if (value === undefined) {
    return { ok: false, issue: { field, reason: "missing", message: `${field} is required` } };
  }
  if (typeof value !== "number" || Number.isNaN(value)) {
    return { ok: false, issue: { field, reason: "not_a_number", message: `${field} must be a number` } };
  }
  if (!Number.isFinite(value)) {
    return { ok: false, issue: { field, reason: "not_finite", message: `${field} must be a finite number` } };
  }
  if (value <= 0) {
    return { ok: false, issue: { field, reason: "not_positive", message: `${field} must be greater than 0` } };
  }
  return { ok: true, value };
}

/**
 * Like checkPositiveNumber, but an absent (undefined) value takes the fallback.
 * A present value is never replaced, so null or "10" still fail.
 */
export function checkOptionalPositiveNumber(
  field: string,
  value: unknown,
  fallback: number
): FieldCheck {
  if (value === undefined) {
    return { ok: true, value: fallback };
  }
  return checkPositiveNumber(field, value);
}

/**
 * Collect the issues from a list of field checks, preserving order
 */
export function collectIssues(checks: FieldCheck[]): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  for (const check of checks) {
    if (!check.ok) {
      issues.push(check.issue);
    }
  }
  return issues;
}

/**
 * Validate a bolus request built in code. Returns every issue found,
 * in field order; an empty array means the request is valid.
 */
export function validateBolusRequest(request: BolusRequest): ValidationIssue[] {
  return collectIssues([
    checkPositiveNumber("carbs", request.carbs),
    checkPositiveNumber("currentGlucose", request.currentGlucose),
    checkOptionalPositiveNumber("carbRatio", request.carbRatio, DEFAULT_BOLUS_PARAMETERS.carbRatio),
    checkOptionalPositiveNumber(
      "sensitivityFactor",
      request.sensitivityFactor,
      DEFAULT_BOLUS_PARAMETERS.sensitivityFactor
    ),
    checkOptionalPositiveNumber(
      "targetGlucose",
      request.targetGlucose,
      DEFAULT_BOLUS_PARAMETERS.targetGlucose
    ),
  ]);
}
