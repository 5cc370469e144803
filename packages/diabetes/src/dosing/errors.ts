/**
 * Error types raised by the dosing calculator
 */

import type { ValidationIssue } from "../models/index.js";

/**
 * One or more inputs were absent, non-numeric, non-finite or not positive.
 * No dose is computed when this is thrown.
 */
export class BolusValidationError extends Error {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super(issues.map((issue) => issue.message).join("; "));
    this.name = "BolusValidationError";
    this.issues = issues;
  }

  /** The issue a single-message transport should report */
  get firstIssue(): ValidationIssue | undefined {
    return this.issues[0];
  }
}

/**
 * Valid inputs produced a non-finite dose (e.g. overflow from extreme ratios).
 */
export class BolusComputationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BolusComputationError";
  }
}
