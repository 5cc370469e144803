/**
 * Validation issue types
 */

export type ValidationReason =
  | "missing"
  | "not_a_number"
  | "not_finite"
  | "not_positive"
  | "not_an_object";

export interface ValidationIssue {
  /** Offending field, named as the caller supplied it */
  field: string;
  reason: ValidationReason;
  message: string;
}
