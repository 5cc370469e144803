/**
 * Bolus Suggestion Handler
 * POST /bolus-suggest
 *
 * Request:  { carbs, current_glucose, carb_ratio?, sensitivity_factor?, target_glucose? }
 * Response: { suggested_bolus, details: { carb_units, correction_units, parameters } }
 *
 * Validation failures return 400 with the first offending field's message.
 */

import type { APIGatewayProxyEventV2 } from "aws-lambda";
import {
  BolusValidationError,
  parseBolusRequestBody,
  parseJsonBody,
  suggestBolus,
  type BolusResult,
} from "@glucosmart/diabetes";
import {
  errorResponse,
  getMethod,
  internalError,
  INVALID_JSON_MESSAGE,
  jsonResponse,
  methodNotAllowed,
  preflightResponse,
  type HttpResult,
} from "./http";

/**
 * Wire format of a successful suggestion
 */
export interface BolusResponseBody {
  suggested_bolus: number;
  details: {
    carb_units: number;
    correction_units: number;
    parameters: {
      carb_ratio: number;
      sensitivity_factor: number;
      target_glucose: number;
    };
  };
}

export function toBolusResponseBody(result: BolusResult): BolusResponseBody {
  return {
    suggested_bolus: result.suggestedBolus,
    details: {
      carb_units: result.carbUnits,
      correction_units: result.correctionUnits,
      parameters: {
        carb_ratio: result.parameters.carbRatio,
        sensitivity_factor: result.parameters.sensitivityFactor,
        target_glucose: result.parameters.targetGlucose,
      },
    },
  };
}

export async function handler(event: APIGatewayProxyEventV2): Promise<HttpResult> {
  const method = getMethod(event);
  if (method === "OPTIONS") {
    return preflightResponse("POST, OPTIONS");
  }
  if (method !== "POST") {
    return methodNotAllowed("POST");
  }

  try {
    let body: unknown;
    try {
      body = parseJsonBody(event.body, event.isBase64Encoded);
    } catch (error) {
      if (error instanceof SyntaxError) {
        return errorResponse(400, INVALID_JSON_MESSAGE);
      }
      throw error;
    }

    const request = parseBolusRequestBody(body);
    const result = suggestBolus(request);

    return jsonResponse(200, toBolusResponseBody(result));
  } catch (error) {
    if (error instanceof BolusValidationError) {
      return errorResponse(400, error.firstIssue?.message ?? error.message);
    }
    console.error("Bolus suggest error:", error);
    return internalError();
  }
}
