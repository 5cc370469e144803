/**
 * JSON body helpers
 */

/**
 * True for a plain JSON object (not null, not an array)
 */
export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse a JSON request body. Empty or absent bodies parse to undefined.
 *
 * @throws SyntaxError if the body is not valid JSON
 */
export function parseJsonBody(body: string | undefined, isBase64Encoded = false): unknown {
  if (body === undefined || body === "") {
    return undefined;
  }
  const text = isBase64Encoded ? Buffer.from(body, "base64").toString("utf-8") : body;
  return JSON.parse(text);
}
