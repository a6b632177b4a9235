/**
 * Narrowing helpers for parsed JSON values.
 */

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse a JSON column or file body that must hold an object.
 * Returns null for SQL NULL, malformed JSON and non-object documents.
 */
export function parseJsonObject(
  text: string | null | undefined,
): Record<string, unknown> | null {
  if (text === null || text === undefined) return null;
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  return isRecord(parsed) ? parsed : null;
}

/** Read `document[outer][inner]` when both levels are objects. */
export function nestedValue(
  document: Record<string, unknown>,
  outer: string,
  inner: string,
): unknown {
  const child = document[outer];
  return isRecord(child) ? child[inner] : undefined;
}
