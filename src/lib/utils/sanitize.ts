/**
 * Sanitization utilities for security
 * Prevents log injection through receiver and pool identifiers
 */

/**
 * Receiver and pool identifiers accepted by the API
 */
export const IDENTIFIER_PATTERN = /^[a-zA-Z0-9_-]{1,64}$/;

/**
 * Sanitize a value for safe logging
 * Removes newlines, control characters, and truncates long values
 *
 * @param maxLength - Maximum length before truncation (default: 200)
 */
export function sanitizeForLog(
  input: unknown,
  maxLength: number = 200,
): string {
  if (input === null || input === undefined) {
    return "null";
  }

  const str = String(input);

  // Only printable ASCII survives
  return str
    .replace(/[\n\r\t]/g, " ")
    .replace(/[^\x20-\x7E]/g, "")
    .substring(0, maxLength);
}

/**
 * Sanitize an ID for safe logging
 * Ensures IDs only contain alphanumeric characters, dashes and underscores
 */
export function sanitizeId(id: unknown): string {
  if (id === null || id === undefined) {
    return "null";
  }

  const str = String(id);
  return str.replace(/[^a-zA-Z0-9_-]/g, "").substring(0, 100);
}

export function isValidIdentifier(id: string): boolean {
  return IDENTIFIER_PATTERN.test(id);
}
