/**
 * Input validation helpers for inbound chat text
 */

/**
 * Sanitize user input for safe storage
 * - Trim whitespace
 * - Remove control characters
 * - Limit length
 */
export function sanitizeInput(input: string, maxLength: number = 1000): string {
  return input
    .trim()
    // Remove control characters except newlines
    .replace(/[\x00-\x09\x0B\x0C\x0E-\x1F\x7F]/g, '')
    .substring(0, maxLength);
}

/**
 * Not empty, not too long, contains at least one letter or digit
 */
export function isValidMessage(message: string): boolean {
  const sanitized = sanitizeInput(message, 10001);

  if (sanitized.length === 0 || sanitized.length > 10000) {
    return false;
  }

  return /[\p{L}\p{N}]/u.test(sanitized);
}

/**
 * Validate a display name
 * - 1-4 words
 * - Each word 1-30 characters
 * - Letters (any script), apostrophes and hyphens
 */
export function isValidName(name: string): boolean {
  const trimmed = name.trim();
  if (trimmed.length === 0) {
    return false;
  }

  const words = trimmed.split(/\s+/);
  if (words.length > 4) {
    return false;
  }

  return words.every(word =>
    word.length <= 30 && /^[\p{L}\p{M}'-]+$/u.test(word)
  );
}

/**
 * Parse an age answer. Returns the integer when the whole answer is one,
 * otherwise null.
 */
export function parseAge(input: string): number | null {
  const trimmed = input.trim();
  if (!/^\d{1,3}$/.test(trimmed)) {
    return null;
  }
  return parseInt(trimmed, 10);
}
