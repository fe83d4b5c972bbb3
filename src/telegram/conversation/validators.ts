// No `u` flag: with it, ſ and K would case-fold into the ASCII range.
const VIN_PATTERN = /^[A-HJ-NPR-Z0-9]{17}$/i;

export const MIN_CONTACT_LENGTH = 5;

export type ValidationResult = { valid: true; value: string } | { valid: false };

/**
 * 17 characters of A-Z (without I, O, Q) and digits, case-insensitive.
 * The accepted value is the uppercased input. Surrounding whitespace is the
 * caller's business: it counts towards the length here.
 */
export function validateVin(input: string): ValidationResult {
  return VIN_PATTERN.test(input) ? { valid: true, value: input.toUpperCase() } : { valid: false };
}

/**
 * Placeholder check: at least five code points after trimming. Phone numbers
 * and e-mail addresses are not told apart or format-checked.
 */
export function validateContact(input: string): ValidationResult {
  const candidate = input.trim();
  return [...candidate].length >= MIN_CONTACT_LENGTH ? { valid: true, value: candidate } : { valid: false };
}

export function validateParts(input: string): ValidationResult {
  const candidate = input.trim();
  return candidate.length > 0 ? { valid: true, value: candidate } : { valid: false };
}
