/**
 * Luhn Checksum
 * Used to validate payment card numbers
 */

/**
 * Validates a digit string with the Luhn algorithm
 * Spaces and dashes are ignored; anything else fails
 */
export function validateLuhn(value: string): boolean {
  const digits = value.replace(/[\s-]/g, "");
  if (!/^\d{2,}$/.test(digits)) {
    return false;
  }

  let sum = 0;
  let double = false;
  for (let i = digits.length - 1; i >= 0; i--) {
    let digit = digits.charCodeAt(i) - 48;
    if (double) {
      digit *= 2;
      if (digit > 9) {
        digit -= 9;
      }
    }
    sum += digit;
    double = !double;
  }

  return sum % 10 === 0;
}
