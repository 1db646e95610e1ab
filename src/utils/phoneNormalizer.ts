/**
 * Normalizes a phone number to the international format 92xxxxxxxxxx
 * Handles inputs like: 03001234567, +923001234567, 923001234567, 0092300...
 *
 * @param phoneNumber - The phone number in any format
 * @returns Normalized phone number in format 92xxxxxxxxxx
 * @throws Error if the phone number format is invalid
 */
export function normalizePhoneNumber(phoneNumber: string): string {
  // Remove all whitespace and dashes
  const cleaned = phoneNumber.replace(/[\s-]/g, '');

  const withoutPlus = cleaned.startsWith('+') ? cleaned.slice(1) : cleaned;

  if (!/^\d+$/.test(withoutPlus)) {
    throw new Error(`Invalid phone number format: ${phoneNumber}`);
  }

  if (withoutPlus.startsWith('0092')) {
    return withoutPlus.slice(2);
  } else if (withoutPlus.startsWith('92')) {
    return withoutPlus;
  } else if (withoutPlus.startsWith('0')) {
    // Local format starting with 0 (e.g., 03001234567)
    return '92' + withoutPlus.slice(1);
  } else if (withoutPlus.length === 10) {
    // 10 digits without prefix (e.g., 3001234567)
    return '92' + withoutPlus;
  }

  // WhatsApp ids from other countries are kept as-is
  if (withoutPlus.length >= 8) {
    return withoutPlus;
  }
  throw new Error(`Invalid phone number format: ${phoneNumber}`);
}

/**
 * Strips spaces and dashes and checks the local mobile pattern 03XXXXXXXXX
 *
 * @returns the cleaned number, or null when it does not match
 */
export function parseLocalPhoneNumber(input: string): string | null {
  const cleaned = input.replace(/[\s-]/g, '');
  return /^03\d{9}$/.test(cleaned) ? cleaned : null;
}

/**
 * Masks all but the last four digits (used in audit listings)
 */
export function maskPhone(phone: string): string {
  return phone.length <= 4 ? phone : `...${phone.slice(-4)}`;
}
