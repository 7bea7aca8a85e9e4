/** Códigos STD de 2 dígitos (metros); el resto se formatea con 3 */
const METRO_STD_CODES = new Set(['11', '20', '22', '33', '40', '44']);

/**
 * Candidatos a teléfono en texto libre: "+91 98765 43210", "022-2345 6789",
 * "(080) 4123 4567", "1800 123 4567". Se validan con normalizePhone.
 */
export const PHONE_CANDIDATE = /(?<![\w+])(?:\+\s?91[\s.-]*)?\(?\d[\d\s().-]{7,14}\d(?!\d)/g;

/**
 * Normaliza un teléfono a formato internacional.
 *
 *   "09876543210"    → "+91 98765 43210"
 *   "+91-22-23456789" → "+91 22 2345 6789"
 *   "1800 123 4567"  → "+91 1800 123 4567"
 *   "+44 20 7946 0000" → "+442079460000"
 *
 * Con `requirePrefix`, un fijo sin "+91" ni "0" inicial no se acepta:
 * en texto libre demasiados números de 10 dígitos no son teléfonos.
 */
export function normalizePhone(raw: string, requirePrefix = false): string | null {
  const trimmed = raw.trim();
  let digits = trimmed.replace(/\D/g, '');
  const international = trimmed.startsWith('+');

  if (international && !digits.startsWith('91')) {
    return digits.length >= 8 && digits.length <= 15 ? `+${digits}` : null;
  }

  let prefixed = international;
  if (digits.startsWith('91') && (international || digits.length === 12)) {
    digits = digits.slice(2);
    prefixed = true;
  } else if (digits.length === 11 && digits.startsWith('0')) {
    digits = digits.slice(1);
    prefixed = true;
  }

  if (/^1800\d{6,7}$/.test(digits)) {
    return `+91 1800 ${digits.slice(4, 7)} ${digits.slice(7)}`;
  }
  if (digits.length !== 10) return null;

  if (/^[6-9]/.test(digits)) {
    return `+91 ${digits.slice(0, 5)} ${digits.slice(5)}`;
  }

  if (/^[1-5]/.test(digits) && (prefixed || !requirePrefix)) {
    if (METRO_STD_CODES.has(digits.slice(0, 2))) {
      return `+91 ${digits.slice(0, 2)} ${digits.slice(2, 6)} ${digits.slice(6)}`;
    }
    return `+91 ${digits.slice(0, 3)} ${digits.slice(3, 6)} ${digits.slice(6)}`;
  }

  return null;
}
