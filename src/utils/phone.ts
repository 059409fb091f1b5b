/**
 * Reduce a phone number to digits, keeping a leading + for international form.
 * Returns null when the digit count can't be a real number (E.164 allows 15).
 */
export function normalizePhone(raw: string | null | undefined): string | null {
  if (!raw) return null;
  const trimmed = raw.trim();
  const digits = trimmed.replaceAll(/\D/g, '');
  if (digits.length < 7 || digits.length > 15) {
    return null;
  }
  return trimmed.startsWith('+') ? `+${digits}` : digits;
}
