export const ORG_IDENTIFIER_WIDTH = 8;

/**
 * Normalizes an organizational identifier to its fixed-width digit form.
 * Spreadsheet exports turn `01234567` into `1234567` or `1234567.0`; both map
 * back to `01234567`. Returns null for blank or non-numeric input.
 */
export function normalizeOrgIdentifier(raw: unknown): string | null {
  if (raw === null || raw === undefined) {
    return null;
  }
  let text: string;
  if (typeof raw === 'number') {
    if (!Number.isFinite(raw) || !Number.isInteger(raw) || raw < 0) {
      return null;
    }
    text = String(raw);
  } else if (typeof raw === 'bigint') {
    text = raw.toString();
  } else if (typeof raw === 'string') {
    text = raw;
  } else {
    return null;
  }

  const cleaned = text.trim().replace(/\.0+$/, '');
  if (!/^\d+$/.test(cleaned)) {
    return null;
  }
  return cleaned.padStart(ORG_IDENTIFIER_WIDTH, '0');
}
