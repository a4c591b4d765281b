/**
 * Cleans a raw cell: non-breaking spaces become spaces, byte-order marks are
 * removed, surrounding whitespace is trimmed. Blank cells become `null`.
 */
export function cleanText(value: unknown): string | null {
  if (value == null) return null;
  const str = String(value).replace(/\u00a0/g, ' ').replace(/\ufeff/g, '').trim();
  return str.length ? str : null;
}

export function normalizeNumber(value: unknown): number | null {
  if (value == null || value === '') return null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  const cleaned = cleanText(value);
  if (cleaned == null) return null;
  const parsed = Number(cleaned.replace(',', '.'));
  return Number.isFinite(parsed) ? parsed : null;
}

export type ParsedInteger = { ok: true; value: number | null } | { ok: false };

/**
 * Reads an integer cell. Spreadsheet exports write ids as `27447.0`, which is
 * accepted; `27447.5` or `abc` is not.
 */
export function parseInteger(value: unknown): ParsedInteger {
  if (cleanText(value) == null) return { ok: true, value: null };
  const parsed = normalizeNumber(value);
  if (parsed == null || !Number.isSafeInteger(parsed)) return { ok: false };
  return { ok: true, value: parsed };
}

export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (match) => `\\${match}`);
}
