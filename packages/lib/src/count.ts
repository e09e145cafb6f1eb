export type CellValue = string | number | boolean | null | undefined;

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Coerces a spreadsheet cell into a non-negative whole count.
 * Only plain decimal text is read (no hex, octal or binary literals); blank or non-numeric
 * cells count as zero, fractions truncate and negatives clamp to zero.
 */
export function parseCount(value: CellValue): number {
  if (value === undefined || value === null || typeof value === 'boolean') return 0;

  const parsed = typeof value === 'number' ? value : parseDecimal(value);
  if (!Number.isFinite(parsed)) {
    return 0;
  }
  return Math.max(0, Math.trunc(parsed));
}

function parseDecimal(value: string): number {
  const text = value.trim();
  return DECIMAL.test(text) ? Number(text) : Number.NaN;
}

export function cellText(value: CellValue): string {
  if (value === undefined || value === null) return '';
  return String(value);
}
