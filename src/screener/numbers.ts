const DECIMAL_REAL = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/** Decimal reals only; blank, hex/binary/octal literals and other text are all absent. */
export function parseNumber(value: string | undefined): number | undefined {
  const trimmed = value?.trim();
  if (!trimmed || !DECIMAL_REAL.test(trimmed)) {
    return undefined;
  }
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : undefined;
}
