// Decimal literals only: no 0x/0b/0o prefixes, underscores only between digits
const NON_DECIMAL_PREFIX = /^[+-]?0[xXbBoO]/;
const MISPLACED_UNDERSCORE = /(^|[^0-9])_|_($|[^0-9])/;

// Digits inspected past the rounding position to tell an exact tie apart
const TIE_PRECISION = 25;

/**
 * Loose numeric coercion for scoreboard fields. Accepts finite numbers,
 * booleans and decimal numeric strings; returns null for anything else.
 */
export function coerceNumber(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "boolean") {
    return value ? 1 : 0;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (trimmed.length === 0) return null;
    if (NON_DECIMAL_PREFIX.test(trimmed) || MISPLACED_UNDERSCORE.test(trimmed)) {
      return null;
    }
    const parsed = Number(trimmed.replace(/_/g, ""));
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Rounds the exact binary value to `digits` decimal places, resolving exact
 * halves to the even neighbour (120.5 -> 120, 121.5 -> 122, 96.25 -> 96.2).
 */
export function roundHalfEven(value: number, digits: number = 0): number {
  const rounded = Number(value.toFixed(digits));
  const [whole, fraction = ""] = Math.abs(value)
    .toFixed(digits + TIE_PRECISION)
    .split(".");
  const kept = fraction.slice(0, digits);
  const rest = fraction.slice(digits);
  if (rest !== "5".padEnd(TIE_PRECISION, "0")) {
    return rounded;
  }
  // toFixed breaks ties away from zero; keep the truncated value when it is already even
  const lastDigit = Number(digits > 0 ? kept[kept.length - 1] : whole[whole.length - 1]);
  if (lastDigit % 2 !== 0) {
    return rounded;
  }
  const truncated = Number(digits > 0 ? `${whole}.${kept}` : whole);
  return value < 0 ? -truncated : truncated;
}
