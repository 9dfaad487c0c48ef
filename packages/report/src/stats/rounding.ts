/**
 * Half-to-even rounding
 *
 * Rounds the exact binary value of a number. Only a value that is exactly
 * halfway at the requested precision (100.5, 1.125, 7.25) counts as a tie;
 * ties go to the even digit. 2.675 is stored as 2.67499..., so it rounds
 * down to 2.67 at two decimals.
 */

function isExactTie(value: number, decimals: number): boolean {
  // toFixed(100) is the exact decimal expansion for any value a tie can have
  const expansion = Math.abs(value).toFixed(100).replace(/0+$/, "");
  const fraction = expansion.slice(expansion.indexOf(".") + 1);
  return fraction.length === decimals + 1 && fraction.endsWith("5");
}

/**
 * Fixed-point text with `decimals` digits, ties to even
 */
export function formatHalfEven(value: number, decimals: number): string {
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) {
    return String(value);
  }

  // toFixed rounds the exact value, but moves ties away from zero
  const fixed = value.toFixed(decimals);
  if (!isExactTie(value, decimals) || Number(fixed.slice(-1)) % 2 === 0) {
    return fixed;
  }

  const magnitude = Math.abs(Number(fixed)) - Math.pow(10, -decimals);
  return (value < 0 ? -magnitude : magnitude).toFixed(decimals);
}

/**
 * Round to `decimals` places (default 0), ties to even
 */
export function roundHalfEven(value: number, decimals = 0): number {
  if (!Number.isFinite(value)) return value;
  return Number(formatHalfEven(value, decimals));
}
