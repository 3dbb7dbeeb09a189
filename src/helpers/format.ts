/**
 * PDF number formatting.
 */

// Above this magnitude `toString` and `toFixed` both switch to exponent
// form; every double this large is an integer.
const EXPONENT_THRESHOLD = 1e21;

function integerDigits(value: number): string {
  return BigInt(value).toString();
}

/**
 * Format a number for a PDF dictionary entry (MediaBox, /Length, ...).
 *
 * - Integers are written without decimal point
 * - Reals use minimal precision (no trailing zeros)
 * - At most 5 decimal places
 */
export function formatPdfNumber(value: number): string {
  if (Number.isInteger(value)) {
    return Math.abs(value) >= EXPONENT_THRESHOLD ? integerDigits(value) : value.toString();
  }

  let str = value.toFixed(5);

  str = str.replace(/\.?0+$/, "");

  if (str === "" || str === "-" || str === "-0") {
    return "0";
  }

  return str;
}

/**
 * Format a content-stream operand.
 *
 * Operands keep full floating precision: `128 / 255` is written as
 * `0.5019607843137255`, not rounded. Values JavaScript would print in
 * exponent form (`6.123233995736766e-17` from `cos(90°)`, or `1e+21`)
 * are not valid PDF numbers, so those fall back to plain digits.
 */
export function formatOperand(value: number): string {
  if (!Number.isFinite(value)) {
    throw new RangeError(`Cannot write non-finite number ${value} as a PDF operand`);
  }

  const str = String(value);

  if (!str.includes("e")) {
    return str;
  }

  if (Math.abs(value) >= EXPONENT_THRESHOLD) {
    return integerDigits(value);
  }

  const fixed = value.toFixed(20).replace(/\.?0+$/, "");

  return fixed === "-0" || fixed === "" ? "0" : fixed;
}

/**
 * Join operands with single spaces and append an operator.
 *
 * @example
 * ```ts
 * formatOperation([10, 722, 100, 50], "re") // "10 722 100 50 re"
 * ```
 */
export function formatOperation(operands: readonly number[], operator: string): string {
  if (operands.length === 0) {
    return operator;
  }

  return `${operands.map(formatOperand).join(" ")} ${operator}`;
}
