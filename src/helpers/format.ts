/**
 * Number formatting for PDF output.
 */

/** Places used when a real is created without a precision. */
export const DEFAULT_REAL_DECIMALS = 6;

/**
 * Format a real with a fixed number of decimal places, then strip trailing
 * zeros (and a dangling decimal point).
 *
 * A precision of zero or less means {@link DEFAULT_REAL_DECIMALS}.
 *
 * @example
 * ```ts
 * formatReal(1.2345, 3) // "1.234"
 * formatReal(2.5, 0)    // "2.5"
 * formatReal(3, 2)      // "3"
 * ```
 */
export function formatReal(value: number, decimals: number): string {
  const places = decimals > 0 ? decimals : DEFAULT_REAL_DECIMALS;

  let str = value.toFixed(places);

  if (str.includes(".")) {
    str = str.replace(/0+$/, "").replace(/\.$/, "");
  }

  if (str === "-0" || str === "") {
    return "0";
  }

  return str;
}

/**
 * Format an integer or a real for PDF output.
 */
export function formatPdfNumber(value: number): string {
  if (Number.isInteger(value)) {
    return value.toString();
  }

  return formatReal(value, DEFAULT_REAL_DECIMALS);
}

/**
 * Left-align a number in a fixed-width field, padding with spaces. Used where
 * a value is patched in after the bytes around it were laid out.
 */
export function padNumber(value: number, width: number): string {
  return value.toString().padEnd(width, " ");
}
