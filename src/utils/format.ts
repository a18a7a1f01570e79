import { FORMAT } from '../config';

/**
 * Exact decimal expansion of a finite, non-negative double.
 * Integers go through BigInt; anything else is below 2^53 and terminates
 * within 100 fraction digits at the magnitudes rounded here.
 */
function exactDecimal(magnitude: number): string {
  if (Number.isInteger(magnitude)) {
    return BigInt(magnitude).toString();
  }
  return magnitude.toFixed(100).replace(/0+$/, '');
}

/**
 * Round a non-negative decimal string to `digits` fraction digits,
 * breaking exact ties towards the even neighbour.
 */
function roundHalfEven(decimal: string, digits: number): string {
  const [whole, fraction = ''] = decimal.split('.');
  const padded = fraction.padEnd(digits, '0');
  const rest = padded.slice(digits);

  let kept = BigInt(whole + padded.slice(0, digits));
  const tie = /^50*$/.test(rest);
  if ((rest[0] ?? '0') > '5' || (rest[0] === '5' && !tie) || (tie && kept % 2n === 1n)) {
    kept += 1n;
  }

  const text = kept.toString().padStart(digits + 1, '0');
  if (digits === 0) return text;
  return `${text.slice(0, -digits)}.${text.slice(-digits)}`;
}

function fixed(value: number, digits: number): string {
  const sign = value < 0 ? '-' : '';
  return sign + roundHalfEven(exactDecimal(Math.abs(value)), digits);
}

// Mantissa and exponent without a "+" ("1.5e6"), as the display shows them
function scientific(value: number, digits: number): string {
  const sign = value < 0 ? '-' : '';
  const [whole, fraction = ''] = exactDecimal(Math.abs(value)).split('.');
  let exponent = whole.length - 1;

  let mantissa = roundHalfEven(`${whole[0]}.${whole.slice(1)}${fraction}`, digits);
  if (mantissa.startsWith('10')) {
    // 9.99995... carried over to 10.0000
    mantissa = `1.${'0'.repeat(digits)}`;
    exponent += 1;
  }
  return `${sign}${mantissa}e${exponent}`;
}

/**
 * Render a number for display. Lossy; never parse the result back.
 *
 * - non-zero magnitudes below 0.0001: scientific, 6 fraction digits
 * - magnitudes of 1,000,000 or more: scientific, 4 fraction digits
 * - everything else, including zero: fixed-point, 6 fraction digits
 *
 * Exact ties round to even.
 */
export function formatNumber(value: number): string {
  if (!Number.isFinite(value)) {
    return String(value);
  }

  const magnitude = Math.abs(value);

  if (magnitude < FORMAT.SMALL_THRESHOLD && value !== 0) {
    // No double below 1e-4 sits exactly halfway at seven significant digits
    return value.toExponential(FORMAT.SMALL_SCIENTIFIC_DIGITS);
  }
  if (magnitude >= FORMAT.LARGE_THRESHOLD) {
    return scientific(value, FORMAT.LARGE_SCIENTIFIC_DIGITS);
  }
  return fixed(value, FORMAT.FIXED_DIGITS);
}
