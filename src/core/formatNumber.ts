export type FieldKind = "velocity" | "depth";

const WIDE_LEAD = " ".repeat(7);
const NARROW_LEAD = " ".repeat(8);

function isNegative(value: number): boolean {
  return value < 0 || Object.is(value, -0);
}

// Beyond this toFixed switches to exponent notation; such values are integers
const FIXED_NOTATION_LIMIT = 1e21;

/**
 * `toFixed` for a non-negative value, except that a value lying exactly
 * halfway between two results rounds to the even one (`2.125` -> `2.12`).
 */
export function toFixedHalfEven(value: number, decimals: number): string {
  const rounded = value.toFixed(decimals);
  if (value >= FIXED_NOTATION_LIMIT) return rounded;

  // 100 places is exact for every double that can sit on a tie
  const exact = value.toFixed(100);
  const point = exact.indexOf(".");
  const keepUntil = decimals > 0 ? point + 1 + decimals : point;
  if (!/^50*$/.test(exact.slice(point + 1 + decimals))) return rounded;

  const truncated = exact.slice(0, keepUntil);
  const lastDigit = Number(truncated[truncated.length - 1]);
  return lastDigit % 2 === 0 ? truncated : rounded;
}

/**
 * Right-aligns `value` with a fixed number of decimals in a field of at least
 * `width` characters. Ties round to even and negative zero keeps its sign.
 */
export function formatFixed(
  value: number,
  width: number,
  decimals: number,
): string {
  const digits = toFixedHalfEven(Math.abs(value), decimals);
  const signed = isNegative(value) ? `-${digits}` : digits;
  return signed.padStart(width, " ");
}

/**
 * Formats one numeric column of a VELEST model line.
 *
 * Velocities are `f4.2`. Depths carry their own leading spaces so that the
 * decimal point lands in the same column: negative depths and depths of 10 km
 * or more take a 5-character field after 7 spaces, everything else a
 * 4-character field after 8 spaces.
 */
export function formatVelestField(value: number, kind: FieldKind): string {
  if (kind === "velocity") {
    return formatFixed(value, 4, 2);
  }

  if (isNegative(value) || value >= 10) {
    return `${WIDE_LEAD}${formatFixed(value, 5, 2)}`;
  }
  return `${NARROW_LEAD}${formatFixed(value, 4, 2)}`;
}

/**
 * Shortest round-trip representation of a stored float, always written as a
 * float: `1.0` rather than `1`, scientific notation below 1e-4 and from 1e16 on
 * (`1e-05`, `1.5e+16`).
 */
export function formatFloat(value: number): string {
  if (Number.isNaN(value)) return "nan";
  if (!Number.isFinite(value)) return value > 0 ? "inf" : "-inf";
  if (value === 0) return Object.is(value, -0) ? "-0.0" : "0.0";

  const [mantissa, exponentText] = value.toExponential().split("e");
  const exponent = Number(exponentText);
  const sign = value < 0 ? "-" : "";
  const digits = mantissa.replace("-", "").replace(".", "");

  if (exponent < -4 || exponent >= 16) {
    const body =
      digits.length > 1 ? `${digits[0]}.${digits.slice(1)}` : digits;
    const exponentSign = exponent < 0 ? "-" : "+";
    const exponentDigits = String(Math.abs(exponent)).padStart(2, "0");
    return `${sign}${body}e${exponentSign}${exponentDigits}`;
  }

  if (exponent < 0) {
    return `${sign}0.${"0".repeat(-exponent - 1)}${digits}`;
  }

  const integerLength = exponent + 1;
  if (digits.length <= integerLength) {
    return `${sign}${digits.padEnd(integerLength, "0")}.0`;
  }
  return `${sign}${digits.slice(0, integerLength)}.${digits.slice(integerLength)}`;
}
