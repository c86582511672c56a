import type { BinaryOperator } from "@/types";

/** Every double is exact at this many decimal places, and rounds to zero at the negative */
const MAX_ROUND_DIGITS = 1100;

/**
 * Exact value of a finite, non-negative double as `mantissa * 2 ** exponent`.
 */
function toBinaryFraction(value: number): { mantissa: bigint; exponent: number } {
  const view = new DataView(new ArrayBuffer(8));
  view.setFloat64(0, value);
  const bits = view.getBigUint64(0);
  const biasedExponent = Number(bits >> 52n);
  const fraction = bits & ((1n << 52n) - 1n);

  // Subnormals have no implicit leading bit
  if (biasedExponent === 0) return { mantissa: fraction, exponent: -1074 };
  return { mantissa: fraction | (1n << 52n), exponent: biasedExponent - 1075 };
}

/**
 * `numerator / denominator` rounded to an integer, exact halves to even.
 */
function roundHalfEven(numerator: bigint, denominator: bigint): bigint {
  const quotient = numerator / denominator;
  const twiceRemainder = (numerator % denominator) * 2n;
  if (twiceRemainder > denominator || (twiceRemainder === denominator && quotient % 2n === 1n)) {
    return quotient + 1n;
  }
  return quotient;
}

/**
 * UnaryOps - Pure elementwise operators applied by MathContainer
 */
export const UnaryOps = {
  neg(value: number): number {
    return -value;
  },

  /** Identity */
  pos(value: number): number {
    return value;
  },

  abs(value: number): number {
    return Math.abs(value);
  },

  ceil(value: number): number {
    return Math.ceil(value);
  },

  floor(value: number): number {
    return Math.floor(value);
  },

  trunc(value: number): number {
    return Math.trunc(value);
  },

  /**
   * Round to `ndigits` decimal places, the way a decimal printout would: the
   * exact binary value is rounded, and exact halves go to the even neighbour
   * (`round(2.5) === 2`, `round(2.675, 2) === 2.67`).
   * @param ndigits - Integer; may be negative to round to tens, hundreds, ...
   */
  round(value: number, ndigits = 0): number {
    if (!Number.isInteger(ndigits)) {
      throw new RangeError(`ndigits must be an integer, got ${ndigits}`);
    }
    if (!Number.isFinite(value) || value === 0 || ndigits > MAX_ROUND_DIGITS) return value;
    if (ndigits < -MAX_ROUND_DIGITS) return value < 0 ? -0 : 0;

    const { mantissa, exponent } = toBinaryFraction(Math.abs(value));
    let numerator = mantissa;
    let denominator = 1n;
    if (exponent >= 0) {
      numerator <<= BigInt(exponent);
    } else {
      denominator <<= BigInt(-exponent);
    }
    if (ndigits >= 0) {
      numerator *= 10n ** BigInt(ndigits);
    } else {
      denominator *= 10n ** BigInt(-ndigits);
    }

    // Parsing the decimal string picks the nearest double
    const rounded = Number(`${roundHalfEven(numerator, denominator)}e${-ndigits}`);
    return value < 0 ? -rounded : rounded;
  },
};

/**
 * BinaryOps - Pure elementwise operators applied by MathContainer
 *
 * Floor division and modulo are floored: the remainder takes the sign of the
 * divisor, so `floorDiv(a, b) * b + mod(a, b) === a`.
 */
export const BinaryOps = {
  add(a: number, b: number): number {
    return a + b;
  },

  sub(a: number, b: number): number {
    return a - b;
  },

  mul(a: number, b: number): number {
    return a * b;
  },

  floorDiv(a: number, b: number): number {
    return Math.floor(a / b);
  },

  div(a: number, b: number): number {
    return a / b;
  },

  mod(a: number, b: number): number {
    const r = a % b;
    return r !== 0 && (r < 0) !== (b < 0) ? r + b : r;
  },

  pow(a: number, b: number): number {
    return a ** b;
  },
} satisfies Record<string, BinaryOperator>;

/**
 * Swap the operands of a binary operator: `reflect(op)(a, b) === op(b, a)`
 */
export function reflect(op: BinaryOperator): BinaryOperator {
  return (a, b) => op(b, a);
}
