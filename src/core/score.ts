import { SearchError } from "../errors.js";

const MANTISSA_BITS = 52n;
const MANTISSA_MASK = (1n << MANTISSA_BITS) - 1n;
const EXPONENT_MASK = 0x7ffn;
// 1023 exponent bias + 52 fraction bits
const EXPONENT_OFFSET = 1075;

const POWERS_OF_TEN: bigint[] = [1n];

function pow10(n: number): bigint {
  for (let i = POWERS_OF_TEN.length; i <= n; i++) {
    POWERS_OF_TEN.push((POWERS_OF_TEN[i - 1] ?? 1n) * 10n);
  }
  return POWERS_OF_TEN[n] ?? 10n ** BigInt(n);
}

/**
 * Exact decimal value: `unscaled * 10^-scale`.
 *
 * Built from a double by decomposing its bits, so the decimal is the binary value itself
 * and not the shortest string that round-trips. Used as the sort key of ranked documents.
 */
export class ExactScore {
  private constructor(
    private readonly unscaled: bigint,
    private readonly scale: number,
  ) {}

  static fromNumber(value: number): ExactScore {
    if (!Number.isFinite(value)) {
      throw new SearchError({ code: "INEXACT_SCORE", detail: `${value} has no decimal representation` });
    }

    const view = new DataView(new ArrayBuffer(8));
    view.setFloat64(0, value);
    const bits = view.getBigUint64(0);

    const negative = bits >> 63n === 1n;
    const biased = Number((bits >> MANTISSA_BITS) & EXPONENT_MASK);
    const fraction = bits & MANTISSA_MASK;

    // subnormals have no implicit leading bit and a fixed exponent
    const mantissa = biased === 0 ? fraction : fraction | (1n << MANTISSA_BITS);
    const exponent = biased === 0 ? 1 - EXPONENT_OFFSET : biased - EXPONENT_OFFSET;

    let unscaled: bigint;
    let scale: number;
    if (exponent >= 0) {
      unscaled = mantissa << BigInt(exponent);
      scale = 0;
    } else {
      // m * 2^-k == m * 5^k / 10^k
      scale = -exponent;
      unscaled = mantissa * 5n ** BigInt(scale);
    }

    while (scale > 0 && unscaled % 10n === 0n) {
      unscaled /= 10n;
      scale--;
    }

    return new ExactScore(negative ? -unscaled : unscaled, unscaled === 0n ? 0 : scale);
  }

  compare(other: ExactScore): number {
    let a = this.unscaled;
    let b = other.unscaled;
    if (this.scale < other.scale) a *= pow10(other.scale - this.scale);
    else if (other.scale < this.scale) b *= pow10(this.scale - other.scale);
    return a < b ? -1 : a > b ? 1 : 0;
  }

  equals(other: ExactScore): boolean {
    return this.compare(other) === 0;
  }

  toNumber(): number {
    return Number(this.toString());
  }

  toString(): string {
    const negative = this.unscaled < 0n;
    const digits = (negative ? -this.unscaled : this.unscaled).toString();
    if (this.scale === 0) return negative ? `-${digits}` : digits;

    const padded = digits.padStart(this.scale + 1, "0");
    const whole = padded.slice(0, padded.length - this.scale);
    const frac = padded.slice(padded.length - this.scale);
    return `${negative ? "-" : ""}${whole}.${frac}`;
  }
}
