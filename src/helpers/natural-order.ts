/**
 * Natural ("human") ordering for file names.
 *
 * Digit runs compare as numbers, everything else compares as lower-cased
 * text, so `file2.pdf` sorts before `file10.pdf`.
 */

/**
 * One element of a natural sort key. Digit runs too long for a safe
 * integer are kept as bigints.
 */
export type NaturalKeyPart = number | bigint | string;

const DIGIT_RUNS = /(\d+)/;

/**
 * Build the sort key for a string.
 *
 * The string is split at maximal runs of decimal digits. Because the split
 * keeps leading and trailing text segments (possibly empty), text and
 * numbers alternate and always sit at the same positions in every key.
 *
 * @example
 * ```ts
 * naturalKey("Scan10.PDF") // ["scan", 10, ".pdf"]
 * naturalKey("2024-report") // ["", 2024, "-report"]
 * ```
 */
export function naturalKey(value: string): NaturalKeyPart[] {
  return value
    .split(DIGIT_RUNS)
    .map((segment, i) => (i % 2 === 1 ? parseDigits(segment) : segment.toLowerCase()));
}

function parseDigits(digits: string): number | bigint {
  const value = Number.parseInt(digits, 10);

  return Number.isSafeInteger(value) ? value : BigInt(digits);
}

function comparePart(a: NaturalKeyPart, b: NaturalKeyPart): number {
  if (typeof a === "number" && typeof b === "number") {
    return a - b;
  }

  if (typeof a !== "string" && typeof b !== "string") {
    const left = BigInt(a);
    const right = BigInt(b);

    return left === right ? 0 : left < right ? -1 : 1;
  }

  if (typeof a === "string" && typeof b === "string") {
    if (a === b) {
      return 0;
    }

    return a < b ? -1 : 1;
  }

  // Only reachable for hand-built keys; numbers go first.
  return typeof a === "string" ? 1 : -1;
}

/**
 * Compare two sort keys element-wise. A key that is a prefix of the other
 * sorts first.
 */
export function compareNaturalKeys(a: readonly NaturalKeyPart[], b: readonly NaturalKeyPart[]): number {
  const length = Math.min(a.length, b.length);

  for (let i = 0; i < length; i++) {
    const left = a[i];
    const right = b[i];

    if (left === undefined || right === undefined) {
      break;
    }

    const result = comparePart(left, right);

    if (result !== 0) {
      return result;
    }
  }

  return a.length - b.length;
}

/**
 * Comparator for `Array.prototype.sort` using natural ordering.
 */
export function compareNatural(a: string, b: string): number {
  return compareNaturalKeys(naturalKey(a), naturalKey(b));
}
