/**
 * Normalization of decrypt results.
 *
 * Codecs disagree on how a decrypt call reports success: some return a
 * boolean, some an ordinal status (0 = failed, 1 = user password,
 * 2 = owner password), some throw. Everything funnels through here so the
 * rest of the code only ever sees a boolean.
 */

import type { DecodedPdf } from "./types";

const INTEGER_STRING = /^\s*[+-]?\d+\s*$/;

/**
 * Read a raw decrypt result as success or failure.
 *
 * - booleans pass through
 * - finite numbers and bigints succeed when their integer part is non-zero
 * - integer strings are parsed the same way
 * - anything else is a failure
 */
export function toUnlockFlag(raw: unknown): boolean {
  if (typeof raw === "boolean") {
    return raw;
  }

  if (typeof raw === "number") {
    return Number.isFinite(raw) && Math.trunc(raw) !== 0;
  }

  if (typeof raw === "bigint") {
    return raw !== 0n;
  }

  if (typeof raw === "string" && INTEGER_STRING.test(raw)) {
    return Number.parseInt(raw, 10) !== 0;
  }

  return false;
}

/**
 * Try one password against a document.
 *
 * Never throws: a codec error or rejected promise counts as a wrong
 * password.
 */
export async function tryDecrypt(doc: DecodedPdf, password: string): Promise<boolean> {
  try {
    return toUnlockFlag(await doc.decrypt(password));
  } catch {
    return false;
  }
}
