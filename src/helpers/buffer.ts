/**
 * Buffer utilities for working with Uint8Array chunks.
 */

/**
 * Concatenate multiple Uint8Arrays into a single Uint8Array.
 *
 * A single chunk is returned as-is rather than copied.
 *
 * @param arrays - Arrays to concatenate
 * @returns Single Uint8Array containing all data
 */
export function concatBytes(arrays: readonly Uint8Array[]): Uint8Array {
  if (arrays.length === 1 && arrays[0] !== undefined) {
    return arrays[0];
  }

  const totalLength = arrays.reduce((sum, arr) => sum + arr.length, 0);
  const result = new Uint8Array(totalLength);

  let offset = 0;

  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }

  return result;
}
