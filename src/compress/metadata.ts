import type { DecodedPdf } from "#src/codec/types";

/**
 * Which way document metadata was stripped.
 *
 * - `removed`: the codec dropped it
 * - `emptied`: the codec replaced it with an empty set
 * - `none`: neither worked; metadata is kept
 */
export type MetadataStrategy = "removed" | "emptied" | "none";

/**
 * Strip document-level metadata with the first capability that works.
 *
 * Tries `removeMetadata`, then `setMetadata({})`. A missing method or a
 * failing call moves on to the next strategy.
 */
export async function stripMetadata(doc: DecodedPdf): Promise<MetadataStrategy> {
  const strategies: [MetadataStrategy, () => Promise<void> | undefined][] = [
    ["removed", () => doc.removeMetadata?.()],
    ["emptied", () => doc.setMetadata?.({})],
  ];

  for (const [strategy, apply] of strategies) {
    try {
      const pending = apply();

      // Capability not offered by this codec
      if (!pending) {
        continue;
      }

      await pending;

      return strategy;
    } catch {
      continue;
    }
  }

  return "none";
}
