/**
 * Rewriting a single PDF with compressed content streams.
 */

import { loadPdfCodec } from "#src/codec/load-codec";
import type { DecodedPdf, PdfCodec } from "#src/codec/types";
import { resolvePassword } from "#src/security/password-resolution";
import { type DocumentSource, ensureSeekable } from "#src/sources/document-source";
import { type MetadataStrategy, stripMetadata } from "./metadata";

export const SKIP_UNREADABLE = "Unable to read PDF";
export const SKIP_LOCKED = "Password required or incorrect";
export const SKIP_WRITE_FAILED = "Failed to write compressed PDF";

export interface CompressOptions {
  /** Tried before the source's own password */
  defaultPassword?: string;
  /** Defaults to @libpdf/core */
  codec?: PdfCodec;
}

/**
 * Outcome of compressing one document. `output` is set exactly when
 * `skipped` is false.
 */
export interface CompressionResult {
  output: Uint8Array | null;
  /** Pages processed */
  pages: number;
  skipped: boolean;
  skippedReason: string | null;
  sourceName: string;
  /** Indices of pages kept uncompressed because their rewrite failed */
  uncompressedPages: number[];
  metadataStrategy: MetadataStrategy | null;
}

/**
 * Compress every page's content streams and strip metadata.
 *
 * Never prompts for a password. A page that fails to compress is kept as
 * it was; no page is ever dropped.
 *
 * @throws {CodecUnavailableError} if no codec is given and @libpdf/core is missing
 */
export async function compressDocument(
  source: DocumentSource,
  options: CompressOptions = {},
): Promise<CompressionResult> {
  const codec = options.codec ?? (await loadPdfCodec());
  const sourceName = source.name;

  const skipped = (reason: string, pages = 0): CompressionResult => ({
    output: null,
    pages,
    skipped: true,
    skippedReason: reason,
    sourceName,
    uncompressedPages: [],
    metadataStrategy: null,
  });

  let doc: DecodedPdf;

  try {
    const { bytes } = await ensureSeekable(source);
    doc = await codec.decode(bytes, sourceName);
  } catch {
    return skipped(SKIP_UNREADABLE);
  }

  const unlock = await resolvePassword(doc, {
    name: sourceName,
    defaultPassword: options.defaultPassword,
    override: source.password,
  });

  if (unlock.status !== "unlocked") {
    return skipped(SKIP_LOCKED);
  }

  const pages = doc.pageCount;
  const uncompressedPages: number[] = [];

  for (let i = 0; i < pages; i++) {
    try {
      await doc.compressPage(i);
    } catch {
      uncompressedPages.push(i);
    }
  }

  const metadataStrategy = await stripMetadata(doc);

  try {
    return {
      output: await doc.save(),
      pages,
      skipped: false,
      skippedReason: null,
      sourceName,
      uncompressedPages,
      metadataStrategy,
    };
  } catch {
    return { ...skipped(SKIP_WRITE_FAILED, pages), uncompressedPages, metadataStrategy };
  }
}
