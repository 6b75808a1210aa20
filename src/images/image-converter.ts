/**
 * Converting a batch of images into one PDF, one page per image.
 */

import { loadPdfCodec } from "#src/codec/load-codec";
import type { PdfCodec, RasterImage } from "#src/codec/types";
import { type ImageSource, ensureSeekable } from "#src/sources/document-source";
import { type ImageCodec, loadImageCodec } from "./image-codec";

export interface ConvertImagesOptions {
  /** Defaults to sharp */
  imageCodec?: ImageCodec;
  /** Defaults to @libpdf/core */
  pdfCodec?: PdfCodec;
}

/**
 * Summary of one conversion.
 */
export interface ImageConversionResult {
  /** The assembled PDF; null when no image made it in */
  output: Uint8Array | null;
  processedCount: number;
  skippedCount: number;
  skippedFiles: string[];
}

/**
 * Convert images, in the order given, into a single PDF.
 *
 * Images that cannot be decoded are skipped. If assembling the PDF fails,
 * every image is reported as skipped and there is no output.
 *
 * @throws {CodecUnavailableError} if a default codec's package is missing
 */
export async function convertImages(
  sources: Iterable<ImageSource> | AsyncIterable<ImageSource>,
  options: ConvertImagesOptions = {},
): Promise<ImageConversionResult> {
  const imageCodec = options.imageCodec ?? (await loadImageCodec());

  const decoded: { name: string; image: RasterImage }[] = [];
  const skippedFiles: string[] = [];

  for await (const source of sources) {
    try {
      const { bytes } = await ensureSeekable(source);

      decoded.push({ name: source.name, image: await imageCodec.decode(bytes, source.name) });
    } catch {
      skippedFiles.push(source.name);
    }
  }

  if (decoded.length === 0) {
    return { output: null, processedCount: 0, skippedCount: skippedFiles.length, skippedFiles };
  }

  const pdfCodec = options.pdfCodec ?? (await loadPdfCodec());

  try {
    const output = await pdfCodec.assembleImages(decoded.map(entry => entry.image));

    return {
      output,
      processedCount: decoded.length,
      skippedCount: skippedFiles.length,
      skippedFiles,
    };
  } catch {
    const allSkipped = [...skippedFiles, ...decoded.map(entry => entry.name)];

    return { output: null, processedCount: 0, skippedCount: allSkipped.length, skippedFiles: allSkipped };
  }
}
