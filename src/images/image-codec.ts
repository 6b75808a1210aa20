/**
 * Image decoding for image-to-PDF conversion.
 */

import type sharp from "sharp";
import type { RasterImage } from "#src/codec/types";
import { CodecUnavailableError, DecodeError, isModuleNotFound } from "#src/errors";

/** The default export of sharp */
export type SharpFactory = typeof sharp;

/**
 * Decodes image bytes into something a PdfCodec can place on a page.
 */
export interface ImageCodec {
  /**
   * @throws {DecodeError} if the bytes are not a supported image
   */
  decode(bytes: Uint8Array, name?: string): Promise<RasterImage>;
}

/** JPEG quality used when re-encoding decoded images */
const JPEG_QUALITY = 90;

/**
 * ImageCodec backed by sharp.
 *
 * Accepts every format sharp reads (PNG, JPEG, WebP, GIF, TIFF, AVIF, ...),
 * taking the first frame of animated or multi-page input. Images are
 * normalized to 3-channel sRGB, dropping any alpha channel, and re-encoded
 * as JPEG for embedding.
 */
export class SharpImageCodec implements ImageCodec {
  constructor(private readonly sharp: SharpFactory) {}

  async decode(bytes: Uint8Array, name?: string): Promise<RasterImage> {
    try {
      let image = this.sharp(bytes, { failOn: "error" });
      const metadata = await image.metadata();

      if (metadata.channels !== 3 || metadata.space !== "srgb") {
        image = image.removeAlpha().toColourspace("srgb");
      }

      const { data, info } = await image
        .jpeg({ quality: JPEG_QUALITY })
        .toBuffer({ resolveWithObject: true });

      return { width: info.width, height: info.height, channels: 3, bytes: new Uint8Array(data) };
    } catch (error) {
      throw new DecodeError(`Unable to read image${name ? ` '${name}'` : ""}`, name, {
        cause: error,
      });
    }
  }
}

/**
 * Dynamically import sharp.
 */
async function importSharp(): Promise<SharpFactory> {
  try {
    const module = await import("sharp");

    return module.default;
  } catch (error) {
    if (isModuleNotFound(error)) {
      throw new CodecUnavailableError("sharp", { cause: error });
    }

    throw error;
  }
}

/**
 * Load the production image codec.
 *
 * @throws {CodecUnavailableError} if sharp is not installed
 */
export async function loadImageCodec(): Promise<SharpImageCodec> {
  return new SharpImageCodec(await importSharp());
}
