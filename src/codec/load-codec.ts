import { CodecUnavailableError, isModuleNotFound } from "#src/errors";
import { LibPdfCodec, type LibPdfModule } from "./libpdf-codec";

/**
 * Dynamically import @libpdf/core.
 */
async function importLibPdf(): Promise<LibPdfModule> {
  try {
    return await import("@libpdf/core");
  } catch (error) {
    if (isModuleNotFound(error)) {
      throw new CodecUnavailableError("@libpdf/core", { cause: error });
    }

    throw error;
  }
}

/**
 * Load the production PDF codec.
 *
 * @throws {CodecUnavailableError} if @libpdf/core is not installed
 */
export async function loadPdfCodec(): Promise<LibPdfCodec> {
  return new LibPdfCodec(await importLibPdf());
}
