/**
 * PdfCodec backed by @libpdf/core.
 *
 * The library module is injected rather than imported so that a missing
 * package surfaces through `loadPdfCodec` as a typed error.
 */

import type { PDF, PdfObject } from "@libpdf/core";
import { DecodeError } from "#src/errors";
import type { DecodedPdf, OutputPdf, PdfCodec, RasterImage } from "./types";

/** The @libpdf/core module namespace */
export type LibPdfModule = typeof import("@libpdf/core");

/**
 * A document decoded by @libpdf/core.
 *
 * Documents that the library refuses to open without credentials are kept
 * as a locked handle with no parsed document; `decrypt` then re-parses the
 * original bytes with the candidate password. Documents it did parse are
 * authenticated in place.
 */
export class LibPdfDocument implements DecodedPdf {
  private pdf: PDF | null;

  constructor(
    private readonly lib: LibPdfModule,
    private readonly bytes: Uint8Array,
    pdf: PDF | null,
  ) {
    this.pdf = pdf;
  }

  get isEncrypted(): boolean {
    return this.pdf?.isEncrypted ?? true;
  }

  get isUnlocked(): boolean {
    if (!this.pdf) {
      return false;
    }

    return !this.pdf.isEncrypted || this.pdf.isAuthenticated;
  }

  get pageCount(): number {
    return this.isUnlocked && this.pdf ? this.pdf.getPageCount() : 0;
  }

  /**
   * Re-open the original bytes with a password.
   *
   * @returns whether the password authenticated
   */
  async decrypt(password: string): Promise<boolean> {
    if (this.pdf) {
      await this.pdf.authenticate(password);

      return this.pdf.isAuthenticated;
    }

    const pdf = await this.lib.PDF.load(this.bytes, { credentials: password });

    if (!pdf.isAuthenticated) {
      return false;
    }

    this.pdf = pdf;

    return true;
  }

  /**
   * The parsed document, for callers that need page access.
   *
   * @throws if the document is still locked
   */
  unlocked(): PDF {
    if (!this.pdf || !this.isUnlocked) {
      throw new Error("Document is locked");
    }

    return this.pdf;
  }

  /**
   * Queue every content stream of a page for compression on save.
   *
   * Each stream is decoded first, so a page whose content cannot be read
   * fails here. Unfiltered streams are marked dirty and the writer deflates
   * them; streams that already carry a /Filter are left as they are.
   */
  async compressPage(index: number): Promise<void> {
    const pdf = this.unlocked();
    const pages = await pdf.getPages();
    const page = pages[index];

    if (!page) {
      throw new RangeError(`Page index ${index} out of bounds (0-${pages.length - 1})`);
    }

    const contents = page.dict.get("Contents");

    if (contents === undefined) {
      return;
    }

    const entries = contents instanceof this.lib.PdfArray ? [...contents] : [contents];

    for (const entry of entries) {
      await this.markForCompression(pdf, entry);
    }
  }

  private async markForCompression(pdf: PDF, entry: PdfObject): Promise<void> {
    const stream = entry instanceof this.lib.PdfRef ? await pdf.getObject(entry) : entry;

    if (!(stream instanceof this.lib.PdfStream)) {
      return;
    }

    const decoded = await stream.getDecodedData();

    if (!stream.has("Filter")) {
      stream.setData(decoded);
    }
  }

  /**
   * Drop the XMP metadata stream and blank the document information fields.
   */
  async removeMetadata(): Promise<void> {
    const pdf = this.unlocked();
    const catalog = await pdf.getCatalog();

    catalog?.delete("Metadata");

    pdf.setTitle("");
    pdf.setAuthor("");
    pdf.setSubject("");
    pdf.setCreator("");
    pdf.setProducer("");
    pdf.setKeywords([]);
  }

  /**
   * Serialize without encryption. The library keeps a document's protection
   * on save, so it is dropped first.
   */
  async save(): Promise<Uint8Array> {
    const pdf = this.unlocked();

    if (pdf.isEncrypted) {
      await pdf.removeProtection();
    }

    return pdf.save();
  }
}

/**
 * Merge output backed by a fresh @libpdf/core document.
 */
export class LibPdfOutput implements OutputPdf {
  constructor(private readonly pdf: PDF) {}

  get pageCount(): number {
    return this.pdf.getPageCount();
  }

  async appendPage(source: DecodedPdf, index: number): Promise<void> {
    if (!(source instanceof LibPdfDocument)) {
      throw new TypeError("LibPdfOutput can only copy pages from LibPdfDocument sources");
    }

    await this.pdf.copyPagesFrom(source.unlocked(), [index]);
  }

  truncate(pageCount: number): void {
    while (this.pdf.getPageCount() > pageCount) {
      this.pdf.removePage(this.pdf.getPageCount() - 1);
    }
  }

  async save(): Promise<Uint8Array> {
    return this.pdf.save();
  }
}

/**
 * PdfCodec implementation over @libpdf/core.
 */
export class LibPdfCodec implements PdfCodec {
  constructor(private readonly lib: LibPdfModule) {}

  async decode(bytes: Uint8Array, name?: string): Promise<LibPdfDocument> {
    try {
      const pdf = await this.lib.PDF.load(bytes);

      return new LibPdfDocument(this.lib, bytes, pdf);
    } catch (error) {
      // The library may refuse to open an encrypted file without credentials.
      if (error instanceof this.lib.SecurityError) {
        return new LibPdfDocument(this.lib, bytes, null);
      }

      throw new DecodeError(`Unable to read PDF${name ? ` '${name}'` : ""}`, name, {
        cause: error,
      });
    }
  }

  createOutput(): LibPdfOutput {
    return new LibPdfOutput(this.lib.PDF.create());
  }

  /**
   * Place each image on its own page, sized 1 px = 1 pt.
   */
  async assembleImages(images: readonly RasterImage[]): Promise<Uint8Array> {
    const pdf = this.lib.PDF.create();

    for (const image of images) {
      const embedded = await pdf.embedImage(image.bytes);
      const page = pdf.addPage({ width: image.width, height: image.height });

      page.drawImage(embedded, { x: 0, y: 0, width: image.width, height: image.height });
    }

    return pdf.save();
  }
}
