/**
 * The capabilities the engines need from a PDF codec.
 *
 * Decryption, page decoding and serialization all belong to the codec; the
 * engines only decide order, passwords and what to skip. `LibPdfCodec` is
 * the production implementation, tests use an in-process fake.
 */

/**
 * A decoded (but possibly still locked) PDF document.
 */
export interface DecodedPdf {
  /** Whether the document carries an encryption dictionary */
  readonly isEncrypted: boolean;

  /**
   * Whether page content can be read: true for unencrypted documents and
   * for encrypted ones that have been unlocked (including documents the
   * codec opened with an empty user password).
   */
  readonly isUnlocked: boolean;

  /** Number of pages; 0 while the document is locked */
  readonly pageCount: number;

  /**
   * Try a password.
   *
   * The raw result is codec-specific (boolean, numeric status, or a thrown
   * error) and must be read through `tryDecrypt`.
   */
  decrypt(password: string): unknown;

  /** Rewrite one page's content streams compressed */
  compressPage(index: number): Promise<void>;

  /** Drop document-level metadata, when the codec supports it */
  removeMetadata?(): Promise<void>;

  /** Replace document-level metadata, when the codec supports it */
  setMetadata?(entries: Readonly<Record<string, string>>): Promise<void>;

  /** Serialize the document, unencrypted */
  save(): Promise<Uint8Array>;
}

/**
 * The growing output of a merge run.
 */
export interface OutputPdf {
  readonly pageCount: number;

  /**
   * Append one page of a decoded document, keeping its content.
   *
   * @throws if the page cannot be copied
   */
  appendPage(source: DecodedPdf, index: number): Promise<void>;

  /** Drop pages from the end until `pageCount` pages remain */
  truncate(pageCount: number): void;

  save(): Promise<Uint8Array>;
}

/**
 * A decoded raster image ready to be placed on a page.
 */
export interface RasterImage {
  readonly width: number;
  readonly height: number;
  readonly channels: 3;
  /** Encoded image data the codec can embed (JPEG) */
  readonly bytes: Uint8Array;
}

/**
 * PDF codec entry point.
 */
export interface PdfCodec {
  /**
   * Decode bytes as a PDF.
   *
   * @throws {DecodeError} if the bytes are not a readable PDF
   */
  decode(bytes: Uint8Array, name?: string): Promise<DecodedPdf>;

  /** Start an empty, unencrypted output document */
  createOutput(): OutputPdf;

  /** Build one PDF with one page per image, in order */
  assembleImages(images: readonly RasterImage[]): Promise<Uint8Array>;
}
