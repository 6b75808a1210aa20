/**
 * pdf-unlock-merge
 *
 * Merge PDFs, some password-protected, into one unlocked PDF; convert
 * images to PDF; compress a single PDF.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Merge
// ─────────────────────────────────────────────────────────────────────────────

export {
  type MergeOptions,
  type MergeReporter,
  type MergeResult,
  mergeDocuments,
  type SkipReason,
} from "./merge/merge-engine";
export { type MergeFilesOptions, type MergeFilesResult, mergeFiles } from "./merge/merge-files";

// ─────────────────────────────────────────────────────────────────────────────
// Images and compression
// ─────────────────────────────────────────────────────────────────────────────

export {
  type ConvertImagesOptions,
  convertImages,
  type ImageConversionResult,
} from "./images/image-converter";
export { type ImageCodec, loadImageCodec, SharpImageCodec } from "./images/image-codec";
export {
  type CompressionResult,
  type CompressOptions,
  compressDocument,
} from "./compress/compress";
export { type MetadataStrategy, stripMetadata } from "./compress/metadata";

// ─────────────────────────────────────────────────────────────────────────────
// Inputs, discovery and ordering
// ─────────────────────────────────────────────────────────────────────────────

export {
  type DocumentSource,
  ensureSeekable,
  fileSource,
  type ImageSource,
  type SeekableSource,
  type SourceData,
} from "./sources/document-source";
export { type DiscoverOptions, discoverPdfs } from "./discovery/discover-pdfs";
export { type MergeOrder, orderPaths } from "./discovery/ordering";
export { compareNatural, compareNaturalKeys, naturalKey } from "./helpers/natural-order";

// ─────────────────────────────────────────────────────────────────────────────
// Passwords
// ─────────────────────────────────────────────────────────────────────────────

export {
  buildCandidateList,
  type PasswordPrompt,
  resolvePassword,
  type UnlockOutcome,
} from "./security/password-resolution";

// ─────────────────────────────────────────────────────────────────────────────
// Codec
// ─────────────────────────────────────────────────────────────────────────────

export type { DecodedPdf, OutputPdf, PdfCodec, RasterImage } from "./codec/types";
export { LibPdfCodec } from "./codec/libpdf-codec";
export { loadPdfCodec } from "./codec/load-codec";
export { toUnlockFlag, tryDecrypt } from "./codec/unlock-result";

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────

export {
  AssemblyError,
  CodecUnavailableError,
  DecodeError,
  MergeAbortedError,
  MergerError,
} from "./errors";
