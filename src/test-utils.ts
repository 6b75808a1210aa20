/**
 * Test utilities: an in-process fake PDF codec, fake images, builders for
 * real PDFs and images, and temporary directories.
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { PDF, rgb } from "@libpdf/core";
import sharp from "sharp";
import { z } from "zod";
import type { DecodedPdf, OutputPdf, PdfCodec, RasterImage } from "#src/codec/types";
import { DecodeError } from "#src/errors";
import type { Logger } from "#src/helpers/logger";
import type { ImageCodec } from "#src/images/image-codec";

// ─────────────────────────────────────────────────────────────────────────────
// Fake PDF documents
// ─────────────────────────────────────────────────────────────────────────────

const FAKE_HEADER = "%FAKE ";
const FAKE_OUTPUT_HEADER = "%FAKE-OUT";

const fakePdfSpecSchema = z.object({
  /** Prefix of every page label, e.g. "a" gives "a:1", "a:2" */
  label: z.string(),
  pages: z.number().int().nonnegative(),
  /** Present when the document is encrypted */
  password: z.string().optional(),
  /** Encrypted, but readable without a password */
  openWithEmptyPassword: z.boolean().optional(),
  /** How `decrypt` reports its result */
  decryptStyle: z.enum(["boolean", "ordinal", "throw-on-failure"]).optional(),
  /** Page index whose copy into an output fails */
  failAppendAt: z.number().int().optional(),
  /** Page indices whose compression fails */
  failCompressAt: z.array(z.number().int()).optional(),
  /** Make `save` of the document itself fail */
  failSave: z.boolean().optional(),
  /** Metadata capabilities the decoded document exposes */
  metadata: z.enum(["remove", "set", "none"]).optional(),
});

export type FakePdfSpec = z.infer<typeof fakePdfSpecSchema>;

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/**
 * Encode a fake PDF understood by {@link FakePdfCodec}.
 *
 * @example
 * ```ts
 * const bytes = fakePdf({ label: "b", pages: 1, password: "x" });
 * ```
 */
export function fakePdf(spec: FakePdfSpec): Uint8Array {
  return encoder.encode(FAKE_HEADER + JSON.stringify(spec));
}

/**
 * Bytes the fake codec refuses to decode.
 */
export function corruptPdf(): Uint8Array {
  return encoder.encode("this is not a pdf");
}

function fakeOutputBytes(labels: readonly string[]): Uint8Array {
  return encoder.encode([FAKE_OUTPUT_HEADER, ...labels].join("\n"));
}

/**
 * Read the page labels of bytes saved by a fake output or document.
 */
export function readFakeOutput(bytes: Uint8Array): string[] {
  const [header, ...labels] = decoder.decode(bytes).split("\n");

  if (header !== FAKE_OUTPUT_HEADER) {
    throw new Error("Not fake output bytes");
  }

  return labels;
}

function pageLabels(label: string, pages: number): string[] {
  return Array.from({ length: pages }, (_, i) => `${label}:${i + 1}`);
}

/**
 * A decoded fake document.
 */
export class FakeDocument implements DecodedPdf {
  readonly passwordsTried: string[] = [];
  readonly compressedPages: number[] = [];
  metadataRemoved = false;
  metadataReplacedWith: Readonly<Record<string, string>> | null = null;

  private unlockedState: boolean;

  constructor(readonly spec: FakePdfSpec) {
    this.unlockedState = spec.password === undefined || spec.openWithEmptyPassword === true;
  }

  get isEncrypted(): boolean {
    return this.spec.password !== undefined;
  }

  get isUnlocked(): boolean {
    return this.unlockedState;
  }

  get pageCount(): number {
    return this.unlockedState ? this.spec.pages : 0;
  }

  decrypt(password: string): boolean | number {
    this.passwordsTried.push(password);

    const ok = password === this.spec.password;

    if (ok) {
      this.unlockedState = true;
    }

    switch (this.spec.decryptStyle ?? "boolean") {
      case "ordinal":
        return ok ? 1 : 0;
      case "throw-on-failure":
        if (!ok) {
          throw new Error("Incorrect password");
        }

        return true;
      default:
        return ok;
    }
  }

  async compressPage(index: number): Promise<void> {
    if (this.spec.failCompressAt?.includes(index)) {
      throw new Error(`Cannot compress page ${index + 1}`);
    }

    this.compressedPages.push(index);
  }

  async save(): Promise<Uint8Array> {
    if (this.spec.failSave) {
      throw new Error("Disk full");
    }

    return fakeOutputBytes(pageLabels(this.spec.label, this.spec.pages));
  }
}

/**
 * A fake merge output that records page labels.
 */
export class FakeOutput implements OutputPdf {
  readonly pages: string[] = [];

  constructor(private readonly failSave: boolean) {}

  get pageCount(): number {
    return this.pages.length;
  }

  async appendPage(source: DecodedPdf, index: number): Promise<void> {
    if (!(source instanceof FakeDocument)) {
      throw new TypeError("FakeOutput can only copy pages from FakeDocument sources");
    }

    if (!source.isUnlocked) {
      throw new Error("Document is locked");
    }

    if (source.spec.failAppendAt === index) {
      throw new Error(`Unsupported construct on page ${index + 1}`);
    }

    this.pages.push(`${source.spec.label}:${index + 1}`);
  }

  truncate(pageCount: number): void {
    this.pages.splice(pageCount);
  }

  async save(): Promise<Uint8Array> {
    if (this.failSave) {
      throw new Error("Disk full");
    }

    return fakeOutputBytes(this.pages);
  }
}

export interface FakePdfCodecOptions {
  /** Make saving a merge output fail */
  failOutputSave?: boolean;
  /** Make image assembly fail */
  failAssemble?: boolean;
}

/**
 * PdfCodec over the fake text format written by {@link fakePdf}.
 */
export class FakePdfCodec implements PdfCodec {
  readonly decoded: FakeDocument[] = [];
  readonly outputs: FakeOutput[] = [];
  readonly assembled: RasterImage[][] = [];

  constructor(private readonly options: FakePdfCodecOptions = {}) {}

  async decode(bytes: Uint8Array, name?: string): Promise<DecodedPdf> {
    const doc = withMetadataCapabilities(new FakeDocument(parseFakeSpec(bytes, name)));
    this.decoded.push(doc);

    return doc;
  }

  createOutput(): FakeOutput {
    const output = new FakeOutput(this.options.failOutputSave ?? false);
    this.outputs.push(output);

    return output;
  }

  async assembleImages(images: readonly RasterImage[]): Promise<Uint8Array> {
    if (this.options.failAssemble) {
      throw new Error("Cannot assemble images");
    }

    this.assembled.push([...images]);

    return fakeOutputBytes(images.map(image => `${image.width}x${image.height}`));
  }
}

function parseFakeSpec(bytes: Uint8Array, name?: string): FakePdfSpec {
  const text = decoder.decode(bytes);
  const message = `Unable to read PDF${name ? ` '${name}'` : ""}`;

  if (!text.startsWith(FAKE_HEADER)) {
    throw new DecodeError(message, name);
  }

  try {
    return fakePdfSpecSchema.parse(JSON.parse(text.slice(FAKE_HEADER.length)));
  } catch (error) {
    throw new DecodeError(message, name, { cause: error });
  }
}

/**
 * Attach the metadata methods a fake document's `metadata` field asks for.
 */
function withMetadataCapabilities(doc: FakeDocument): FakeDocument {
  const mode = doc.spec.metadata ?? "remove";

  if (mode === "remove") {
    return Object.assign(doc, {
      removeMetadata: async () => {
        doc.metadataRemoved = true;
      },
    });
  }

  if (mode === "set") {
    return Object.assign(doc, {
      setMetadata: async (entries: Readonly<Record<string, string>>) => {
        doc.metadataReplacedWith = entries;
      },
    });
  }

  return doc;
}

// ─────────────────────────────────────────────────────────────────────────────
// Fake images
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Encode a fake image understood by {@link FakeImageCodec}.
 */
export function fakeImage(width: number, height: number): Uint8Array {
  return encoder.encode(`IMG ${width}x${height}`);
}

const FAKE_IMAGE = /^IMG (\d+)x(\d+)$/;

/**
 * ImageCodec over the fake format written by {@link fakeImage}.
 */
export class FakeImageCodec implements ImageCodec {
  async decode(bytes: Uint8Array, name?: string): Promise<RasterImage> {
    const match = FAKE_IMAGE.exec(decoder.decode(bytes));

    if (!match?.[1] || !match[2]) {
      throw new DecodeError(`Unable to read image${name ? ` '${name}'` : ""}`, name);
    }

    return {
      width: Number.parseInt(match[1], 10),
      height: Number.parseInt(match[2], 10),
      channels: 3,
      bytes,
    };
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Streams
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A stream that can be iterated only once, split into fixed-size chunks.
 */
export class OneShotStream implements AsyncIterable<Uint8Array> {
  iterations = 0;

  constructor(
    private readonly bytes: Uint8Array,
    private readonly chunkSize = 4,
  ) {}

  async *[Symbol.asyncIterator](): AsyncIterator<Uint8Array> {
    this.iterations++;

    if (this.iterations > 1) {
      throw new Error("Stream already consumed");
    }

    for (let offset = 0; offset < this.bytes.length; offset += this.chunkSize) {
      yield this.bytes.subarray(offset, offset + this.chunkSize);
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Real documents and images
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Build a real PDF with one filled rectangle per page, protected with a
 * user password when one is given.
 */
export async function buildPdf(
  pageCount: number,
  options: { title?: string; password?: string } = {},
) {
  const pdf = PDF.create();

  for (let i = 0; i < pageCount; i++) {
    const page = pdf.addPage({ width: 200, height: 300 });

    page.drawRectangle({ x: 10 + i, y: 10, width: 50, height: 60, color: rgb(0.2, 0.4, 0.6) });
  }

  if (options.title) {
    pdf.setTitle(options.title);
  }

  if (options.password !== undefined) {
    await pdf.setProtection({ userPassword: options.password });
  }

  return pdf.save();
}

/**
 * Build a real PNG of a solid colour.
 */
export async function buildPng(width: number, height: number, channels: 3 | 4 = 4) {
  const buffer = await sharp({
    create: { width, height, channels, background: { r: 200, g: 40, b: 90, alpha: 0.5 } },
  })
    .png()
    .toBuffer();

  return new Uint8Array(buffer);
}

// ─────────────────────────────────────────────────────────────────────────────
// Filesystem and logging
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Create an empty directory under the OS temp dir.
 */
export async function createTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), "pdf-unlock-merge-"));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export interface RecordedLine {
  level: "info" | "warn" | "error";
  message: string;
}

/**
 * A logger that keeps every line for assertions.
 */
export function createRecordingLogger(): Logger & { lines: RecordedLine[] } {
  const lines: RecordedLine[] = [];

  return {
    lines,
    info: message => lines.push({ level: "info", message }),
    warn: message => lines.push({ level: "warn", message }),
    error: message => lines.push({ level: "error", message }),
  };
}
