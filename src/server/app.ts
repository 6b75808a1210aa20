/**
 * HTTP front end: merge uploaded PDFs, convert uploaded images, compress one
 * PDF. Everything stays in memory for the duration of the request.
 */

import express, { type ErrorRequestHandler, type Request, type Response } from "express";
import multer from "multer";
import { z } from "zod";
import type { PdfCodec } from "#src/codec/types";
import { compressDocument } from "#src/compress/compress";
import { CodecUnavailableError, describeError } from "#src/errors";
import type { Logger } from "#src/helpers/logger";
import type { ImageCodec } from "#src/images/image-codec";
import { convertImages } from "#src/images/image-converter";
import { mergeDocuments } from "#src/merge/merge-engine";
import type { DocumentSource } from "#src/sources/document-source";

export interface AppOptions {
  /** Per-file upload limit in bytes */
  maxUploadBytes: number;
  /** Defaults to @libpdf/core, loaded on first use */
  pdfCodec?: PdfCodec;
  /** Defaults to sharp, loaded on first use */
  imageCodec?: ImageCodec;
  log?: Logger;
}

const PASSWORD_FIELD = /^file_passwords\[(.*)\]$/;

const formFieldsSchema = z.record(z.string(), z.unknown());

/**
 * Files uploaded under any of `fieldNames`, in arrival order.
 */
function uploadedFiles(req: Request, fieldNames: readonly string[]): Express.Multer.File[] {
  const files = Array.isArray(req.files) ? req.files : [];

  return files.filter(file => fieldNames.includes(file.fieldname));
}

function formFields(req: Request): Record<string, unknown> {
  const parsed = formFieldsSchema.safeParse(req.body);

  return parsed.success ? parsed.data : {};
}

function textField(fields: Record<string, unknown>, name: string): string | undefined {
  const value = fields[name];

  return typeof value === "string" && value !== "" ? value : undefined;
}

/**
 * Collect `file_passwords[<name>]` fields, whether the form parser kept them
 * flat or nested them under `file_passwords`. Empty values are ignored.
 */
export function perFilePasswords(fields: Record<string, unknown>): Map<string, string> {
  const passwords = new Map<string, string>();

  for (const [key, value] of Object.entries(fields)) {
    const match = PASSWORD_FIELD.exec(key);

    if (match?.[1] !== undefined && typeof value === "string" && value !== "") {
      passwords.set(match[1], value);
    }
  }

  const nested = formFieldsSchema.safeParse(fields.file_passwords);

  if (nested.success) {
    for (const [name, value] of Object.entries(nested.data)) {
      if (typeof value === "string" && value !== "") {
        passwords.set(name, value);
      }
    }
  }

  return passwords;
}

/**
 * A file name as a header value: verbatim when printable ASCII, otherwise
 * percent-encoded.
 */
export function headerSafeName(name: string): string {
  return /^[\x20-\x7e]*$/.test(name) ? name : encodeURIComponent(name);
}

function skippedHeader(names: readonly string[]): string {
  return names.map(headerSafeName).join(",");
}

function sendPdf(res: Response, bytes: Uint8Array, filename: string): void {
  res.attachment(filename);
  res.type("application/pdf");
  res.send(Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength));
}

/**
 * Build the express application.
 *
 * @example
 * ```ts
 * const app = createApp({ maxUploadBytes: 50 * 1024 * 1024 });
 * app.listen(5000);
 * ```
 */
export function createApp(options: AppOptions): express.Express {
  const log = options.log ?? console;
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: options.maxUploadBytes },
  });

  const app = express();

  app.post("/merge", upload.any(), async (req, res) => {
    const files = uploadedFiles(req, ["files", "files[]"]);

    if (files.length === 0) {
      res.status(400).type("text/plain").send("No PDF files were uploaded.");

      return;
    }

    const fields = formFields(req);
    const passwords = perFilePasswords(fields);

    const sources: DocumentSource[] = files
      .filter(file => file.originalname !== "")
      .map(file => ({
        name: file.originalname,
        data: file.buffer,
        password: passwords.get(file.originalname),
      }));

    if (sources.length === 0) {
      res.status(400).type("text/plain").send("No valid PDF files were provided.");

      return;
    }

    const result = await mergeDocuments(sources, {
      defaultPassword: textField(fields, "shared_password"),
      codec: options.pdfCodec,
    });

    if (!result.output) {
      const skipped = result.skippedFiles.length > 0 ? ` Skipped: ${result.skippedFiles.join(", ")}.` : "";

      res.status(400).type("text/plain").send(`Unable to merge the provided PDFs.${skipped}`);

      return;
    }

    res.set("X-PDFMerger-Merged-Count", String(result.mergedCount));

    if (result.skippedFiles.length > 0) {
      res.set("X-PDFMerger-Skipped", skippedHeader(result.skippedFiles));
      res.set("X-PDFMerger-Skipped-Count", String(result.skippedCount));
    }

    sendPdf(res, result.output, "merged_unlocked.pdf");
  });

  app.post("/images-to-pdf", upload.any(), async (req, res) => {
    const files = uploadedFiles(req, ["images", "images[]"]);

    if (files.length === 0) {
      res.status(400).type("text/plain").send("No image files were uploaded.");

      return;
    }

    const sources = files
      .filter(file => file.originalname !== "")
      .map(file => ({ name: file.originalname, data: file.buffer }));

    if (sources.length === 0) {
      res.status(400).type("text/plain").send("No valid image files were provided.");

      return;
    }

    const result = await convertImages(sources, {
      imageCodec: options.imageCodec,
      pdfCodec: options.pdfCodec,
    });

    if (!result.output) {
      const skipped = result.skippedFiles.length > 0 ? ` Skipped: ${result.skippedFiles.join(", ")}.` : "";

      res
        .status(400)
        .type("text/plain")
        .send(`Unable to convert the provided images to PDF.${skipped}`);

      return;
    }

    res.set("X-Images-Processed", String(result.processedCount));

    if (result.skippedFiles.length > 0) {
      res.set("X-Images-Skipped", skippedHeader(result.skippedFiles));
      res.set("X-Images-Skipped-Count", String(result.skippedCount));
    }

    sendPdf(res, result.output, "images.pdf");
  });

  app.post("/compress", upload.any(), async (req, res) => {
    const [file] = uploadedFiles(req, ["file"]);

    if (!file) {
      res.status(400).type("text/plain").send("No PDF file was uploaded.");

      return;
    }

    const result = await compressDocument(
      {
        name: file.originalname || "upload.pdf",
        data: file.buffer,
        password: textField(formFields(req), "password"),
      },
      { codec: options.pdfCodec },
    );

    if (!result.output) {
      res
        .status(400)
        .type("text/plain")
        .send(result.skippedReason ?? "Unable to compress the provided PDF.");

      return;
    }

    res.set("X-Compress-Pages", String(result.pages));
    sendPdf(res, result.output, "compressed.pdf");
  });

  const handleError: ErrorRequestHandler = (error, _req, res, _next) => {
    if (error instanceof multer.MulterError && error.code === "LIMIT_FILE_SIZE") {
      res.status(413).type("text/plain").send("Uploaded file is too large.");

      return;
    }

    if (error instanceof multer.MulterError) {
      res.status(400).type("text/plain").send(error.message);

      return;
    }

    if (error instanceof CodecUnavailableError) {
      res.status(500).type("text/plain").send(error.message);

      return;
    }

    log.error(`Request failed: ${describeError(error)}`);
    res.status(500).type("text/plain").send("Internal server error.");
  };

  app.use(handleError);

  return app;
}
