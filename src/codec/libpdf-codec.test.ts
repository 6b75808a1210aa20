import * as libpdf from "@libpdf/core";
import sharp from "sharp";
import { describe, expect, it } from "vitest";
import { DecodeError } from "#src/errors";
import { buildPdf, corruptPdf, FakeDocument } from "#src/test-utils";
import { LibPdfCodec } from "./libpdf-codec";
import { loadPdfCodec } from "./load-codec";
import { tryDecrypt } from "./unlock-result";

const codec = new LibPdfCodec(libpdf);

describe("LibPdfCodec", () => {
  describe("decode()", () => {
    it("opens an unencrypted document", async () => {
      const doc = await codec.decode(await buildPdf(3), "three.pdf");

      expect(doc.isEncrypted).toBe(false);
      expect(doc.isUnlocked).toBe(true);
      expect(doc.pageCount).toBe(3);
    });

    it("raises DecodeError naming the source for bytes that are not a PDF", async () => {
      const decoding = codec.decode(corruptPdf(), "broken.pdf");

      await expect(decoding).rejects.toThrow(DecodeError);
      await expect(decoding).rejects.toMatchObject({
        message: "Unable to read PDF 'broken.pdf'",
        sourceName: "broken.pdf",
      });
    });
  });

  describe("decrypt()", () => {
    it("reports a password-protected document as locked", async () => {
      const doc = await codec.decode(await buildPdf(2, { password: "test-secret" }), "locked.pdf");

      expect(doc.isEncrypted).toBe(true);
      expect(doc.isUnlocked).toBe(false);
      expect(doc.pageCount).toBe(0);
    });

    it("unlocks with the user password", async () => {
      const doc = await codec.decode(await buildPdf(2, { password: "test-secret" }));

      expect(await doc.decrypt("test-secret")).toBe(true);
      expect(doc.isUnlocked).toBe(true);
      expect(doc.pageCount).toBe(2);
    });

    it("stays locked with a wrong password", async () => {
      const doc = await codec.decode(await buildPdf(2, { password: "test-secret" }));

      expect(await tryDecrypt(doc, "wrong")).toBe(false);
      expect(doc.isUnlocked).toBe(false);
    });

    it("accepts the right password after a wrong one", async () => {
      const doc = await codec.decode(await buildPdf(1, { password: "test-secret" }));

      expect(await tryDecrypt(doc, "wrong")).toBe(false);
      expect(await tryDecrypt(doc, "test-secret")).toBe(true);
      expect(doc.pageCount).toBe(1);
    });
  });

  describe("save()", () => {
    it("writes an unlocked document without encryption", async () => {
      const doc = await codec.decode(await buildPdf(2, { password: "test-secret" }));
      await doc.decrypt("test-secret");

      const reloaded = await libpdf.PDF.load(await doc.save());

      expect(reloaded.isEncrypted).toBe(false);
      expect(reloaded.getPageCount()).toBe(2);
    });

    it("refuses to write a locked document", async () => {
      const doc = await codec.decode(await buildPdf(1, { password: "test-secret" }));

      await expect(doc.save()).rejects.toThrow("Document is locked");
    });
  });

  describe("createOutput()", () => {
    it("appends pages of several documents in order", async () => {
      const first = await codec.decode(await buildPdf(2));
      const second = await codec.decode(await buildPdf(1));
      const output = codec.createOutput();

      for (const doc of [first, second]) {
        for (let i = 0; i < doc.pageCount; i++) {
          await output.appendPage(doc, i);
        }
      }

      expect(output.pageCount).toBe(3);

      const reloaded = await libpdf.PDF.load(await output.save());

      expect(reloaded.getPageCount()).toBe(3);
    });

    it("truncates back to an earlier page count", async () => {
      const doc = await codec.decode(await buildPdf(3));
      const output = codec.createOutput();

      await output.appendPage(doc, 0);
      await output.appendPage(doc, 1);
      await output.appendPage(doc, 2);
      output.truncate(1);

      expect(output.pageCount).toBe(1);
    });

    it("copies pages out of a decrypted document", async () => {
      const doc = await codec.decode(await buildPdf(3, { password: "test-secret" }));
      await doc.decrypt("test-secret");
      const output = codec.createOutput();

      for (let i = 0; i < doc.pageCount; i++) {
        await output.appendPage(doc, i);
      }

      const reloaded = await libpdf.PDF.load(await output.save());

      expect(reloaded.isEncrypted).toBe(false);
      expect(reloaded.getPageCount()).toBe(3);
    });

    it("refuses pages from documents of another codec", async () => {
      const output = codec.createOutput();
      const foreign = new FakeDocument({ label: "x", pages: 1 });

      await expect(output.appendPage(foreign, 0)).rejects.toThrow(TypeError);
    });
  });

  describe("compressPage()", () => {
    it("keeps every page", async () => {
      const doc = await codec.decode(await buildPdf(2));

      await doc.compressPage(0);
      await doc.compressPage(1);

      const reloaded = await libpdf.PDF.load(await doc.save());

      expect(reloaded.getPageCount()).toBe(2);
    });

    it("rejects an out-of-range page index", async () => {
      const doc = await codec.decode(await buildPdf(1));

      await expect(doc.compressPage(5)).rejects.toThrow(RangeError);
    });
  });

  describe("removeMetadata()", () => {
    it("blanks the document title", async () => {
      const doc = await codec.decode(await buildPdf(1, { title: "Quarterly" }));

      await doc.removeMetadata();

      const reloaded = await libpdf.PDF.load(await doc.save());

      expect(reloaded.getTitle() ?? "").toBe("");
    });
  });

  describe("assembleImages()", () => {
    it("places one page per image sized in points", async () => {
      const jpeg = async (width: number, height: number) =>
        new Uint8Array(
          await sharp({ create: { width, height, channels: 3, background: "#336699" } })
            .jpeg()
            .toBuffer(),
        );

      const bytes = await codec.assembleImages([
        { width: 40, height: 30, channels: 3, bytes: await jpeg(40, 30) },
        { width: 20, height: 50, channels: 3, bytes: await jpeg(20, 50) },
      ]);

      const reloaded = await libpdf.PDF.load(bytes);
      const pages = await reloaded.getPages();

      expect(pages.map(page => [page.width, page.height])).toEqual([
        [40, 30],
        [20, 50],
      ]);
    });
  });
});

describe("loadPdfCodec", () => {
  it("returns the @libpdf/core codec when the package is installed", async () => {
    expect(await loadPdfCodec()).toBeInstanceOf(LibPdfCodec);
  });
});
