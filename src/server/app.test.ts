import request from "supertest";
import { describe, expect, it } from "vitest";
import { CodecUnavailableError } from "#src/errors";
import {
  corruptPdf,
  createRecordingLogger,
  FakeImageCodec,
  fakeImage,
  FakeOutput,
  FakePdfCodec,
  fakePdf,
  readFakeOutput,
} from "#src/test-utils";
import { createApp, headerSafeName, perFilePasswords } from "./app";

const MB = 1024 * 1024;

const buffer = (bytes: Uint8Array) => Buffer.from(bytes);

function fakeApp(pdfCodec = new FakePdfCodec(), maxUploadBytes = MB) {
  const log = createRecordingLogger();
  const app = createApp({ maxUploadBytes, pdfCodec, imageCodec: new FakeImageCodec(), log });

  return { app, log };
}

describe("createApp", () => {
  describe("POST /merge", () => {
    it("merges uploads in arrival order and reports skips in headers", async () => {
      const { app } = fakeApp();

      const res = await request(app)
        .post("/merge")
        .field("shared_password", "x")
        .attach("files", buffer(fakePdf({ label: "b", pages: 1, password: "x" })), "b.pdf")
        .attach("files", buffer(corruptPdf()), "c.pdf")
        .attach("files", buffer(fakePdf({ label: "a", pages: 2 })), "a.pdf")
        .responseType("blob");

      expect(res.status).toBe(200);
      expect(res.headers["content-type"]).toBe("application/pdf");
      expect(res.headers["content-disposition"]).toBe('attachment; filename="merged_unlocked.pdf"');
      expect(res.headers["x-pdfmerger-merged-count"]).toBe("2");
      expect(res.headers["x-pdfmerger-skipped"]).toBe("c.pdf");
      expect(res.headers["x-pdfmerger-skipped-count"]).toBe("1");
      expect(readFakeOutput(new Uint8Array(res.body))).toEqual(["b:1", "a:1", "a:2"]);
    });

    it("omits skip headers when nothing was skipped", async () => {
      const { app } = fakeApp();

      const res = await request(app)
        .post("/merge")
        .attach("files[]", buffer(fakePdf({ label: "a", pages: 1 })), "a.pdf")
        .responseType("blob");

      expect(res.status).toBe(200);
      expect(res.headers["x-pdfmerger-merged-count"]).toBe("1");
      expect(res.headers["x-pdfmerger-skipped"]).toBeUndefined();
      expect(res.headers["x-pdfmerger-skipped-count"]).toBeUndefined();
    });

    it("applies per-file passwords by original file name", async () => {
      const { app } = fakeApp();

      const res = await request(app)
        .post("/merge")
        .field("shared_password", "wrong")
        .field("file_passwords[own.pdf]", "own-secret")
        .attach("files", buffer(fakePdf({ label: "o", pages: 1, password: "own-secret" })), "own.pdf")
        .responseType("blob");

      expect(res.status).toBe(200);
      expect(readFakeOutput(new Uint8Array(res.body))).toEqual(["o:1"]);
    });

    it("rejects a request without files", async () => {
      const { app } = fakeApp();

      const res = await request(app).post("/merge").field("shared_password", "x");

      expect(res.status).toBe(400);
      expect(res.text).toBe("No PDF files were uploaded.");
    });

    it("names the skipped files when nothing merged", async () => {
      const { app } = fakeApp();

      const res = await request(app)
        .post("/merge")
        .attach("files", buffer(corruptPdf()), "c.pdf")
        .attach("files", buffer(fakePdf({ label: "l", pages: 1, password: "x" })), "locked.pdf");

      expect(res.status).toBe(400);
      expect(res.text).toBe("Unable to merge the provided PDFs. Skipped: c.pdf, locked.pdf.");
    });

    it("answers 413 for an upload over the limit", async () => {
      const { app } = fakeApp(new FakePdfCodec(), 16);

      const res = await request(app)
        .post("/merge")
        .attach("files", buffer(fakePdf({ label: "big", pages: 100 })), "big.pdf");

      expect(res.status).toBe(413);
    });

    it("answers 500 and logs when the merged output cannot be saved", async () => {
      const { app, log } = fakeApp(new FakePdfCodec({ failOutputSave: true }));

      const res = await request(app)
        .post("/merge")
        .attach("files", buffer(fakePdf({ label: "a", pages: 1 })), "a.pdf");

      expect(res.status).toBe(500);
      expect(res.text).toBe("Internal server error.");
      expect(log.lines).toEqual([
        { level: "error", message: "Request failed: Failed to write merged PDF" },
      ]);
    });

    it("answers 500 with the message when the codec is unavailable", async () => {
      class UnavailableCodec extends FakePdfCodec {
        override createOutput(): FakeOutput {
          throw new CodecUnavailableError("@libpdf/core");
        }
      }

      const { app } = fakeApp(new UnavailableCodec());

      const res = await request(app)
        .post("/merge")
        .attach("files", buffer(fakePdf({ label: "a", pages: 1 })), "a.pdf");

      expect(res.status).toBe(500);
      expect(res.text).toBe("@libpdf/core is required. Install with: npm install @libpdf/core");
    });
  });

  describe("POST /images-to-pdf", () => {
    it("converts uploads and reports counts in headers", async () => {
      const { app } = fakeApp();

      const res = await request(app)
        .post("/images-to-pdf")
        .attach("images", buffer(fakeImage(10, 20)), "one.png")
        .attach("images", buffer(new TextEncoder().encode("junk")), "notes.txt")
        .attach("images[]", buffer(fakeImage(30, 40)), "two.png")
        .responseType("blob");

      expect(res.status).toBe(200);
      expect(res.headers["content-disposition"]).toBe('attachment; filename="images.pdf"');
      expect(res.headers["x-images-processed"]).toBe("2");
      expect(res.headers["x-images-skipped"]).toBe("notes.txt");
      expect(res.headers["x-images-skipped-count"]).toBe("1");
      expect(readFakeOutput(new Uint8Array(res.body))).toEqual(["10x20", "30x40"]);
    });

    it("rejects a request without images", async () => {
      const { app } = fakeApp();

      const res = await request(app).post("/images-to-pdf").field("note", "none");

      expect(res.status).toBe(400);
      expect(res.text).toBe("No image files were uploaded.");
    });

    it("reports every image as skipped when assembly fails", async () => {
      const { app } = fakeApp(new FakePdfCodec({ failAssemble: true }));

      const res = await request(app)
        .post("/images-to-pdf")
        .attach("images", buffer(fakeImage(1, 1)), "one.png")
        .attach("images", buffer(fakeImage(2, 2)), "two.png");

      expect(res.status).toBe(400);
      expect(res.text).toBe("Unable to convert the provided images to PDF. Skipped: one.png, two.png.");
    });
  });

  describe("POST /compress", () => {
    it("returns the compressed document", async () => {
      const { app } = fakeApp();

      const res = await request(app)
        .post("/compress")
        .attach("file", buffer(fakePdf({ label: "r", pages: 3 })), "report.pdf")
        .responseType("blob");

      expect(res.status).toBe(200);
      expect(res.headers["content-disposition"]).toBe('attachment; filename="compressed.pdf"');
      expect(res.headers["x-compress-pages"]).toBe("3");
      expect(readFakeOutput(new Uint8Array(res.body))).toEqual(["r:1", "r:2", "r:3"]);
    });

    it("uses the password field", async () => {
      const { app } = fakeApp();

      const res = await request(app)
        .post("/compress")
        .field("password", "x")
        .attach("file", buffer(fakePdf({ label: "l", pages: 1, password: "x" })), "l.pdf");

      expect(res.status).toBe(200);
    });

    it("answers 400 with the skip reason", async () => {
      const { app } = fakeApp();

      const res = await request(app)
        .post("/compress")
        .attach("file", buffer(fakePdf({ label: "l", pages: 1, password: "x" })), "l.pdf");

      expect(res.status).toBe(400);
      expect(res.text).toBe("Password required or incorrect");
    });

    it("rejects a request without a file", async () => {
      const { app } = fakeApp();

      const res = await request(app).post("/compress").field("password", "x");

      expect(res.status).toBe(400);
      expect(res.text).toBe("No PDF file was uploaded.");
    });
  });
});

describe("perFilePasswords", () => {
  it("reads flat bracketed fields", () => {
    const passwords = perFilePasswords({ "file_passwords[a.pdf]": "one", other: "x" });

    expect([...passwords]).toEqual([["a.pdf", "one"]]);
  });

  it("reads fields nested by the form parser", () => {
    const passwords = perFilePasswords({ file_passwords: { "a.pdf": "one", "b.pdf": "two" } });

    expect(Object.fromEntries(passwords)).toEqual({ "a.pdf": "one", "b.pdf": "two" });
  });

  it("ignores empty values", () => {
    expect(perFilePasswords({ "file_passwords[a.pdf]": "" }).size).toBe(0);
  });
});

describe("headerSafeName", () => {
  it("keeps printable ASCII", () => {
    expect(headerSafeName("Scan 01 (final).pdf")).toBe("Scan 01 (final).pdf");
  });

  it("percent-encodes anything else", () => {
    expect(headerSafeName("résumé.pdf")).toBe("r%C3%A9sum%C3%A9.pdf");
  });
});
