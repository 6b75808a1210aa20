import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createTempDir, OneShotStream, removeTempDir } from "#src/test-utils";
import { ensureSeekable, fileSource } from "./document-source";

describe("ensureSeekable", () => {
  it("passes byte arrays through without copying", async () => {
    const bytes = new Uint8Array([1, 2, 3]);
    const seekable = await ensureSeekable({ name: "a.pdf", data: bytes, password: "x" });

    expect(seekable.bytes).toBe(bytes);
    expect(seekable.name).toBe("a.pdf");
    expect(seekable.password).toBe("x");
  });

  it("drains a stream exactly once into one buffer", async () => {
    const stream = new OneShotStream(new Uint8Array([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]), 3);
    const seekable = await ensureSeekable({ name: "b.pdf", data: stream });

    expect(Array.from(seekable.bytes)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    expect(stream.iterations).toBe(1);
  });

  it("returns a new object and leaves the source untouched", async () => {
    const stream = new OneShotStream(new Uint8Array([7, 8]));
    const source = { name: "c.pdf", data: stream };

    const seekable = await ensureSeekable(source);

    expect(seekable).not.toBe(source);
    expect(source.data).toBe(stream);
    expect("data" in seekable).toBe(false);
  });

  it("handles an empty stream", async () => {
    const seekable = await ensureSeekable({ name: "empty", data: new OneShotStream(new Uint8Array()) });

    expect(seekable.bytes.length).toBe(0);
  });
});

describe("fileSource", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it("reads the file lazily through ensureSeekable", async () => {
    const path = join(dir, "doc.pdf");
    await writeFile(path, "hello");

    const source = fileSource(path, "doc.pdf", "pw");
    const seekable = await ensureSeekable(source);

    expect(new TextDecoder().decode(seekable.bytes)).toBe("hello");
    expect(seekable.password).toBe("pw");
  });

  it("does not open a missing file until read", async () => {
    const source = fileSource(join(dir, "missing.pdf"), "missing.pdf");

    await expect(ensureSeekable(source)).rejects.toThrow(/ENOENT/);
  });
});
