import { describe, expect, it } from "vitest";
import type { DecodedPdf } from "#src/codec/types";
import { FakeDocument } from "#src/test-utils";
import { stripMetadata } from "./metadata";

const plain = (): DecodedPdf => new FakeDocument({ label: "m", pages: 1 });

describe("stripMetadata", () => {
  it("prefers removal", async () => {
    const calls: string[] = [];
    const doc = Object.assign(plain(), {
      removeMetadata: async () => {
        calls.push("remove");
      },
      setMetadata: async () => {
        calls.push("set");
      },
    });

    expect(await stripMetadata(doc)).toBe("removed");
    expect(calls).toEqual(["remove"]);
  });

  it("falls back to an empty metadata set when removal fails", async () => {
    let replacedWith: Readonly<Record<string, string>> | undefined;
    const doc = Object.assign(plain(), {
      removeMetadata: async () => {
        throw new Error("unsupported");
      },
      setMetadata: async (entries: Readonly<Record<string, string>>) => {
        replacedWith = entries;
      },
    });

    expect(await stripMetadata(doc)).toBe("emptied");
    expect(replacedWith).toEqual({});
  });

  it("falls back to an empty metadata set when removal is unavailable", async () => {
    const doc = Object.assign(plain(), { setMetadata: async () => {} });

    expect(await stripMetadata(doc)).toBe("emptied");
  });

  it("does nothing when neither capability exists", async () => {
    expect(await stripMetadata(plain())).toBe("none");
  });

  it("does nothing when every capability fails", async () => {
    const fail = async () => {
      throw new Error("nope");
    };
    const doc = Object.assign(plain(), { removeMetadata: fail, setMetadata: fail });

    expect(await stripMetadata(doc)).toBe("none");
  });
});
