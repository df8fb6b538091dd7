import { describe, expect, it } from "vitest";
import { PDF_BYTES, PNG_BYTES } from "../test-utils/search-fixtures.js";
import { classifyFile, hasPdfExtension } from "./classify.js";

const encode = (text: string) => new TextEncoder().encode(text);

describe("classifyFile", () => {
  it("should classify plain text", async () => {
    expect(await classifyFile("/r/notes.txt", encode("hello\n"))).toEqual({
      kind: "text",
    });
  });

  it("should classify an empty file as text", async () => {
    expect(await classifyFile("/r/empty", new Uint8Array())).toEqual({
      kind: "text",
    });
  });

  it("should classify by .pdf extension regardless of content", async () => {
    expect(await classifyFile("/r/Report.PDF", encode("junk"))).toEqual({
      kind: "pdf",
    });
  });

  it("should classify by PDF magic regardless of extension", async () => {
    expect(await classifyFile("/r/scan.bin", PDF_BYTES)).toEqual({
      kind: "pdf",
    });
  });

  it("should treat known binary formats as unsupported", async () => {
    const result = await classifyFile("/r/picture.dat", PNG_BYTES);
    expect(result.kind).toBe("unsupported");
  });

  it("should treat NUL bytes as binary", async () => {
    expect(
      await classifyFile("/r/blob", new Uint8Array([0x61, 0x62, 0x00, 0x63])),
    ).toEqual({ kind: "unsupported", reason: "binary data" });
  });

  it("should keep XML searchable", async () => {
    expect(
      await classifyFile(
        "/r/pom.xml",
        encode('<?xml version="1.0" encoding="UTF-8"?>\n<project></project>\n'),
      ),
    ).toEqual({ kind: "text" });
  });
});

describe("hasPdfExtension", () => {
  it("should match .pdf case-insensitively", () => {
    expect(hasPdfExtension("/a/b.pdf")).toBe(true);
    expect(hasPdfExtension("/a/b.Pdf")).toBe(true);
    expect(hasPdfExtension("/a/pdf")).toBe(false);
    expect(hasPdfExtension("/a/b.pdf.txt")).toBe(false);
  });
});
