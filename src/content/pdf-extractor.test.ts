import { describe, expect, it } from "vitest";
import { PdfExtractionError } from "../errors.js";
import { PdftotextExtractor } from "./pdf-extractor.js";

const MISSING_COMMAND = "folder-search-no-such-pdf-tool";

describe("PdftotextExtractor", () => {
  it("should report a missing tool as unavailable", async () => {
    const extractor = new PdftotextExtractor({ command: MISSING_COMMAND });
    expect(await extractor.isAvailable()).toBe(false);
  });

  it("should check availability only once", () => {
    const extractor = new PdftotextExtractor({ command: MISSING_COMMAND });
    expect(extractor.isAvailable()).toBe(extractor.isAvailable());
  });

  it("should treat an installed command as available", async () => {
    const extractor = new PdftotextExtractor({ command: "echo" });
    expect(await extractor.isAvailable()).toBe(true);
  });

  it("should pass the file and '-' and return stdout", async () => {
    const extractor = new PdftotextExtractor({ command: "echo" });
    expect(await extractor.extract("/tmp/report.pdf")).toBe(
      "/tmp/report.pdf -\n",
    );
  });

  it("should wrap tool failures in PdfExtractionError", async () => {
    const extractor = new PdftotextExtractor({ command: MISSING_COMMAND });
    const error = await extractor.extract("/tmp/report.pdf").then(
      () => undefined,
      (e: unknown) => e,
    );
    expect(error).toBeInstanceOf(PdfExtractionError);
    expect(error).toMatchObject({ code: "EPDF", path: "/tmp/report.pdf" });
  });
});
