import { describe, expect, it } from "vitest";
import { resolveEngineConfig } from "./engine-config.js";

describe("resolveEngineConfig", () => {
  it("should return defaults when nothing is given", () => {
    const config = resolveEngineConfig();
    expect(config.pdfToTextCommand).toBe("pdftotext");
    expect(config.maxConcurrentFiles).toBe(32);
    expect(config.snippetMaxLength).toBe(200);
    expect(config.followSymlinks).toBe(false);
  });

  it("should merge user values over defaults", () => {
    const config = resolveEngineConfig({
      pdfToTextCommand: "/opt/poppler/bin/pdftotext",
      snippetMaxLength: 40,
    });
    expect(config.pdfToTextCommand).toBe("/opt/poppler/bin/pdftotext");
    expect(config.snippetMaxLength).toBe(40);
    expect(config.maxFileSizeBytes).toBe(50 * 1024 * 1024);
  });

  it("should keep at least one concurrent file", () => {
    expect(resolveEngineConfig({ maxConcurrentFiles: 0 }).maxConcurrentFiles).toBe(1);
  });

  it("should return a frozen value", () => {
    expect(Object.isFrozen(resolveEngineConfig())).toBe(true);
    expect(Object.isFrozen(resolveEngineConfig({ sniffBytes: 512 }))).toBe(true);
  });
});
