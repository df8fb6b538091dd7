import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigError } from "../errors.js";
import { createTree, removeTree } from "../test-utils/search-fixtures.js";
import { loadSearchConfig, parseSearchConfig } from "./search-config.js";

describe("parseSearchConfig", () => {
  it("should read both lists", () => {
    const text = [
      "search:",
      "  excluded:",
      '    - "*/build/*"',
      '    - "*/.git/*"',
      "  included:",
      '    - "*.md"',
      "",
    ].join("\n");
    expect(parseSearchConfig(text, "config.yaml")).toEqual({
      excluded: ["*/build/*", "*/.git/*"],
      included: ["*.md"],
    });
  });

  it("should treat a non-list value as an empty list", () => {
    const text = "search:\n  excluded: '*/build/*'\n  included:\n    - '*.md'\n";
    expect(parseSearchConfig(text, "config.yaml")).toEqual({
      excluded: [],
      included: ["*.md"],
    });
  });

  it("should drop entries that are not strings", () => {
    const text = "search:\n  excluded:\n    - 42\n    - '*/tmp/*'\n";
    expect(parseSearchConfig(text, "config.yaml")).toEqual({
      excluded: ["*/tmp/*"],
      included: [],
    });
  });

  it("should treat a missing section as empty", () => {
    expect(parseSearchConfig("other: true\n", "config.yaml")).toEqual({
      excluded: [],
      included: [],
    });
    expect(parseSearchConfig("", "config.yaml")).toEqual({
      excluded: [],
      included: [],
    });
  });

  it("should reject malformed YAML", () => {
    expect(() =>
      parseSearchConfig("search: [unclosed\n", "/etc/config.yaml"),
    ).toThrow(ConfigError);
  });
});

describe("loadSearchConfig", () => {
  let root: string;

  beforeEach(() => {
    root = createTree({
      "config.yaml": "search:\n  excluded:\n    - '*/dist/*'\n",
    });
  });

  afterEach(() => {
    removeTree(root);
  });

  it("should load a file from disk", async () => {
    expect(await loadSearchConfig(path.join(root, "config.yaml"))).toEqual({
      excluded: ["*/dist/*"],
      included: [],
    });
  });

  it("should return empty lists for a missing file", async () => {
    expect(await loadSearchConfig(path.join(root, "absent.yaml"))).toEqual({
      excluded: [],
      included: [],
    });
  });

  it("should reject a path that is a directory", async () => {
    await expect(loadSearchConfig(root)).rejects.toBeInstanceOf(ConfigError);
  });
});
