import { describe, expect, it } from "vitest";
import { type ArgDef, parseArgs } from "./args.js";

const defs = {
  quiet: { short: "q", long: "quiet", type: "boolean" },
  extended: { short: "E", long: "extended-regexp", type: "boolean" },
  output: { short: "o", long: "output", type: "string" },
  exclude: { long: "exclude", type: "list" },
} satisfies Record<string, ArgDef>;

function parse(args: string[]) {
  const parsed = parseArgs("folder-search", args, defs);
  if (!parsed.ok) {
    throw new Error(parsed.error);
  }
  return parsed.result;
}

describe("parseArgs", () => {
  it("should read boolean flags in short and long form", () => {
    const args = parse(["-q", "--extended-regexp", "term"]);
    expect(args.flag("quiet")).toBe(true);
    expect(args.flag("extended")).toBe(true);
    expect(args.positional).toEqual(["term"]);
  });

  it("should default flags to false and values to undefined", () => {
    const args = parse(["term"]);
    expect(args.flag("quiet")).toBe(false);
    expect(args.value("output")).toBeUndefined();
    expect(args.list("exclude")).toEqual([]);
  });

  it("should combine short flags", () => {
    const args = parse(["-qE", "term"]);
    expect(args.flag("quiet")).toBe(true);
    expect(args.flag("extended")).toBe(true);
  });

  it("should read values in every form", () => {
    expect(parse(["-o", "a.md"]).value("output")).toBe("a.md");
    expect(parse(["-ob.md"]).value("output")).toBe("b.md");
    expect(parse(["--output=c.md"]).value("output")).toBe("c.md");
    expect(parse(["--output", "d.md"]).value("output")).toBe("d.md");
    expect(parse(["-qo", "e.md"]).value("output")).toBe("e.md");
  });

  it("should collect repeated list options in order", () => {
    const args = parse(["--exclude", "*/a/*", "--exclude=*/b/*", "x"]);
    expect(args.list("exclude")).toEqual(["*/a/*", "*/b/*"]);
  });

  it("should treat everything after -- as positional", () => {
    expect(parse(["--", "-q", "dir"]).positional).toEqual(["-q", "dir"]);
  });

  it("should reject unknown options", () => {
    expect(parseArgs("folder-search", ["--nope"], defs)).toEqual({
      ok: false,
      error: "folder-search: unrecognized option '--nope'",
    });
    expect(parseArgs("folder-search", ["-x"], defs)).toEqual({
      ok: false,
      error: "folder-search: invalid option -- 'x'",
    });
  });

  it("should reject a value option without a value", () => {
    expect(parseArgs("folder-search", ["--output"], defs)).toEqual({
      ok: false,
      error: "folder-search: option '--output' requires an argument",
    });
    expect(parseArgs("folder-search", ["-o"], defs)).toEqual({
      ok: false,
      error: "folder-search: option requires an argument -- 'o'",
    });
  });
});
