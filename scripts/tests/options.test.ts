import { describe, test, expect } from "vitest";
import { ConfigError } from "../lib/errors.js";
import { DEFAULT_FONT, DEFAULT_HEADER_FONT } from "../lib/fonts.js";
import { parseBooleanOption, parseNumberOption, resolveOptions } from "../lib/options.js";

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigError) return err.issues.map((i) => i.path);
    throw err;
  }
  throw new Error("expected a ConfigError");
}

describe("resolveOptions", () => {
  test("fills in defaults", () => {
    const o = resolveOptions({});
    expect(o.paper).toBe("a4");
    expect(o.columns).toBe(1);
    expect([o.leftMargin, o.rightMargin, o.topMargin, o.bottomMargin]).toEqual([36, 36, 36, 36]);
    expect(o.gutterWidth).toBe(40);
    expect(o.format).toBe("ps");
    expect(o.font).toBe(DEFAULT_FONT);
    expect(o.headerFont).toBe(DEFAULT_HEADER_FONT);
    expect([DEFAULT_FONT, DEFAULT_HEADER_FONT]).toEqual(["Monospace 12", "Monospace Bold 12"]);
    expect(o.wrap).toBe(true);
    expect(o.separationLine).toBe(true);
    expect(o.duplex).toBeUndefined();
  });

  test("normalizes format and direction names", () => {
    expect(resolveOptions({ format: "postscript" }).format).toBe("ps");
    expect(resolveOptions({ format: "PDF" }).format).toBe("pdf");
    expect(resolveOptions({ direction: "RTL" }).direction).toBe("rtl");
  });

  test("rejects bad values with the offending paths", () => {
    expect(issuesOf(() => resolveOptions({ columns: 0 }))).toEqual(["columns"]);
    expect(issuesOf(() => resolveOptions({ columns: 1.5 }))).toEqual(["columns"]);
    expect(issuesOf(() => resolveOptions({ lpi: -1, cpi: Infinity }))).toEqual(["lpi", "cpi"]);
    expect(issuesOf(() => resolveOptions({ paper: "b5" }))).toEqual(["paper"]);
    expect(issuesOf(() => resolveOptions({ format: "png" }))).toEqual(["format"]);
  });

  test("rejects unknown keys", () => {
    expect(() => resolveOptions({ colums: 2 })).toThrow(ConfigError);
  });
});

describe("text option parsing", () => {
  test("numbers", () => {
    expect(parseNumberOption("lpi", "6")).toBe(6);
    expect(parseNumberOption("leftMargin", "12.5")).toBe(12.5);
    expect(() => parseNumberOption("lpi", "six")).toThrow('given lpi value was invalid: "six"');
    expect(() => parseNumberOption("lpi", "")).toThrow(ConfigError);
  });

  test("booleans", () => {
    expect(parseBooleanOption("duplex", "yes")).toBe(true);
    expect(parseBooleanOption("duplex", "Off")).toBe(false);
    expect(() => parseBooleanOption("duplex", "maybe")).toThrow(ConfigError);
  });
});
