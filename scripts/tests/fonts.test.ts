import { describe, test, expect, vi, beforeEach, afterEach } from "vitest";
import { StandardFonts } from "pdf-lib";
import { ConfigError } from "../lib/errors.js";
import { parseFontDescription, withSize } from "../lib/fonts.js";

describe("parseFontDescription", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("family, style and size", () => {
    expect(parseFontDescription("Monospace 12")).toEqual({
      name: StandardFonts.Courier,
      size: 12,
      description: "Monospace 12",
    });
    expect(parseFontDescription("Monospace Bold 10").name).toBe(StandardFonts.CourierBold);
    expect(parseFontDescription("Monospace Bold 10").size).toBe(10);
    expect(parseFontDescription("Sans Bold Oblique 9.5")).toMatchObject({
      name: StandardFonts.HelveticaBoldOblique,
      size: 9.5,
    });
    expect(parseFontDescription("Times New Roman Italic").name).toBe(StandardFonts.TimesRomanItalic);
  });

  test("size defaults to 12", () => {
    expect(parseFontDescription("Serif").size).toBe(12);
  });

  test("unknown families fall back to Courier with a warning", () => {
    expect(parseFontDescription("Comic Sans 10").name).toBe(StandardFonts.Courier);
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  test("zero size is a ConfigError", () => {
    expect(() => parseFontDescription("Monospace 0")).toThrow(ConfigError);
  });

  test("withSize keeps the face", () => {
    const f = withSize(parseFontDescription("Monospace Bold 12"), 8);
    expect(f.name).toBe(StandardFonts.CourierBold);
    expect(f.size).toBe(8);
  });
});
