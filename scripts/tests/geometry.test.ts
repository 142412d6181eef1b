import { describe, test, expect } from "vitest";
import { ConfigError } from "../lib/errors.js";
import { applyHeaderBand, columnLeft, computeGeometry, HEADER_SEPARATOR } from "../lib/geometry.js";
import { resolveOptions } from "../lib/options.js";

const swap = { swapSurfaceForLandscape: true };
const rotate = { swapSurfaceForLandscape: false };

describe("computeGeometry", () => {
  test("A4 defaults", () => {
    const c = computeGeometry(resolveOptions({}), swap);
    expect(c.pageWidth).toBe(595.28);
    expect(c.pageHeight).toBe(841.89);
    expect(c.columns).toBe(1);
    expect(c.columnWidth).toBeCloseTo(523.28, 6);
    expect(c.columnHeight).toBeCloseTo(769.89, 6);
    expect(c.headerSeparator).toBe(0);
    expect(c.footerSeparator).toBe(0);
    expect(c.gutterWidth).toBe(40);
  });

  test("paper names are case-insensitive", () => {
    const c = computeGeometry(resolveOptions({ paper: "Letter" }), swap);
    expect(c.pageWidth).toBe(612);
    expect(c.pageHeight).toBe(792);
  });

  test("explicit page size overrides the preset per axis", () => {
    const c = computeGeometry(resolveOptions({ paper: "letter", pageHeight: 500 }), swap);
    expect(c.pageWidth).toBe(612);
    expect(c.pageHeight).toBe(500);
  });

  test("two columns share the width minus one gutter", () => {
    const c = computeGeometry(resolveOptions({ paper: "letter", columns: 2 }), swap);
    expect(c.columnWidth).toBe(250);
  });

  test("drawing a header reserves the separator", () => {
    const c = computeGeometry(resolveOptions({ paper: "letter", header: true }), swap);
    expect(c.headerSeparator).toBe(HEADER_SEPARATOR);
    expect(c.footerSeparator).toBe(0);
    expect(c.columnHeight).toBe(700);
  });

  test("a footer reserves its separator at the bottom only", () => {
    const footer = computeGeometry(resolveOptions({ paper: "letter", footer: true }), swap);
    expect(footer.headerSeparator).toBe(0);
    expect(footer.footerSeparator).toBe(HEADER_SEPARATOR);
    expect(footer.columnHeight).toBe(700);

    const both = computeGeometry(resolveOptions({ paper: "letter", header: true, footer: true }), swap);
    expect(both.columnHeight).toBe(680);
  });

  test("landscape swaps the logical page and, by policy, the surface", () => {
    const swapped = computeGeometry(resolveOptions({ paper: "letter", landscape: true }), swap);
    expect([swapped.pageWidth, swapped.pageHeight]).toEqual([792, 612]);
    expect([swapped.surfaceWidth, swapped.surfaceHeight]).toEqual([792, 612]);

    const rotated = computeGeometry(resolveOptions({ paper: "letter", landscape: true }), rotate);
    expect([rotated.pageWidth, rotated.pageHeight]).toEqual([792, 612]);
    expect([rotated.surfaceWidth, rotated.surfaceHeight]).toEqual([612, 792]);
    expect(rotated.columnWidth).toBe(720);
  });

  test("duplex and tumble default to on", () => {
    const c = computeGeometry(resolveOptions({}), swap);
    expect(c.duplex).toBe(true);
    expect(c.tumble).toBe(true);

    const off = computeGeometry(resolveOptions({ duplex: false, tumble: false, landscape: true }), rotate);
    expect(off.duplex).toBe(false);
    expect(off.tumble).toBe(false);
  });

  test("margins wider than the page are a ConfigError", () => {
    expect(() => computeGeometry(resolveOptions({ leftMargin: 400, rightMargin: 400 }), swap)).toThrow(
      ConfigError
    );
    try {
      computeGeometry(resolveOptions({ topMargin: 500, bottomMargin: 500 }), swap);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.issues.map((i) => i.path)).toEqual(["columnHeight"]);
      }
    }
  });

  test("fonts are resolved once", () => {
    const c = computeGeometry(resolveOptions({ font: "Serif 10" }), swap);
    expect(c.font.name).toBe("Times-Roman");
    expect(c.font.size).toBe(10);
    expect(c.headerFont.name).toBe("Courier-Bold");
  });
});

describe("applyHeaderBand", () => {
  const base = computeGeometry(resolveOptions({ paper: "letter", header: true }), swap);

  test("takes the band out of the column height", () => {
    const c = applyHeaderBand(base, { headerHeight: 4, footerHeight: 0 });
    expect(c.headerHeight).toBe(4);
    expect(c.columnHeight).toBe(696);
    expect(base.columnHeight).toBe(700);
  });

  test("replaces rather than accumulates", () => {
    const once = applyHeaderBand(base, { headerHeight: 4, footerHeight: 0 });
    const twice = applyHeaderBand(once, { headerHeight: 6, footerHeight: 6 });
    expect(twice.columnHeight).toBe(688);
  });

  test("a band taller than the column is a ConfigError", () => {
    expect(() => applyHeaderBand(base, { headerHeight: 400, footerHeight: 400 })).toThrow(ConfigError);
  });
});

describe("columnLeft", () => {
  test("ltr columns run left to right", () => {
    const c = computeGeometry(resolveOptions({ paper: "letter", columns: 2 }), swap);
    expect(columnLeft(c, 0)).toBe(36);
    expect(columnLeft(c, 1)).toBe(326);
  });

  test("rtl mirrors the column index", () => {
    const c = computeGeometry(resolveOptions({ paper: "letter", columns: 2, direction: "rtl" }), swap);
    expect(columnLeft(c, 0)).toBe(326);
    expect(columnLeft(c, 1)).toBe(36);
  });
});
