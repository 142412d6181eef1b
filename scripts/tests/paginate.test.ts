import { describe, test, expect, vi, beforeEach, afterEach } from "vitest";
import { PDFDocument } from "pdf-lib";
import { ShapingFailure } from "../lib/errors.js";
import { resolveOptions } from "../lib/options.js";
import { renderDocument } from "../lib/paginate.js";
import { FixedPitchShaper, RecordingSurface } from "./helpers.js";

const now = new Date(2026, 9, 19, 14, 5, 9);

function stubbed(options: Record<string, unknown> = {}) {
  const surface = new RecordingSurface();
  const ctx = { source: "notes.txt", now, shaper: new FixedPitchShaper(10), surface };
  return { surface, ctx, options: resolveOptions({ paper: "letter", ...options }) };
}

beforeEach(() => {
  vi.spyOn(console, "error").mockImplementation(() => {});
});
afterEach(() => {
  vi.restoreAllMocks();
});

describe("renderDocument", () => {
  test("lays out every line", async () => {
    const { surface, ctx, options } = stubbed();
    const result = await renderDocument("one\ntwo\n", options, ctx);
    expect(result.pageCount).toBe(1);
    expect(result.lineCount).toBe(2);
    expect(result.contentType).toBe("application/postscript");
    expect(surface.texts()).toEqual(["one", "two"]);
  });

  test("input without a final newline is terminated", async () => {
    const { ctx, options } = stubbed();
    const result = await renderDocument("abc", options, ctx);
    expect(result.lineCount).toBe(1);
  });

  test("spills onto further pages", async () => {
    const { ctx, options } = stubbed();
    const text = Array.from({ length: 100 }, (_, i) => `line ${i}`).join("\n");
    const result = await renderDocument(text, options, ctx);
    expect(result.pageCount).toBe(2);
  });

  test("the header band comes out of the column", async () => {
    const { surface, ctx, options } = stubbed({ header: true });
    const result = await renderDocument("one\n", options, ctx);
    expect(result.config.headerHeight).toBe(3);
    expect(result.config.columnHeight).toBe(697);
    expect(surface.texts()).toEqual(["Mon Oct 19 2026 14:05:09", "notes.txt", "Page 1", "one"]);
  });

  test("a footer alone leaves the first line at the top margin", async () => {
    const { surface, ctx, options } = stubbed({ footer: true });
    const result = await renderDocument("one\n", options, ctx);
    expect(result.config.footerHeight).toBe(3);
    expect(result.config.columnHeight).toBe(697);
    const body = surface.ops.findIndex((o) => o.op === "showLine" && o.text === "one");
    expect(surface.ops[body - 1]).toEqual({ op: "moveTo", x: 36, y: 46 });
  });

  test("a fixed pitch resizes the body font", async () => {
    const { ctx, options } = stubbed({ cpi: 12 });
    const result = await renderDocument("x\n", options, ctx);
    expect(result.config.font.size).toBeCloseTo(10, 6);
    expect(result.config.headerFont.size).toBe(12);
  });
});

describe("renderDocument with the standard fonts", () => {
  test("PDF with a page per form feed", async () => {
    const result = await renderDocument("hello\fworld\n", resolveOptions({ format: "pdf" }), { source: "x" });
    expect(result.pageCount).toBe(2);
    expect(result.contentType).toBe("application/pdf");
    const doc = await PDFDocument.load(result.bytes);
    expect(doc.getPageCount()).toBe(2);
  });

  test("SVG is written by the surface for its format", async () => {
    const result = await renderDocument("x\n", resolveOptions({ format: "svg" }), { source: "x", now });
    expect(result.contentType).toBe("image/svg+xml");
    expect(result.extension).toBe(".svg");
    expect(new TextDecoder().decode(result.bytes).startsWith('<?xml version="1.0" encoding="UTF-8"?>\n')).toBe(true);
  });

  test("PostScript landscape keeps a portrait surface", async () => {
    const result = await renderDocument("x\n", resolveOptions({ landscape: true }), { source: "x" });
    expect([result.config.pageWidth, result.config.pageHeight]).toEqual([841.89, 595.28]);
    expect([result.config.surfaceWidth, result.config.surfaceHeight]).toEqual([595.28, 841.89]);
    expect(new TextDecoder().decode(result.bytes)).toContain("%%PageOrientation: Landscape");
  });

  test("text the fonts cannot encode fails", async () => {
    await expect(renderDocument("漢字\n", resolveOptions({}), { source: "x" })).rejects.toThrow(ShapingFailure);
  });
});
