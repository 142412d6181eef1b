/**
 * In-process stand-ins shared by the layout tests: a shaper with fixed
 * advances and heights, and a surface that records every call.
 */
import { computeGeometry } from "../lib/geometry.js";
import { resolveOptions, type PageOptions } from "../lib/options.js";
import { LineBreakingShaper, type FontMetrics } from "../lib/shaping.js";
import type { PageStart, RenderSurface, Transform } from "../lib/surfaces/types.js";
import type { FontSpec, MeasuredLine, PageConfig, ShapedLine } from "../lib/types.js";
import { parseFontDescription } from "../lib/fonts.js";

/** Every code point advances 0.6 em, every line is `lineHeight` tall */
export class FixedPitchShaper extends LineBreakingShaper {
  constructor(private lineHeight = 10) {
    super();
  }

  protected advance(text: string, font: FontSpec): number {
    return [...text].length * font.size * 0.6;
  }

  protected metrics(): FontMetrics {
    return { ascent: this.lineHeight * 0.8, descent: this.lineHeight * 0.2, lineHeight: this.lineHeight };
  }
}

export type SurfaceOp =
  | { op: "beginPage"; index: number; landscape: boolean }
  | { op: "setTransform"; scaleX: number; scaleY: number }
  | { op: "moveTo"; x: number; y: number }
  | { op: "lineTo"; x: number; y: number }
  | { op: "stroke"; width: number }
  | { op: "showLine"; text: string; wordSpacing: number }
  | { op: "endPage" };

export class RecordingSurface implements RenderSurface {
  readonly format = "ps" as const;
  ops: SurfaceOp[] = [];

  beginPage(page: PageStart) {
    this.ops.push({ op: "beginPage", index: page.index, landscape: page.landscape });
  }
  setTransform(t: Transform) {
    this.ops.push({ op: "setTransform", scaleX: t.scaleX, scaleY: t.scaleY });
  }
  moveTo(x: number, y: number) {
    this.ops.push({ op: "moveTo", x, y });
  }
  lineTo(x: number, y: number) {
    this.ops.push({ op: "lineTo", x, y });
  }
  stroke(width: number) {
    this.ops.push({ op: "stroke", width });
  }
  showLine(line: ShapedLine) {
    this.ops.push({ op: "showLine", text: line.text, wordSpacing: line.wordSpacing });
  }
  endPage() {
    this.ops.push({ op: "endPage" });
  }
  async finish(): Promise<Uint8Array> {
    return new TextEncoder().encode(JSON.stringify(this.ops));
  }

  /** Text of every drawn line, in drawing order */
  texts(): string[] {
    return this.ops.flatMap((o) => (o.op === "showLine" ? [o.text] : []));
  }
}

/** Letter-sized, portrait, surface swapped for landscape, then overridden */
export function makeConfig(
  options: PageOptions = {},
  overrides: Partial<PageConfig> = {}
): PageConfig {
  const base = computeGeometry(resolveOptions({ paper: "letter", ...options }), {
    swapSurfaceForLandscape: true,
  });
  return { ...base, ...overrides };
}

export function shapedLine(text: string, height = 10, width = text.length * 7.2): ShapedLine {
  return {
    text,
    font: parseFontDescription("Monospace 12"),
    wordSpacing: 0,
    logical: { x: 0, y: -height * 0.8, width, height },
    ink: { x: 0, y: -height * 0.8, width, height },
  };
}

export function measured(
  text: string,
  height = 10,
  extra: Partial<Omit<MeasuredLine, "shaped" | "logical" | "ink">> = {}
): MeasuredLine {
  const shaped = shapedLine(text, height);
  return {
    shaped,
    logical: shaped.logical,
    ink: shaped.ink,
    formfeed: false,
    paragraphIndex: 0,
    lastInParagraph: true,
    ...extra,
  };
}
