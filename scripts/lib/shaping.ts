import { PDFDocument, type PDFFont, type StandardFonts } from "pdf-lib";
import { ShapingFailure } from "./errors.js";
import { withSize } from "./fonts.js";
import { stripMarkup } from "./markup.js";
import { POINTS_PER_INCH, type FontSpec, type ShapedLine } from "./types.js";

export type WrapMode = "word-char" | "none";
export type Alignment = "left" | "right";

export interface ShapeRequest {
  /** Width to wrap at, or null for no constraint (only embedded breaks split lines) */
  wrapWidth: number | null;
  wrapMode: WrapMode;
  alignment: Alignment;
  justify: boolean;
  /** Treat the text as light markup */
  markup?: boolean;
}

/**
 * Lines of one shaped paragraph. The owner releases it once every line has
 * been drawn; reading it afterwards is a programming error.
 */
export interface ShapedParagraph {
  readonly lineCount: number;
  readonly released: boolean;
  lines(): readonly ShapedLine[];
  release(): void;
}

export interface ShapingEngine {
  shape(text: string, font: FontSpec, request: ShapeRequest): ShapedParagraph;
  approximateCharWidth(font: FontSpec): number;
  approximateDigitWidth(font: FontSpec): number;
}

export interface FontMetrics {
  ascent: number;
  descent: number;
  /** Baseline-to-baseline distance */
  lineHeight: number;
}

const TAB_WIDTH = 8;
const CHAR_SAMPLE = "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ";
const DIGITS = "0123456789";

class LineList implements ShapedParagraph {
  private items: readonly ShapedLine[] | null;
  readonly lineCount: number;

  constructor(items: readonly ShapedLine[]) {
    this.items = items;
    this.lineCount = items.length;
  }

  get released(): boolean {
    return this.items === null;
  }

  lines(): readonly ShapedLine[] {
    if (this.items === null) throw new Error("Shaped paragraph was already released");
    return this.items;
  }

  release() {
    this.items = null;
  }
}

/**
 * Greedy line breaking shared by every engine: break between words, and
 * inside a word only when the word alone is wider than the line.
 */
export abstract class LineBreakingShaper implements ShapingEngine {
  /** Advance width of `text` in points */
  protected abstract advance(text: string, font: FontSpec): number;
  protected abstract metrics(font: FontSpec): FontMetrics;

  shape(text: string, font: FontSpec, request: ShapeRequest): ShapedParagraph {
    const plain = normalizeText(request.markup ? stripMarkup(text) : text);
    const m = this.metrics(font);
    const measure = (s: string) => this.measure(s, font);
    const lines: ShapedLine[] = [];

    for (const segment of plain.split(/\n|\f/)) {
      const expanded = expandTabs(segment);
      const rows =
        request.wrapMode === "word-char" && request.wrapWidth !== null
          ? breakLines(expanded, request.wrapWidth, measure)
          : [expanded];

      rows.forEach((row, i) => {
        const soft = i < rows.length - 1;
        const width = measure(row);
        let logicalWidth = width;
        let wordSpacing = 0;
        const spaces = countSpaces(row);
        if (request.justify && soft && request.wrapWidth !== null && spaces > 0) {
          wordSpacing = (request.wrapWidth - width) / spaces;
          logicalWidth = request.wrapWidth;
        }
        const offset =
          request.alignment === "right" && request.wrapWidth !== null
            ? Math.max(0, request.wrapWidth - logicalWidth)
            : 0;
        lines.push({
          text: row,
          font,
          wordSpacing,
          logical: {
            x: offset,
            y: -(m.ascent + (m.lineHeight - m.ascent - m.descent) / 2),
            width: logicalWidth,
            height: m.lineHeight,
          },
          ink: {
            x: offset,
            y: -m.ascent,
            width: row.trim() === "" ? 0 : width,
            height: m.ascent + m.descent,
          },
        });
      });
    }
    return new LineList(lines);
  }

  approximateCharWidth(font: FontSpec): number {
    return this.measure(CHAR_SAMPLE, font) / CHAR_SAMPLE.length;
  }

  approximateDigitWidth(font: FontSpec): number {
    return Math.max(...Array.from(DIGITS, (d) => this.measure(d, font)));
  }

  private measure(text: string, font: FontSpec): number {
    try {
      return this.advance(text, font);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ShapingFailure(`Cannot measure text in ${font.name}: ${reason}`, {
        text,
        font: font.description,
      });
    }
  }
}

/**
 * Measures with the AFM metrics of the PDF standard-14 fonts. The fonts are
 * embedded into a scratch document that is never saved.
 */
export class StandardFontShaper extends LineBreakingShaper {
  static readonly LINE_HEIGHT_FACTOR = 1.15;
  private fonts = new Map<StandardFonts, PDFFont>();

  private constructor(private scratch: PDFDocument) {
    super();
  }

  static async create(): Promise<StandardFontShaper> {
    return new StandardFontShaper(await PDFDocument.create());
  }

  protected advance(text: string, font: FontSpec): number {
    return this.font(font).widthOfTextAtSize(text, font.size);
  }

  protected metrics(font: FontSpec): FontMetrics {
    const f = this.font(font);
    const total = f.heightAtSize(font.size);
    const ascent = f.heightAtSize(font.size, { descender: false });
    return {
      ascent,
      descent: total - ascent,
      lineHeight: font.size * StandardFontShaper.LINE_HEIGHT_FACTOR,
    };
  }

  private font(spec: FontSpec): PDFFont {
    let f = this.fonts.get(spec.name);
    if (!f) {
      f = this.scratch.embedStandardFont(spec.name);
      this.fonts.set(spec.name, f);
    }
    return f;
  }
}

/**
 * Scale a font so one character cell is exactly 1/cpi inch wide.
 */
export function fitFontToPitch(font: FontSpec, cpi: number, shaper: ShapingEngine): FontSpec {
  if (cpi <= 0) return font;
  const cell = Math.max(shaper.approximateCharWidth(font), shaper.approximateDigitWidth(font));
  if (cell <= 0) return font;
  return withSize(font, (font.size * POINTS_PER_INCH) / cpi / cell);
}

/**
 * Break one embedded line into rows no wider than `width`. Whitespace at a
 * soft break stays out of the row it ends.
 */
export function breakLines(text: string, width: number, measure: (s: string) => number): string[] {
  const tokens = text.match(/\s+|\S+\s*/g) ?? [];
  const rows: string[] = [];
  let cur = "";

  for (const token of tokens) {
    if (cur.trim() === "" || measure((cur + token).trimEnd()) <= width) {
      cur += token;
    } else {
      rows.push(cur.trimEnd());
      cur = token;
    }
    while (measure(cur.trimEnd()) > width) {
      const cut = fitPrefix(cur, width, measure);
      rows.push(cur.slice(0, cut));
      cur = cur.slice(cut);
    }
  }
  rows.push(cur);
  return rows;
}

function fitPrefix(text: string, width: number, measure: (s: string) => number): number {
  let end = 0;
  for (const ch of text) {
    const next = end + ch.length;
    if (end > 0 && measure(text.slice(0, next)) > width) break;
    end = next;
  }
  return end;
}

function normalizeText(text: string): string {
  // keep tab, line feed and form feed; drop other C0 controls and DEL
  return text.replace(/[\u0000-\u0008\u000b\u000d-\u001f\u007f]/g, "");
}

function expandTabs(line: string): string {
  if (!line.includes("\t")) return line;
  let out = "";
  let col = 0;
  for (const ch of line) {
    if (ch === "\t") {
      const pad = TAB_WIDTH - (col % TAB_WIDTH);
      out += " ".repeat(pad);
      col += pad;
    } else {
      out += ch;
      col++;
    }
  }
  return out;
}

function countSpaces(text: string): number {
  let n = 0;
  for (const ch of text.trimEnd()) if (ch === " ") n++;
  return n;
}
