import { fitToCells, isSurrogate } from "./cell-width.js";
import { EncodingError } from "./errors.js";
import { warn } from "./log.js";
import type { ShapeRequest, ShapedParagraph, ShapingEngine } from "./shaping.js";
import { POINTS_PER_INCH, type MeasuredLine, type PageConfig, type ShapedLine } from "./types.js";

const LF = 0x0a;
const FF = 0x0c;

/**
 * A run of source text between two boundaries, holding the shaped lines the
 * shaping engine produced for it until they have been drawn.
 */
export class Paragraph {
  constructor(
    readonly index: number,
    readonly text: string,
    readonly start: number,
    readonly end: number,
    readonly formfeedTerminated: boolean,
    private shaped: ShapedParagraph
  ) {}

  get lineCount(): number {
    return this.shaped.lineCount;
  }

  get released(): boolean {
    return this.shaped.released;
  }

  lines(): readonly ShapedLine[] {
    return this.shaped.lines();
  }

  release() {
    this.shaped.release();
  }
}

/** Character cells a column holds at the configured pitch */
export function cellBudget(config: PageConfig): number {
  return Math.floor((config.columnWidth / POINTS_PER_INCH) * config.cpi);
}

/**
 * Split text into paragraphs and shape each one.
 */
export function segmentText(text: string, config: PageConfig, shaper: ShapingEngine): Paragraph[] {
  const base = {
    alignment: config.direction === "ltr" ? "left" : "right",
    justify: config.justify,
  } as const;
  const wrapped: ShapeRequest = { ...base, wrapWidth: config.columnWidth, wrapMode: "word-char" };
  const unwrapped: ShapeRequest = { ...base, wrapWidth: null, wrapMode: "none" };

  if (config.markup) {
    const request = config.wordWrap ? wrapped : unwrapped;
    const shaped = shaper.shape(text, config.font, { ...request, markup: true });
    return [new Paragraph(0, text, 0, text.length, false, shaped)];
  }

  const rewrap = config.cpi > 0 && config.wordWrap;
  const budget = cellBudget(config);
  const paragraphs: Paragraph[] = [];
  let start = 0;
  let i = 0;

  const emit = (body: string, end: number, formfeed: boolean, request: ShapeRequest) => {
    const shaped = shaper.shape(body, config.font, request);
    paragraphs.push(new Paragraph(paragraphs.length, body, start, end, formfeed, shaped));
  };

  while (i <= text.length) {
    const atEnd = i === text.length;
    const cp = atEnd ? 0 : text.codePointAt(i) ?? 0;
    let next = i + (cp > 0xffff ? 2 : 1);
    const invalid = !atEnd && isSurrogate(cp);

    if (invalid && next === text.length && cp <= 0xdbff) {
      // truncated pair at the end of the buffer
      break;
    }
    if (invalid) {
      warn("segment", `Invalid character in input at offset ${i}`);
      if (config.recoverInvalidInput) {
        i = next;
        continue;
      }
    }

    if (invalid || atEnd || cp === LF || cp === FF) {
      if (atEnd && start === i) break;

      let raw = text.slice(start, i);
      let end = i;
      let formfeed = cp === FF;
      let request = config.wordWrap ? wrapped : unwrapped;
      let truncated = false;

      if (rewrap) {
        const fit = measureCells(raw, budget, start, config.recoverInvalidInput);
        if (fit.cells > budget && fit.length < raw.length) {
          // shape the part that fits on one row, rescan the rest
          raw = raw.slice(0, fit.length);
          end = start + fit.length;
          next = end;
          formfeed = false;
          request = unwrapped;
          truncated = true;
        }
      }

      emit(stripInvalid(raw, config.recoverInvalidInput), end, formfeed, request);
      start = next;
      if (atEnd && !truncated) break;
    }
    i = next;
  }

  return paragraphs;
}

/**
 * Flatten paragraphs into the single line stream the flow engine consumes.
 */
export function measureLines(paragraphs: readonly Paragraph[]): MeasuredLine[] {
  const out: MeasuredLine[] = [];
  for (const para of paragraphs) {
    const lines = para.lines();
    lines.forEach((shaped, i) => {
      const last = i === lines.length - 1;
      out.push({
        shaped,
        logical: shaped.logical,
        ink: shaped.ink,
        formfeed: para.formfeedTerminated && last,
        paragraphIndex: para.index,
        lastInParagraph: last,
      });
    });
  }
  return out;
}

function stripInvalid(body: string, recover: boolean): string {
  if (!recover) return body;
  return body.replace(/[\ud800-\udbff](?![\udc00-\udfff])|(?<![\ud800-\udbff])[\udc00-\udfff]/g, "");
}

function measureCells(body: string, budget: number, offset: number, skipInvalid: boolean) {
  try {
    return fitToCells(body, budget, skipInvalid);
  } catch (err) {
    if (err instanceof EncodingError) {
      throw new EncodingError(`${err.message} at offset ${offset}`, { ...err.details, offset });
    }
    throw err;
  }
}
