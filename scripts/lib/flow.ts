import type { HeaderComposer } from "./header.js";
import type { Paragraph } from "./segment.js";
import type { RenderSurface } from "./surfaces/types.js";
import { columnLeft } from "./geometry.js";
import { POINTS_PER_INCH, type LayoutCursor, type MeasuredLine, type PageConfig } from "./types.js";

export const SEPARATOR_LINE_WIDTH = 0.1;

export type BreakCause = "overflow" | "formfeed";

export interface Placement {
  lineIndex: number;
  paragraphIndex: number;
  page: number;
  column: number;
  /** Offset of the line's top within its column */
  offset: number;
  /** Pen position: x of the line origin, y of its baseline */
  x: number;
  y: number;
  advance: number;
  breakBefore: "column" | "page" | null;
  cause: BreakCause | null;
}

export interface Separator {
  x: number;
  top: number;
  bottom: number;
}

export type FlowEvent =
  | { kind: "page-start"; page: number }
  | { kind: "column-break"; page: number; column: number; separator: Separator | null }
  | { kind: "line"; line: MeasuredLine; placement: Placement }
  | { kind: "page-end"; page: number };

export interface FlowPlan {
  events: FlowEvent[];
  placements: Placement[];
  pageCount: number;
  /** Vertical glyph scale applied while drawing lines */
  stretchScale: number;
}

/**
 * One scale for the whole document that makes the tallest line fill exactly
 * one LPI row. 1 when stretching is off.
 */
export function computeStretchScale(lines: readonly MeasuredLine[], config: PageConfig): number {
  if (!config.stretchChars || config.lpi <= 0) return 1;
  let max = 0;
  for (const line of lines) {
    if (line.logical.height > max) max = line.logical.height;
  }
  if (max <= 0) return 1;
  return POINTS_PER_INCH / config.lpi / max;
}

/**
 * Separator drawn at the left edge of logical column `column` (the right
 * edge when the columns are mirrored).
 */
export function separatorFor(config: PageConfig, column: number): Separator {
  const c = config.direction === "rtl" ? config.columns - column : column;
  return {
    x: config.leftMargin + config.columnWidth * c + (c - 0.5) * config.gutterWidth,
    top: config.topMargin + config.headerHeight + config.headerSeparator / 2,
    bottom: config.pageHeight - config.bottomMargin - config.footerHeight - config.footerSeparator / 2,
  };
}

/**
 * Decide the page, column and pen position of every line. Pure: the same
 * lines and config always give the same plan.
 */
export function planFlow(lines: readonly MeasuredLine[], config: PageConfig): FlowPlan {
  const cursor: LayoutCursor = { page: 1, column: 0, offset: 0, previousFormfeed: false };
  const events: FlowEvent[] = [{ kind: "page-start", page: 1 }];
  const placements: Placement[] = [];
  const lpiAdvance = config.lpi > 0 ? POINTS_PER_INCH / config.lpi : 0;

  lines.forEach((line, lineIndex) => {
    const natural = line.logical.height;
    let breakBefore: Placement["breakBefore"] = null;
    let cause: BreakCause | null = null;

    // the overflow test uses the natural height even when LPI sets the advance
    if (cursor.offset + natural >= config.columnHeight || cursor.previousFormfeed) {
      cause = cursor.previousFormfeed ? "formfeed" : "overflow";
      cursor.column++;
      cursor.offset = 0;
      if (cursor.column === config.columns) {
        cursor.column = 0;
        events.push({ kind: "page-end", page: cursor.page });
        cursor.page++;
        events.push({ kind: "page-start", page: cursor.page });
        breakBefore = "page";
      } else {
        events.push({
          kind: "column-break",
          page: cursor.page,
          column: cursor.column,
          separator: config.separationLine ? separatorFor(config, cursor.column) : null,
        });
        breakBefore = "column";
      }
    }

    const advance = lpiAdvance > 0 ? lpiAdvance : natural;
    let x = columnLeft(config, cursor.column);
    if (config.direction === "rtl") {
      x += config.columnWidth - line.logical.width;
    }
    const placement: Placement = {
      lineIndex,
      paragraphIndex: line.paragraphIndex,
      page: cursor.page,
      column: cursor.column,
      offset: cursor.offset,
      x,
      y: config.topMargin + config.headerSeparator + cursor.offset + advance,
      advance,
      breakBefore,
      cause,
    };
    placements.push(placement);
    events.push({ kind: "line", line, placement });

    cursor.offset += advance;
    cursor.previousFormfeed = line.formfeed;
  });

  events.push({ kind: "page-end", page: cursor.page });
  return {
    events,
    placements,
    pageCount: cursor.page,
    stretchScale: computeStretchScale(lines, config),
  };
}

export interface RenderPlanOptions {
  composer?: HeaderComposer | null;
  /** Released as soon as their last line has been drawn */
  paragraphs?: readonly Paragraph[];
}

/**
 * Replay a plan onto a rendering surface.
 */
export function renderPlan(
  plan: FlowPlan,
  surface: RenderSurface,
  config: PageConfig,
  options: RenderPlanOptions = {}
) {
  const { composer = null, paragraphs = [] } = options;
  for (const event of plan.events) {
    switch (event.kind) {
      case "page-start":
        surface.beginPage({ index: event.page, landscape: config.landscape });
        composer?.draw(surface, event.page);
        surface.setTransform({ scaleX: 1, scaleY: plan.stretchScale });
        break;
      case "column-break":
        if (event.separator) {
          surface.moveTo(event.separator.x, event.separator.top);
          surface.lineTo(event.separator.x, event.separator.bottom);
          surface.stroke(SEPARATOR_LINE_WIDTH);
        }
        break;
      case "line":
        surface.moveTo(event.placement.x, event.placement.y);
        surface.showLine(event.line.shaped);
        if (event.line.lastInParagraph) {
          paragraphs[event.line.paragraphIndex]?.release();
        }
        break;
      case "page-end":
        surface.endPage();
        break;
    }
  }
}
