import type { ShapeRequest, ShapingEngine } from "./shaping.js";
import type { RenderSurface } from "./surfaces/types.js";
import { EMPTY_BAND, type HeaderBand, type PageConfig, type ShapedLine } from "./types.js";

const RULE_WIDTH = 0.1;

const SINGLE_LINE: ShapeRequest = {
  wrapWidth: null,
  wrapMode: "none",
  alignment: "left",
  justify: false,
};

export interface HeaderContent {
  /** Left run, usually the formatted print time */
  timestamp: string;
  /** Center run: input file name, or "stdin" */
  source: string;
}

/**
 * Print time in the fixed form "Mon Oct 19 2026 14:05:09".
 */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${date.toDateString()} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export function pageLabel(page: number): string {
  return `Page ${page}`;
}

/**
 * Draws the running header (and optional footer): timestamp on the left,
 * source name centered, page number on the right, with a thin rule between
 * the band and the text columns.
 */
export class HeaderComposer {
  constructor(
    private config: PageConfig,
    private shaper: ShapingEngine,
    private content: HeaderContent
  ) {}

  /** The same composer against a config that already carries the band */
  withConfig(config: PageConfig): HeaderComposer {
    return new HeaderComposer(config, this.shaper, this.content);
  }

  measureBand(): HeaderBand {
    const { drawHeader, drawFooter } = this.config;
    if (!drawHeader && !drawFooter) return EMPTY_BAND;
    const line = this.shapeRun(`${this.content.timestamp}${this.content.source}${pageLabel(1)}`);
    const band = Math.trunc(line.logical.height / 3);
    return {
      headerHeight: drawHeader ? band : 0,
      footerHeight: drawFooter ? band : 0,
    };
  }

  draw(surface: RenderSurface, page: number) {
    const c = this.config;
    if (c.drawHeader) {
      this.drawRuns(surface, page, c.topMargin + c.headerHeight);
      if (c.separationLine) {
        this.drawRule(surface, c.topMargin + c.headerHeight + c.headerSeparator / 2);
      }
    }
    if (c.drawFooter) {
      this.drawRuns(surface, page, c.pageHeight - c.bottomMargin);
      if (c.separationLine) {
        this.drawRule(surface, c.pageHeight - c.bottomMargin - c.footerHeight - c.footerSeparator / 2);
      }
    }
  }

  private drawRuns(surface: RenderSurface, page: number, baseline: number) {
    const c = this.config;
    const left = this.shapeRun(this.content.timestamp);
    const center = this.shapeRun(this.content.source);
    const right = this.shapeRun(pageLabel(page));

    surface.moveTo(c.leftMargin, baseline);
    surface.showLine(left);
    surface.moveTo((c.pageWidth - center.logical.width) / 2, baseline);
    surface.showLine(center);
    surface.moveTo(c.pageWidth - c.rightMargin - right.logical.width, baseline);
    surface.showLine(right);
  }

  private drawRule(surface: RenderSurface, y: number) {
    surface.moveTo(this.config.leftMargin, y);
    surface.lineTo(this.config.pageWidth - this.config.rightMargin, y);
    surface.stroke(RULE_WIDTH);
  }

  private shapeRun(text: string): ShapedLine {
    const shaped = this.shaper.shape(text, this.config.headerFont, SINGLE_LINE);
    const [line] = shaped.lines();
    shaped.release();
    if (!line) throw new Error(`Shaping "${text}" produced no line`);
    return line;
  }
}
