import type { StandardFonts } from "pdf-lib";

/**
 * Text direction of the document. Right-to-left mirrors the column order and
 * right-aligns every line inside its column.
 */
export type Direction = "ltr" | "rtl";

/**
 * Page-description formats a rendering surface can produce
 */
export type OutputFormat = "ps" | "pdf" | "svg";

/**
 * Paper presets, in PostScript points (1/72 inch)
 */
export type PaperName = "a4" | "letter" | "legal" | "a3";

export const PAPER_SIZES: Record<PaperName, { width: number; height: number }> = {
  a4: { width: 595.28, height: 841.89 },
  letter: { width: 612, height: 792 },
  legal: { width: 612, height: 1008 },
  a3: { width: 842, height: 1190 },
};

export const POINTS_PER_INCH = 72;

/**
 * A resolved font: one of the PDF standard-14 faces at a point size
 */
export interface FontSpec {
  name: StandardFonts;
  size: number;
  /** The description it was resolved from, e.g. "Monospace Bold 12" */
  description: string;
}

/**
 * Rectangle relative to a line's origin: x grows rightwards from the pen
 * position, y is measured from the baseline (negative is above it).
 */
export interface Box {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * Immutable page geometry and layout policy for one document.
 */
export interface PageConfig {
  readonly pageWidth: number;
  readonly pageHeight: number;
  /** Size of the surface page; differs from the logical page when landscape is done by rotation */
  readonly surfaceWidth: number;
  readonly surfaceHeight: number;
  readonly columns: number;
  readonly columnWidth: number;
  readonly columnHeight: number;
  readonly leftMargin: number;
  readonly rightMargin: number;
  readonly topMargin: number;
  readonly bottomMargin: number;
  readonly gutterWidth: number;
  readonly headerSeparator: number;
  readonly footerSeparator: number;
  readonly headerHeight: number;
  readonly footerHeight: number;
  /** Lines per inch; 0 means each line advances by its natural height */
  readonly lpi: number;
  /** Characters per inch; 0 disables fixed-pitch re-wrapping */
  readonly cpi: number;
  readonly direction: Direction;
  readonly stretchChars: boolean;
  readonly justify: boolean;
  readonly wordWrap: boolean;
  readonly markup: boolean;
  readonly separationLine: boolean;
  readonly landscape: boolean;
  readonly duplex: boolean;
  readonly tumble: boolean;
  readonly drawHeader: boolean;
  readonly drawFooter: boolean;
  readonly recoverInvalidInput: boolean;
  readonly font: FontSpec;
  readonly headerFont: FontSpec;
  readonly format: OutputFormat;
}

/**
 * One visual line as produced by the shaping engine
 */
export interface ShapedLine {
  text: string;
  font: FontSpec;
  logical: Box;
  ink: Box;
  /** Extra advance added to every space when the line is justified */
  wordSpacing: number;
}

/**
 * A shaped line placed in the document's global line stream
 */
export interface MeasuredLine {
  shaped: ShapedLine;
  logical: Box;
  ink: Box;
  /** Set only on the last line of a paragraph that ended at a form feed */
  formfeed: boolean;
  paragraphIndex: number;
  lastInParagraph: boolean;
}

/**
 * Mutable pagination state walked line by line
 */
export interface LayoutCursor {
  page: number;
  column: number;
  offset: number;
  previousFormfeed: boolean;
}

/**
 * Vertical space reserved for the running header and footer
 */
export interface HeaderBand {
  headerHeight: number;
  footerHeight: number;
}

export const EMPTY_BAND: HeaderBand = { headerHeight: 0, footerHeight: 0 };
