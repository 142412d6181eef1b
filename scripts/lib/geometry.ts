import { ConfigError, type ConfigIssue } from "./errors.js";
import { parseFontDescription } from "./fonts.js";
import type { ResolvedOptions } from "./options.js";
import { PAPER_SIZES, type HeaderBand, type PageConfig } from "./types.js";

/** Vertical gap between a header or footer line and the text */
export const HEADER_SEPARATOR = 20;

export interface GeometryPolicy {
  /**
   * Whether the output surface itself takes landscape dimensions. Surfaces
   * that rotate each page onto a portrait sheet leave this off so the axes
   * are not swapped twice.
   */
  swapSurfaceForLandscape: boolean;
}

/**
 * Build the immutable page configuration for one document.
 */
export function computeGeometry(options: ResolvedOptions, policy: GeometryPolicy): PageConfig {
  const paper = PAPER_SIZES[options.paper];
  let pageWidth = options.pageWidth ?? paper.width;
  let pageHeight = options.pageHeight ?? paper.height;

  const surfaceWidth = options.landscape && policy.swapSurfaceForLandscape ? pageHeight : pageWidth;
  const surfaceHeight = options.landscape && policy.swapSurfaceForLandscape ? pageWidth : pageHeight;

  if (options.landscape) {
    [pageWidth, pageHeight] = [pageHeight, pageWidth];
  }

  const columns = options.columns;
  const totalGutter = columns === 1 ? 0 : options.gutterWidth * (columns - 1);
  const headerSeparator = options.header ? HEADER_SEPARATOR : 0;
  const footerSeparator = options.footer ? HEADER_SEPARATOR : 0;

  const columnWidth =
    (pageWidth - options.leftMargin - options.rightMargin - totalGutter) / columns;
  const columnHeight =
    pageHeight - options.topMargin - headerSeparator - footerSeparator - options.bottomMargin;

  checkColumn(columnWidth, columnHeight);

  return {
    pageWidth,
    pageHeight,
    surfaceWidth,
    surfaceHeight,
    columns,
    columnWidth,
    columnHeight,
    leftMargin: options.leftMargin,
    rightMargin: options.rightMargin,
    topMargin: options.topMargin,
    bottomMargin: options.bottomMargin,
    gutterWidth: options.gutterWidth,
    headerSeparator,
    footerSeparator,
    headerHeight: 0,
    footerHeight: 0,
    lpi: options.lpi,
    cpi: options.cpi,
    direction: options.direction,
    stretchChars: options.stretchChars,
    justify: options.justify,
    wordWrap: options.wrap,
    markup: options.markup,
    separationLine: options.separationLine,
    landscape: options.landscape,
    // One default step, after orientation is settled
    duplex: options.duplex ?? true,
    tumble: options.tumble ?? true,
    drawHeader: options.header,
    drawFooter: options.footer,
    recoverInvalidInput: options.recoverInvalidInput,
    font: parseFontDescription(options.font),
    headerFont: parseFontDescription(options.headerFont),
    format: options.format,
  };
}

/**
 * Fold the measured header/footer band into the usable column height.
 */
export function applyHeaderBand(config: PageConfig, band: HeaderBand): PageConfig {
  const columnHeight =
    config.columnHeight +
    config.headerHeight +
    config.footerHeight -
    band.headerHeight -
    band.footerHeight;
  checkColumn(config.columnWidth, columnHeight);
  return {
    ...config,
    headerHeight: band.headerHeight,
    footerHeight: band.footerHeight,
    columnHeight,
  };
}

/** Left edge of a column on the physical page, honoring right-to-left mirroring */
export function columnLeft(config: PageConfig, column: number): number {
  const physical = config.direction === "rtl" ? config.columns - 1 - column : column;
  return config.leftMargin + physical * (config.columnWidth + config.gutterWidth);
}

function checkColumn(columnWidth: number, columnHeight: number) {
  const issues: ConfigIssue[] = [];
  if (!(columnWidth > 0)) {
    issues.push({ path: "columnWidth", message: `must be positive, got ${columnWidth}` });
  }
  if (!(columnHeight > 0)) {
    issues.push({ path: "columnHeight", message: `must be positive, got ${columnHeight}` });
  }
  if (issues.length) {
    throw new ConfigError(
      `Margins and gutters exceed the page: ${issues.map((i) => `${i.path} ${i.message}`).join(", ")}`,
      issues
    );
  }
}
