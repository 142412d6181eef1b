import type { GeometryPolicy } from "../geometry.js";
import type { OutputFormat, PageConfig, ShapedLine } from "../types.js";

export interface PageStart {
  /** 1-based page number */
  index: number;
  landscape: boolean;
}

/**
 * Scale applied to glyphs drawn by `showLine`, about each line's baseline
 * origin. Pen positions are never scaled.
 */
export interface Transform {
  scaleX: number;
  scaleY: number;
}

export const IDENTITY: Transform = { scaleX: 1, scaleY: 1 };

/**
 * Drawing target for laid-out pages. Coordinates are logical page points
 * with the origin at the top-left corner and y growing downwards; each
 * surface maps them onto its own device space.
 */
export interface RenderSurface {
  readonly format: OutputFormat;
  beginPage(page: PageStart): void;
  setTransform(transform: Transform): void;
  moveTo(x: number, y: number): void;
  lineTo(x: number, y: number): void;
  stroke(width: number): void;
  /** Draw a line of text with its baseline origin at the current point */
  showLine(line: ShapedLine): void;
  endPage(): void;
  /** Serialize every page drawn so far */
  finish(): Promise<Uint8Array>;
}

export interface DocumentInfo {
  title: string;
}

export interface SurfaceVariant {
  format: OutputFormat;
  contentType: string;
  extension: string;
  policy: GeometryPolicy;
  create(config: PageConfig, info: DocumentInfo): Promise<RenderSurface>;
}
