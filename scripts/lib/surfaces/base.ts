import type { OutputFormat, PageConfig, ShapedLine } from "../types.js";
import { IDENTITY, type PageStart, type RenderSurface, type Transform } from "./types.js";

export interface Point {
  x: number;
  y: number;
}

/**
 * Pen, path and page bookkeeping shared by the surface variants. Subclasses
 * only translate finished paths and text runs into their own syntax.
 */
export abstract class BaseSurface implements RenderSurface {
  abstract readonly format: OutputFormat;

  protected pen: Point = { x: 0, y: 0 };
  protected transform: Transform = IDENTITY;
  protected pageCount = 0;
  private path: Point[][] = [];
  private pageOpen = false;

  constructor(protected config: PageConfig) {}

  beginPage(page: PageStart) {
    if (this.pageOpen) throw new Error(`beginPage(${page.index}) while page ${this.pageCount} is open`);
    this.pageOpen = true;
    this.pageCount++;
    this.transform = IDENTITY;
    this.path = [];
    this.openPage(page);
  }

  setTransform(transform: Transform) {
    this.transform = transform;
  }

  moveTo(x: number, y: number) {
    this.pen = { x, y };
    this.path.push([this.pen]);
  }

  lineTo(x: number, y: number) {
    const to = { x, y };
    const current = this.path[this.path.length - 1];
    if (current) current.push(to);
    else this.path.push([this.pen, to]);
    this.pen = to;
  }

  stroke(width: number) {
    this.requirePage("stroke");
    const subpaths = this.path.filter((p) => p.length > 1);
    this.path = [];
    if (subpaths.length > 0) this.strokePaths(subpaths, width);
  }

  showLine(line: ShapedLine) {
    this.requirePage("showLine");
    this.path = [];
    this.drawText(line, this.pen, this.transform);
  }

  endPage() {
    this.requirePage("endPage");
    this.closePage();
    this.pageOpen = false;
  }

  async finish(): Promise<Uint8Array> {
    if (this.pageOpen) throw new Error(`finish() while page ${this.pageCount} is open`);
    return this.serialize();
  }

  protected abstract openPage(page: PageStart): void;
  protected abstract closePage(): void;
  protected abstract strokePaths(subpaths: Point[][], width: number): void;
  protected abstract drawText(line: ShapedLine, at: Point, transform: Transform): void;
  protected abstract serialize(): Promise<Uint8Array>;

  private requirePage(op: string) {
    if (!this.pageOpen) throw new Error(`${op}() outside of a page`);
  }
}

export function formatNumber(n: number): string {
  // enough precision for 1/1000 pt, no exponent notation
  const rounded = Math.round(n * 1000) / 1000;
  return Object.is(rounded, -0) ? "0" : String(rounded);
}
