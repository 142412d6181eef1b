import type { GeometryPolicy } from "../geometry.js";
import type { PageConfig, ShapedLine } from "../types.js";
import { BaseSurface, formatNumber as n, type Point } from "./base.js";
import type { DocumentInfo, PageStart, Transform } from "./types.js";

/**
 * One SVG document with the pages stacked top to bottom, each in its own
 * group.
 */
export class SvgSurface extends BaseSurface {
  static readonly policy: GeometryPolicy = { swapSurfaceForLandscape: true };

  readonly format = "svg" as const;
  private pages: string[] = [];
  private body: string[] = [];

  constructor(
    config: PageConfig,
    private info: DocumentInfo
  ) {
    super(config);
  }

  protected openPage(page: PageStart) {
    const top = (page.index - 1) * this.config.surfaceHeight;
    this.body = [
      `<g id="page-${page.index}" transform="translate(0 ${n(top)})">`,
      `<rect width="${n(this.config.surfaceWidth)}" height="${n(this.config.surfaceHeight)}" fill="white"/>`,
    ];
  }

  protected closePage() {
    this.body.push("</g>");
    this.pages.push(this.body.join("\n"));
    this.body = [];
  }

  protected strokePaths(subpaths: Point[][], width: number) {
    const d = subpaths
      .map((sub) => sub.map((p, i) => `${i === 0 ? "M" : "L"}${n(p.x)} ${n(p.y)}`).join(" "))
      .join(" ");
    this.body.push(`<path d="${d}" fill="none" stroke="black" stroke-width="${n(width)}"/>`);
  }

  protected drawText(line: ShapedLine, at: Point, transform: Transform) {
    if (line.text === "") return;
    let placement = `translate(${n(at.x)} ${n(at.y)})`;
    if (transform.scaleX !== 1 || transform.scaleY !== 1) {
      placement += ` scale(${n(transform.scaleX)} ${n(transform.scaleY)})`;
    }
    const attrs = [
      `transform="${placement}"`,
      ...fontAttributes(line),
      'xml:space="preserve"',
    ];
    if (line.wordSpacing !== 0) attrs.push(`word-spacing="${n(line.wordSpacing)}"`);
    this.body.push(`<text ${attrs.join(" ")}>${escapeXml(line.text)}</text>`);
  }

  protected async serialize(): Promise<Uint8Array> {
    const width = this.config.surfaceWidth;
    const height = this.config.surfaceHeight * Math.max(1, this.pageCount);
    const doc = [
      '<?xml version="1.0" encoding="UTF-8"?>',
      `<svg xmlns="http://www.w3.org/2000/svg" width="${n(width)}pt" height="${n(height)}pt" viewBox="0 0 ${n(width)} ${n(height)}">`,
      `<title>${escapeXml(this.info.title)}</title>`,
      ...this.pages,
      "</svg>",
      "",
    ].join("\n");
    return new TextEncoder().encode(doc);
  }
}

function fontAttributes(line: ShapedLine): string[] {
  const name = line.font.name;
  let family = "Courier, monospace";
  if (name.startsWith("Helvetica")) family = "Helvetica, Arial, sans-serif";
  else if (name.startsWith("Times")) family = "Times, 'Times New Roman', serif";
  const attrs = [`font-family="${family}"`, `font-size="${n(line.font.size)}"`];
  if (name.includes("Bold")) attrs.push('font-weight="bold"');
  if (/Italic|Oblique/.test(name)) attrs.push('font-style="italic"');
  return attrs;
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}
