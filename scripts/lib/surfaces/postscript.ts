import type { StandardFonts } from "pdf-lib";
import { ShapingFailure } from "../errors.js";
import type { GeometryPolicy } from "../geometry.js";
import type { PageConfig, ShapedLine } from "../types.js";
import { BaseSurface, formatNumber as n, type Point } from "./base.js";
import type { DocumentInfo, PageStart, Transform } from "./types.js";

const PROLOG = `/reencode-latin1 {
  findfont dup length dict begin
    { 1 index /FID ne { def } { pop pop } ifelse } forall
    /Encoding ISOLatin1Encoding def
    currentdict
  end
  definefont pop
} bind def`;

/**
 * DSC-conforming PostScript. Landscape pages are rotated onto a portrait
 * sheet, so the surface keeps its portrait size.
 */
export class PostScriptSurface extends BaseSurface {
  static readonly policy: GeometryPolicy = { swapSurfaceForLandscape: false };

  readonly format = "ps" as const;
  private pages: string[] = [];
  private body: string[] = [];
  private fonts = new Set<StandardFonts>();

  constructor(
    config: PageConfig,
    private info: DocumentInfo,
    private creationDate: Date = new Date()
  ) {
    super(config);
  }

  protected openPage(page: PageStart) {
    this.body = [
      `%%Page: ${page.index} ${page.index}`,
      `%%PageOrientation: ${page.landscape ? "Landscape" : "Portrait"}`,
      "%%BeginPageSetup",
      "/pagesave save def",
      "%%EndPageSetup",
    ];
  }

  protected closePage() {
    this.body.push("pagesave restore", "showpage", "%%PageTrailer");
    this.pages.push(this.body.join("\n"));
    this.body = [];
  }

  protected strokePaths(subpaths: Point[][], width: number) {
    const ops = ["newpath"];
    for (const sub of subpaths) {
      sub.forEach((p, i) => {
        const d = this.device(p);
        ops.push(`${n(d.x)} ${n(d.y)} ${i === 0 ? "moveto" : "lineto"}`);
      });
    }
    ops.push(`${n(width)} setlinewidth stroke`);
    this.body.push(ops.join(" "));
  }

  protected drawText(line: ShapedLine, at: Point, transform: Transform) {
    if (line.text === "") return;
    this.fonts.add(line.font.name);
    const d = this.device(at);
    const ops = ["gsave", `${n(d.x)} ${n(d.y)} translate`];
    if (this.config.landscape) ops.push("-90 rotate");
    if (transform.scaleX !== 1 || transform.scaleY !== 1) {
      ops.push(`${n(transform.scaleX)} ${n(transform.scaleY)} scale`);
    }
    ops.push(`/${latin1Name(line.font.name)} ${n(line.font.size)} selectfont`, "0 0 moveto");
    const str = encodeString(line.text, line.font.description);
    if (line.wordSpacing !== 0) {
      ops.push(`${n(line.wordSpacing)} 0 32 ${str} widthshow`);
    } else {
      ops.push(`${str} show`);
    }
    ops.push("grestore");
    this.body.push(ops.join(" "));
  }

  protected async serialize(): Promise<Uint8Array> {
    const { surfaceWidth: w, surfaceHeight: h, duplex, tumble, landscape } = this.config;
    const header = [
      "%!PS-Adobe-3.0",
      `%%Title: ${dscText(this.info.title)}`,
      "%%Creator: text-pages",
      `%%CreationDate: ${this.creationDate.toISOString()}`,
      `%%Pages: ${this.pageCount}`,
      `%%BoundingBox: 0 0 ${Math.ceil(w)} ${Math.ceil(h)}`,
      `%%DocumentMedia: Plain ${Math.round(w)} ${Math.round(h)} 0 () ()`,
      `%%Orientation: ${landscape ? "Landscape" : "Portrait"}`,
    ];
    if (duplex) header.push(`%%Requirements: ${tumble ? "duplex(tumble)" : "duplex"}`);
    header.push("%%EndComments");

    const setup = [...this.fonts]
      .sort()
      .map((font) => `/${latin1Name(font)} /${font} reencode-latin1`);

    const doc = [
      ...header,
      "%%BeginProlog",
      PROLOG,
      "%%EndProlog",
      "%%BeginSetup",
      ...setup,
      "%%EndSetup",
      ...this.pages,
      "%%Trailer",
      "%%EOF",
      "",
    ].join("\n");
    return new TextEncoder().encode(doc);
  }

  /** Logical top-left coordinates to PostScript device space */
  private device(p: Point): Point {
    const { surfaceWidth, surfaceHeight, landscape } = this.config;
    if (landscape) return { x: surfaceWidth - p.y, y: surfaceHeight - p.x };
    return { x: p.x, y: surfaceHeight - p.y };
  }
}

function latin1Name(font: StandardFonts): string {
  return `${font}-Latin1`;
}

/**
 * A PostScript string literal for ISO-Latin-1 encoded fonts, written in
 * plain ASCII: bytes outside the printable range become octal escapes.
 */
export function encodeString(text: string, fontDescription?: string): string {
  let out = "(";
  for (const ch of text) {
    const cp = ch.codePointAt(0) ?? 0;
    if (cp > 0xff) {
      throw new ShapingFailure(
        `U+${cp.toString(16).toUpperCase().padStart(4, "0")} has no ISO-Latin-1 code`,
        { text, font: fontDescription }
      );
    }
    if (ch === "(" || ch === ")" || ch === "\\") out += `\\${ch}`;
    else if (cp < 0x20 || cp >= 0x7f) out += `\\${cp.toString(8).padStart(3, "0")}`;
    else out += ch;
  }
  return `${out})`;
}

function dscText(text: string): string {
  // DSC comment values are single-line printable ASCII
  return text.replace(/[^\x20-\x7e]/g, "?");
}
