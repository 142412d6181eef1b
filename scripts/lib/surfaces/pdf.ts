import {
  Duplex,
  PDFDocument,
  type PDFFont,
  type PDFPage,
  type StandardFonts,
  beginText,
  concatTransformationMatrix,
  endText,
  popGraphicsState,
  pushGraphicsState,
  rgb,
  setFillingColor,
  setFontAndSize,
  setWordSpacing,
  showText,
} from "pdf-lib";
import type { GeometryPolicy } from "../geometry.js";
import type { PageConfig, ShapedLine } from "../types.js";
import { BaseSurface, type Point } from "./base.js";
import type { DocumentInfo, Transform } from "./types.js";

const BLACK = rgb(0, 0, 0);

/**
 * PDF through pdf-lib. Landscape pages get landscape media, so nothing is
 * rotated.
 */
export class PdfSurface extends BaseSurface {
  static readonly policy: GeometryPolicy = { swapSurfaceForLandscape: true };

  readonly format = "pdf" as const;
  private page: PDFPage | null = null;
  private fonts = new Map<StandardFonts, PDFFont>();

  private constructor(
    config: PageConfig,
    private doc: PDFDocument
  ) {
    super(config);
  }

  static async create(config: PageConfig, info: DocumentInfo): Promise<PdfSurface> {
    const doc = await PDFDocument.create();
    doc.setTitle(info.title);
    doc.setCreator("text-pages");
    doc.setProducer("text-pages");
    const prefs = doc.catalog.getOrCreateViewerPreferences();
    if (!config.duplex) prefs.setDuplex(Duplex.Simplex);
    else prefs.setDuplex(config.tumble ? Duplex.DuplexFlipShortEdge : Duplex.DuplexFlipLongEdge);
    return new PdfSurface(config, doc);
  }

  protected openPage() {
    this.page = this.doc.addPage([this.config.surfaceWidth, this.config.surfaceHeight]);
  }

  protected closePage() {
    this.page = null;
  }

  protected strokePaths(subpaths: Point[][], width: number) {
    const page = this.current();
    for (const sub of subpaths) {
      for (let i = 1; i < sub.length; i++) {
        page.drawLine({
          start: this.device(sub[i - 1]),
          end: this.device(sub[i]),
          thickness: width,
          color: BLACK,
        });
      }
    }
  }

  protected drawText(line: ShapedLine, at: Point, transform: Transform) {
    if (line.text === "") return;
    const page = this.current();
    const font = this.font(line.font.name);
    const { x, y } = this.device(at);

    if (line.wordSpacing === 0 && transform.scaleX === 1 && transform.scaleY === 1) {
      page.drawText(line.text, { x, y, size: line.font.size, font, color: BLACK });
      return;
    }

    // drawText has no word spacing or scale, so write the text object directly
    const key = page.node.newFontDictionary(font.name, font.ref);
    page.pushOperators(
      pushGraphicsState(),
      concatTransformationMatrix(transform.scaleX, 0, 0, transform.scaleY, x, y),
      setFillingColor(BLACK),
      beginText(),
      setFontAndSize(key, line.font.size),
      setWordSpacing(line.wordSpacing),
      showText(font.encodeText(line.text)),
      endText(),
      popGraphicsState()
    );
  }

  protected async serialize(): Promise<Uint8Array> {
    return this.doc.save();
  }

  private current(): PDFPage {
    if (!this.page) throw new Error("No open PDF page");
    return this.page;
  }

  private font(name: StandardFonts): PDFFont {
    let f = this.fonts.get(name);
    if (!f) {
      f = this.doc.embedStandardFont(name);
      this.fonts.set(name, f);
    }
    return f;
  }

  private device(p: Point): Point {
    return { x: p.x, y: this.config.surfaceHeight - p.y };
  }
}
