import type { OutputFormat, PageConfig } from "../types.js";
import { PdfSurface } from "./pdf.js";
import { PostScriptSurface } from "./postscript.js";
import { SvgSurface } from "./svg.js";
import type { DocumentInfo, RenderSurface, SurfaceVariant } from "./types.js";

export const SURFACES: Record<OutputFormat, SurfaceVariant> = {
  ps: {
    format: "ps",
    contentType: "application/postscript",
    extension: ".ps",
    policy: PostScriptSurface.policy,
    create: async (config, info) => new PostScriptSurface(config, info),
  },
  pdf: {
    format: "pdf",
    contentType: "application/pdf",
    extension: ".pdf",
    policy: PdfSurface.policy,
    create: (config, info) => PdfSurface.create(config, info),
  },
  svg: {
    format: "svg",
    contentType: "image/svg+xml",
    extension: ".svg",
    policy: SvgSurface.policy,
    create: async (config, info) => new SvgSurface(config, info),
  },
};

export function createSurface(config: PageConfig, info: DocumentInfo): Promise<RenderSurface> {
  return SURFACES[config.format].create(config, info);
}

export type { DocumentInfo, RenderSurface, SurfaceVariant, Transform, PageStart } from "./types.js";
