import { planFlow, renderPlan, type FlowPlan } from "./flow.js";
import { applyHeaderBand, computeGeometry } from "./geometry.js";
import { HeaderComposer, formatTimestamp } from "./header.js";
import { normalizeInput } from "./input.js";
import { info } from "./log.js";
import type { ResolvedOptions } from "./options.js";
import { measureLines, segmentText } from "./segment.js";
import { StandardFontShaper, fitFontToPitch, type ShapingEngine } from "./shaping.js";
import { SURFACES, createSurface, type RenderSurface } from "./surfaces/index.js";
import type { PageConfig } from "./types.js";

export interface RenderContext {
  /** Center text of the header, and the document title */
  source: string;
  /** Print time shown in the header; now when unset */
  now?: Date;
  shaper?: ShapingEngine;
  /** Draw onto this surface instead of a new one for the configured format */
  surface?: RenderSurface;
}

export interface RenderResult {
  bytes: Uint8Array;
  pageCount: number;
  lineCount: number;
  contentType: string;
  /** File extension of the output format, with the dot */
  extension: string;
  config: PageConfig;
  plan: FlowPlan;
}

/**
 * Lay out `text` and serialize it in the configured output format.
 */
export async function renderDocument(
  text: string,
  options: ResolvedOptions,
  ctx: RenderContext
): Promise<RenderResult> {
  const variant = SURFACES[options.format];
  const shaper = ctx.shaper ?? (await StandardFontShaper.create());

  let config = computeGeometry(options, variant.policy);
  if (config.cpi > 0) {
    config = { ...config, font: fitFontToPitch(config.font, config.cpi, shaper) };
  }

  let composer: HeaderComposer | null = new HeaderComposer(config, shaper, {
    timestamp: formatTimestamp(ctx.now ?? new Date()),
    source: ctx.source,
  });
  config = applyHeaderBand(config, composer.measureBand());
  composer = config.drawHeader || config.drawFooter ? composer.withConfig(config) : null;

  const paragraphs = segmentText(normalizeInput(text), config, shaper);
  const lines = measureLines(paragraphs);
  const plan = planFlow(lines, config);

  const surface = ctx.surface ?? (await createSurface(config, { title: ctx.source }));
  renderPlan(plan, surface, config, { composer, paragraphs });
  const bytes = await surface.finish();

  info("layout", `${lines.length} lines in ${paragraphs.length} paragraphs on ${plan.pageCount} page(s)`);
  return {
    bytes,
    pageCount: plan.pageCount,
    lineCount: lines.length,
    contentType: variant.contentType,
    extension: variant.extension,
    config,
    plan,
  };
}
