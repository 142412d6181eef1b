import { Hono, type HonoRequest } from "hono";
import { z } from "zod";
import { ConfigError } from "../../../scripts/lib/errors.js";
import { decodeInput, resolveEncoding } from "../../../scripts/lib/input.js";
import { info } from "../../../scripts/lib/log.js";
import { parseBooleanOption, parseNumberOption, resolveOptions } from "../../../scripts/lib/options.js";
import { renderDocument } from "../../../scripts/lib/paginate.js";
import type { ServerConfig } from "../config.js";

const NUMERIC_KEYS = new Set([
  "pageWidth",
  "pageHeight",
  "columns",
  "leftMargin",
  "rightMargin",
  "topMargin",
  "bottomMargin",
  "gutterWidth",
  "lpi",
  "cpi",
]);

const BOOLEAN_KEYS = new Set([
  "landscape",
  "wrap",
  "justify",
  "stretchChars",
  "markup",
  "header",
  "footer",
  "separationLine",
  "langEncoding",
  "duplex",
  "tumble",
  "recoverInvalidInput",
]);

const ConvertRequestSchema = z.object({
  text: z.string(),
  source: z.string().min(1).optional(),
  options: z.record(z.unknown()).optional(),
});

/**
 * Page options from a query string. Values arrive as text and are typed by
 * option name; unknown names are left for the schema to reject.
 */
export function optionsFromQuery(query: Record<string, string>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(query)) {
    if (key === "source") continue;
    if (NUMERIC_KEYS.has(key)) out[key] = parseNumberOption(key, value);
    else if (BOOLEAN_KEYS.has(key)) out[key] = parseBooleanOption(key, value);
    else out[key] = value;
  }
  return out;
}

interface ConvertRequest {
  /** Text from a JSON body, or the raw bytes of a plain body */
  body: { text: string } | { bytes: Uint8Array };
  source: string | undefined;
  options: Record<string, unknown>;
}

async function readRequest(req: HonoRequest): Promise<ConvertRequest> {
  if ((req.header("Content-Type") ?? "").includes("application/json")) {
    let body: unknown;
    try {
      body = await req.json();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ConfigError(`Request body is not valid JSON: ${message}`, [{ path: "body", message }]);
    }
    const parsed = ConvertRequestSchema.safeParse(body);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => ({ path: i.path.join(".") || "(root)", message: i.message }));
      throw new ConfigError(`Invalid request: ${issues.map((i) => `${i.path}: ${i.message}`).join("; ")}`, issues);
    }
    return {
      body: { text: parsed.data.text },
      source: parsed.data.source,
      options: parsed.data.options ?? {},
    };
  }

  const query = req.query();
  return {
    body: { bytes: new Uint8Array(await req.arrayBuffer()) },
    source: query.source,
    options: optionsFromQuery(query),
  };
}

/** "notes.txt" → "notes.pdf"; quotes and path separators are dropped */
export function downloadName(source: string, extension: string): string {
  const base = source.replace(/^.*[\\/]/, "").replace(/["\r\n]/g, "").replace(/\.[^.]*$/, "");
  return `${base || "document"}${extension}`;
}

export function convertRoutes(config: ServerConfig) {
  const routes = new Hono();

  // Convert text to a paginated document
  routes.post("/", async (c) => {
    const request = await readRequest(c.req);
    const options = resolveOptions({ ...config.defaults, ...request.options });
    const source = request.source ?? "stdin";

    const text =
      "text" in request.body
        ? request.body.text
        : decodeInput(request.body.bytes, {
            encoding: resolveEncoding(options),
            recoverInvalidInput: options.recoverInvalidInput,
          });

    const result = await renderDocument(text, options, { source });
    info("convert", `${source}: ${result.pageCount} page(s) as ${options.format}`);

    return new Response(result.bytes, {
      status: 200,
      headers: {
        "Content-Type": result.contentType,
        "Content-Disposition": `inline; filename="${downloadName(source, result.extension)}"`,
        "X-Page-Count": String(result.pageCount),
      },
    });
  });

  return routes;
}
