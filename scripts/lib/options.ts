import { z } from "zod";
import { ConfigError } from "./errors.js";
import { DEFAULT_FONT, DEFAULT_HEADER_FONT } from "./fonts.js";

const PAPERS = ["a4", "letter", "legal", "a3"] as const;

const margin = z.number().finite().min(0);

export const PageOptionsSchema = z
  .object({
    paper: z.string().toLowerCase().pipe(z.enum(PAPERS)).default("a4"),
    pageWidth: z.number().positive().optional(),
    pageHeight: z.number().positive().optional(),
    columns: z.number().int().positive().default(1),
    leftMargin: margin.default(36),
    rightMargin: margin.default(36),
    topMargin: margin.default(36),
    bottomMargin: margin.default(36),
    gutterWidth: margin.default(40),
    landscape: z.boolean().default(false),
    lpi: z.number().finite().min(0).default(0),
    cpi: z.number().finite().min(0).default(0),
    wrap: z.boolean().default(true),
    justify: z.boolean().default(false),
    stretchChars: z.boolean().default(false),
    markup: z.boolean().default(false),
    direction: z.string().toLowerCase().pipe(z.enum(["ltr", "rtl"])).default("ltr"),
    header: z.boolean().default(false),
    footer: z.boolean().default(false),
    separationLine: z.boolean().default(true),
    font: z.string().min(1).default(DEFAULT_FONT),
    headerFont: z.string().min(1).default(DEFAULT_HEADER_FONT),
    format: z
      .string()
      .toLowerCase()
      .pipe(z.enum(["ps", "postscript", "pdf", "svg"]))
      .transform((v) => (v === "postscript" ? "ps" : v))
      .default("ps"),
    encoding: z.string().min(1).optional(),
    langEncoding: z.boolean().default(false),
    duplex: z.boolean().optional(),
    tumble: z.boolean().optional(),
    recoverInvalidInput: z.boolean().default(false),
  })
  .strict();

/** Options as written in a config file, a query string or on the command line */
export type PageOptions = z.input<typeof PageOptionsSchema>;

/** Options with defaults applied */
export type ResolvedOptions = z.output<typeof PageOptionsSchema>;

export function resolveOptions(input: unknown = {}): ResolvedOptions {
  const parsed = PageOptionsSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      path: issue.path.join(".") || "(root)",
      message: issue.message,
    }));
    const summary = issues.map((i) => `${i.path}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid options: ${summary}`, issues);
  }
  return parsed.data;
}

/**
 * Parse a numeric option given as text (command line, query string).
 */
export function parseNumberOption(name: string, value: string): number {
  const n = Number(value);
  if (value.trim() === "" || !Number.isFinite(n)) {
    throw new ConfigError(`given ${name} value was invalid: "${value}"`, [
      { path: name, message: "expected a number" },
    ]);
  }
  return n;
}

export function parseBooleanOption(name: string, value: string): boolean {
  const v = value.toLowerCase();
  if (v === "true" || v === "on" || v === "yes" || v === "1") return true;
  if (v === "false" || v === "off" || v === "no" || v === "0") return false;
  throw new ConfigError(`given ${name} value was invalid: "${value}"`, [
    { path: name, message: "expected a boolean" },
  ]);
}
