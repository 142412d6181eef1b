#!/usr/bin/env node
/**
 * Paginate a text file into PostScript, PDF or SVG pages.
 *
 * Usage: tsx scripts/text-to-pages.ts [options] [input.txt] [-o output]
 *
 * Reads stdin when no input file is given (or it is "-") and writes the
 * document to stdout unless -o is set. Diagnostics go to stderr.
 */
import { readFileSync, realpathSync, writeFileSync } from "node:fs";
import { basename, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { parseArgs } from "node:util";
import { ConfigError, isLayoutError } from "./lib/errors.js";
import { decodeInput, resolveEncoding } from "./lib/input.js";
import { banner, fail, setQuiet, success } from "./lib/log.js";
import { parseBooleanOption, parseNumberOption, resolveOptions } from "./lib/options.js";
import { renderDocument } from "./lib/paginate.js";

export const USAGE = `Usage: text-to-pages [options] [input.txt] [-o output]

Layout:
  --paper <name>            a4 (default), letter, legal, a3
  --landscape               Landscape orientation
  --columns <n>             Number of columns (default 1)
  --left-margin <pt>        Left margin (default 36)
  --right-margin <pt>       Right margin (default 36)
  --top-margin <pt>         Top margin (default 36)
  --bottom-margin <pt>      Bottom margin (default 36)
  --gutter-width <pt>       Space between columns (default 40)
  --no-separation-line      Do not draw column and header rules
  --lpi <n>                 Lines per inch (default: natural line height)
  --cpi <n>                 Characters per inch; re-wraps to a fixed pitch
  --no-wrap                 Do not wrap long lines
  --justify                 Justify wrapped lines
  --stretch-chars           Stretch glyphs vertically to fill each --lpi row
  --rtl                     Right-to-left column order and alignment
  --markup                  Input is light markup (tags and entities)

Text:
  --font <desc>             Body font, e.g. "Monospace 10" (default "Monospace 12")
  --header-font <desc>      Header font (default "Monospace Bold 12")
  --header                  Draw a header with time, file name and page number
  --footer                  Draw the same line as a footer
  --encoding <label>        Input encoding (default UTF-8)
  --lang-encoding           Take the input encoding from LC_ALL/LC_CTYPE/LANG
  --recover-invalid-input   Skip undecodable input instead of failing

Output:
  -o, --output <file>       Write to a file instead of stdout
  --format <fmt>            ps (default), pdf, svg
  --duplex <bool>           Request duplex printing (default true)
  --tumble <bool>           Flip on the short edge (default true)

  --config <file.json>      Read options from a JSON file; flags win
  -q, --quiet               Only report warnings and errors
  -h, --help                Show this help
`;

export interface CliIo {
  readStdin(): Promise<Uint8Array>;
  writeStdout(bytes: Uint8Array): void;
}

const processIo: CliIo = {
  async readStdin() {
    const chunks: Buffer[] = [];
    for await (const chunk of process.stdin) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    return Buffer.concat(chunks);
  },
  writeStdout(bytes) {
    process.stdout.write(bytes);
  },
};

function parseCommandLine(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        paper: { type: "string" },
        landscape: { type: "boolean" },
        columns: { type: "string" },
        "left-margin": { type: "string" },
        "right-margin": { type: "string" },
        "top-margin": { type: "string" },
        "bottom-margin": { type: "string" },
        "gutter-width": { type: "string" },
        "no-separation-line": { type: "boolean" },
        lpi: { type: "string" },
        cpi: { type: "string" },
        "no-wrap": { type: "boolean" },
        justify: { type: "boolean" },
        "stretch-chars": { type: "boolean" },
        rtl: { type: "boolean" },
        markup: { type: "boolean" },
        font: { type: "string" },
        "header-font": { type: "string" },
        header: { type: "boolean" },
        footer: { type: "boolean" },
        encoding: { type: "string" },
        "lang-encoding": { type: "boolean" },
        "recover-invalid-input": { type: "boolean" },
        output: { type: "string", short: "o" },
        format: { type: "string" },
        duplex: { type: "string" },
        tumble: { type: "string" },
        config: { type: "string" },
        quiet: { type: "boolean", short: "q" },
        help: { type: "boolean", short: "h" },
      },
    });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(message, [{ path: "argv", message }]);
  }
}

function readConfigFile(path: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read config ${path}: ${message}`, [{ path: "config", message }]);
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`Config ${path} must hold a JSON object`, [
      { path: "config", message: "expected an object" },
    ]);
  }
  return { ...parsed };
}

/**
 * Run the converter. Returns the process exit code.
 */
export async function main(argv: string[], io: CliIo = processIo): Promise<number> {
  try {
    const { values, positionals } = parseCommandLine(argv);
    if (values.help) {
      io.writeStdout(new TextEncoder().encode(USAGE));
      return 0;
    }
    setQuiet(values.quiet ?? false);
    if (positionals.length > 1) {
      throw new ConfigError(`Expected at most one input file, got ${positionals.length}`, [
        { path: "argv", message: "too many input files" },
      ]);
    }

    const raw: Record<string, unknown> = values.config ? readConfigFile(values.config) : {};
    const numbers: Record<string, string | undefined> = {
      columns: values.columns,
      leftMargin: values["left-margin"],
      rightMargin: values["right-margin"],
      topMargin: values["top-margin"],
      bottomMargin: values["bottom-margin"],
      gutterWidth: values["gutter-width"],
      lpi: values.lpi,
      cpi: values.cpi,
    };
    for (const [key, value] of Object.entries(numbers)) {
      if (value !== undefined) raw[key] = parseNumberOption(key, value);
    }
    const switches: Record<string, boolean | undefined> = {
      landscape: values.landscape,
      justify: values.justify,
      stretchChars: values["stretch-chars"],
      markup: values.markup,
      header: values.header,
      footer: values.footer,
      langEncoding: values["lang-encoding"],
      recoverInvalidInput: values["recover-invalid-input"],
    };
    for (const [key, value] of Object.entries(switches)) {
      if (value) raw[key] = true;
    }
    if (values.paper !== undefined) raw.paper = values.paper;
    if (values.font !== undefined) raw.font = values.font;
    if (values["header-font"] !== undefined) raw.headerFont = values["header-font"];
    if (values.encoding !== undefined) raw.encoding = values.encoding;
    if (values.format !== undefined) raw.format = values.format;
    if (values.rtl) raw.direction = "rtl";
    if (values["no-wrap"]) raw.wrap = false;
    if (values["no-separation-line"]) raw.separationLine = false;
    if (values.duplex !== undefined) raw.duplex = parseBooleanOption("--duplex", values.duplex);
    if (values.tumble !== undefined) raw.tumble = parseBooleanOption("--tumble", values.tumble);

    const options = resolveOptions(raw);
    const input = positionals[0] ?? "-";
    const fromStdin = input === "-";

    banner("text-to-pages", {
      input: fromStdin ? "stdin" : input,
      output: values.output ?? "stdout",
      format: options.format,
      paper: `${options.paper}${options.landscape ? " landscape" : ""}`,
      columns: options.columns,
    });

    const bytes = fromStdin ? await io.readStdin() : readInputFile(input);
    const text = decodeInput(bytes, {
      encoding: resolveEncoding(options),
      recoverInvalidInput: options.recoverInvalidInput,
    });

    const result = await renderDocument(text, options, {
      source: fromStdin ? "stdin" : basename(input),
    });

    if (values.output) {
      writeFileSync(values.output, result.bytes);
      success("write", `${values.output} (${result.pageCount} page(s), ${result.bytes.length} bytes)`);
    } else {
      io.writeStdout(result.bytes);
    }
    return 0;
  } catch (err) {
    if (isLayoutError(err)) {
      fail("text-to-pages", `${err.name}: ${err.message}`);
      return 1;
    }
    throw err;
  }
}

function readInputFile(path: string): Uint8Array {
  try {
    return readFileSync(path);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read ${path}: ${message}`, [{ path: "input", message }]);
  }
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return realpathSync(script) === fileURLToPath(import.meta.url);
  } catch {
    return resolve(script) === fileURLToPath(import.meta.url);
  }
}

if (isEntryPoint()) {
  process.exitCode = await main(process.argv.slice(2));
}
