import { TextDecoder } from "node:util";
import { EncodingError } from "./errors.js";
import { warn } from "./log.js";

export interface DecodeOptions {
  /** WHATWG encoding label; UTF-8 when unset */
  encoding?: string;
  recoverInvalidInput: boolean;
}

/**
 * Codeset named by the locale environment (LC_ALL, then LC_CTYPE, then LANG),
 * e.g. "EUC-JP" for ja_JP.EUC-JP. Undefined for UTF-8 and C/POSIX locales.
 */
export function encodingFromLocale(env: NodeJS.ProcessEnv = process.env): string | undefined {
  const locale = env.LC_ALL || env.LC_CTYPE || env.LANG || "";
  const codeset = locale.match(/\.([^@]+)/)?.[1];
  if (!codeset) return undefined;
  if (/^utf-?8$/i.test(codeset)) return undefined;
  return codeset;
}

export function resolveEncoding(
  options: { encoding?: string; langEncoding: boolean },
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  if (options.encoding) return options.encoding;
  return options.langEncoding ? encodingFromLocale(env) : undefined;
}

/**
 * Decode input bytes to text. Malformed bytes are an EncodingError unless
 * recovery is on, in which case they are dropped with a warning.
 */
export function decodeInput(bytes: Uint8Array, options: DecodeOptions): string {
  const label = options.encoding ?? "utf-8";
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(label, { fatal: !options.recoverInvalidInput });
  } catch {
    throw new EncodingError(`Unknown encoding "${label}"`, { encoding: label });
  }

  let text: string;
  try {
    text = decoder.decode(bytes);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new EncodingError(`Input is not valid ${label}: ${reason}`, { encoding: label });
  }

  if (options.recoverInvalidInput && text.includes("\ufffd")) {
    let dropped = 0;
    text = text.replace(/\ufffd/g, () => {
      dropped++;
      return "";
    });
    warn("input", `Skipped ${dropped} undecodable sequence(s) in ${label} input`);
  }
  return normalizeInput(text);
}

/**
 * Make sure the last paragraph is terminated like every other one.
 */
export function normalizeInput(text: string): string {
  return text.endsWith("\n") ? text : `${text}\n`;
}
