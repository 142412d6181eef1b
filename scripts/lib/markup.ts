import { ShapingFailure } from "./errors.js";

const ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
};

/**
 * Reduce lightly marked-up text (span/b/i style tags, XML entities) to the
 * plain text that gets laid out. Formatting attributes are not carried over.
 */
export function stripMarkup(source: string): string {
  let out = "";
  let i = 0;
  while (i < source.length) {
    const ch = source[i];
    if (ch === "<") {
      const close = source.indexOf(">", i + 1);
      if (close < 0) {
        throw new ShapingFailure(`Unterminated markup tag at offset ${i}`, {
          text: source.slice(i, i + 40),
        });
      }
      i = close + 1;
      continue;
    }
    if (ch === "&") {
      const semi = source.indexOf(";", i + 1);
      const name = semi < 0 ? "" : source.slice(i + 1, semi);
      const decoded = decodeEntity(name);
      if (decoded === null) {
        throw new ShapingFailure(`Unknown entity at offset ${i}`, {
          text: source.slice(i, i + 40),
        });
      }
      out += decoded;
      i = semi + 1;
      continue;
    }
    out += ch;
    i++;
  }
  return out;
}

function decodeEntity(name: string): string | null {
  if (Object.hasOwn(ENTITIES, name)) return ENTITIES[name];
  const m = name.match(/^#(?:x([0-9a-fA-F]+)|(\d+))$/);
  if (!m) return null;
  const cp = m[1] !== undefined ? parseInt(m[1], 16) : parseInt(m[2], 10);
  if (cp > 0x10ffff || (cp >= 0xd800 && cp <= 0xdfff)) return null;
  return String.fromCodePoint(cp);
}
