import { StandardFonts } from "pdf-lib";
import { ConfigError } from "./errors.js";
import { warn } from "./log.js";
import type { FontSpec } from "./types.js";

export const DEFAULT_FONT = "Monospace 12";
export const DEFAULT_HEADER_FONT = "Monospace Bold 12";
const DEFAULT_SIZE = 12;

type Family = "courier" | "helvetica" | "times";

const FAMILY_ALIASES: Record<string, Family> = {
  monospace: "courier",
  mono: "courier",
  courier: "courier",
  "courier new": "courier",
  sans: "helvetica",
  "sans-serif": "helvetica",
  helvetica: "helvetica",
  arial: "helvetica",
  serif: "times",
  times: "times",
  "times new roman": "times",
};

// [regular, bold, slanted, bold slanted]
const FACES: Record<Family, [StandardFonts, StandardFonts, StandardFonts, StandardFonts]> = {
  courier: [
    StandardFonts.Courier,
    StandardFonts.CourierBold,
    StandardFonts.CourierOblique,
    StandardFonts.CourierBoldOblique,
  ],
  helvetica: [
    StandardFonts.Helvetica,
    StandardFonts.HelveticaBold,
    StandardFonts.HelveticaOblique,
    StandardFonts.HelveticaBoldOblique,
  ],
  times: [
    StandardFonts.TimesRoman,
    StandardFonts.TimesRomanBold,
    StandardFonts.TimesRomanItalic,
    StandardFonts.TimesRomanBoldItalic,
  ],
};

/**
 * Resolve a font description such as "Monospace Bold 10" or "Serif Italic"
 * onto a standard-14 face. Unknown families fall back to Courier.
 */
export function parseFontDescription(description: string): FontSpec {
  const words = description.trim().split(/\s+/).filter(Boolean);
  let size = DEFAULT_SIZE;
  let bold = false;
  let slanted = false;

  const last = words[words.length - 1];
  if (last !== undefined && /^\d+(\.\d+)?$/.test(last)) {
    size = parseFloat(last);
    words.pop();
  }
  if (!(size > 0)) {
    throw new ConfigError(`Font size must be positive in "${description}"`, [
      { path: "font", message: "size must be positive" },
    ]);
  }

  const familyWords: string[] = [];
  for (const word of words) {
    const w = word.toLowerCase().replace(/,$/, "");
    if (w === "bold") bold = true;
    else if (w === "italic" || w === "oblique") slanted = true;
    else if (w !== "regular" && w !== "normal") familyWords.push(w);
  }

  const familyName = familyWords.join(" ") || "monospace";
  let family = FAMILY_ALIASES[familyName];
  if (!family) {
    warn("font", `Unknown font family "${familyName}", using Courier`);
    family = "courier";
  }

  const face = FACES[family][(bold ? 1 : 0) + (slanted ? 2 : 0)];
  return { name: face, size, description };
}

export function withSize(font: FontSpec, size: number): FontSpec {
  return { ...font, size };
}
