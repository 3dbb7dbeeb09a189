/**
 * The 14 standard PDF fonts and the font-name aliases that map onto them.
 *
 * Every PDF reader ships these fonts, so a document can reference them by
 * /BaseFont name without embedding anything. Text elements name a font
 * freely ("Arial", "Times New Roman"); the alias table decides which
 * standard font the reader substitutes.
 */

/**
 * Names of the standard 14 fonts.
 */
export const STANDARD_14_FONTS = [
  "Helvetica",
  "Helvetica-Bold",
  "Helvetica-Oblique",
  "Helvetica-BoldOblique",
  "Times-Roman",
  "Times-Bold",
  "Times-Italic",
  "Times-BoldItalic",
  "Courier",
  "Courier-Bold",
  "Courier-Oblique",
  "Courier-BoldOblique",
  "Symbol",
  "ZapfDingbats",
] as const;

export type Standard14FontName = (typeof STANDARD_14_FONTS)[number];

/**
 * Font alias lookup table.
 */
export type FontAliasTable = Readonly<Record<string, Standard14FontName>>;

/** Font used when a name resolves to nothing. */
export const DEFAULT_FONT: Standard14FontName = "Helvetica";

/**
 * Common font names and the standard font each stands in for.
 */
export const FONT_ALIASES: FontAliasTable = Object.freeze({
  Arial: "Helvetica",
  Helvetica: "Helvetica",
  Times: "Times-Roman",
  "Times New Roman": "Times-Roman",
  Courier: "Courier",
});

const standardNames: ReadonlySet<string> = new Set(STANDARD_14_FONTS);

/**
 * Check if a font name is one of the standard 14.
 */
export function isStandard14Font(name: string): name is Standard14FontName {
  return standardNames.has(name);
}

/**
 * Whether the font takes /Encoding /WinAnsiEncoding.
 *
 * Symbol and ZapfDingbats have their own built-in encodings.
 */
export function usesWinAnsiEncoding(name: Standard14FontName): boolean {
  return name !== "Symbol" && name !== "ZapfDingbats";
}

/**
 * Resolve a font name to the standard font written as /BaseFont.
 *
 * Aliases are checked first, then the standard names themselves. Anything
 * else falls back to Helvetica and is reported through `onWarning`.
 *
 * @example
 * ```ts
 * resolveBaseFont("Times New Roman") // "Times-Roman"
 * resolveBaseFont("Courier-Bold")    // "Courier-Bold"
 * ```
 */
export function resolveBaseFont(
  name: string,
  aliases: FontAliasTable = FONT_ALIASES,
  onWarning?: (message: string) => void,
): Standard14FontName {
  if (Object.hasOwn(aliases, name)) {
    return aliases[name];
  }

  if (isStandard14Font(name)) {
    return name;
  }

  onWarning?.(`Unknown font "${name}", using ${DEFAULT_FONT}`);

  return DEFAULT_FONT;
}
