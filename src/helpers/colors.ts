/**
 * Color types and resolution.
 *
 * Element attributes carry colors as text: one of eight names, or a
 * `#RRGGBB` hex string. Both resolve to an RGB triple in the 0-1 range
 * for the `rg` / `RG` operators.
 */

import { UnresolvableColorError } from "#src/errors";
import { formatOperand } from "./format";

/**
 * RGB color with values in the 0-1 range.
 */
export interface RGB {
  type: "RGB";
  red: number;
  green: number;
  blue: number;
}

/**
 * Names accepted in place of a hex color.
 */
export type NamedColor =
  | "red"
  | "green"
  | "blue"
  | "black"
  | "white"
  | "yellow"
  | "cyan"
  | "magenta";

/**
 * Textual color value as written in element attributes.
 */
export type ColorValue = NamedColor | `#${string}`;

/**
 * Named-color lookup table.
 */
export type ColorTable = Readonly<Record<string, RGB>>;

const HEX_COLOR_PATTERN = /^#([0-9a-fA-F]{2})([0-9a-fA-F]{2})([0-9a-fA-F]{2})$/;

/**
 * Create an RGB color.
 *
 * @example
 * ```typescript
 * const red = rgb(1, 0, 0);
 * const gray50 = rgb(0.5, 0.5, 0.5);
 * ```
 */
export function rgb(r: number, g: number, b: number): RGB {
  return { type: "RGB", red: r, green: g, blue: b };
}

/**
 * The default named colors.
 */
export const NAMED_COLORS: ColorTable = Object.freeze({
  red: rgb(1, 0, 0),
  green: rgb(0, 1, 0),
  blue: rgb(0, 0, 1),
  black: rgb(0, 0, 0),
  white: rgb(1, 1, 1),
  yellow: rgb(1, 1, 0),
  cyan: rgb(0, 1, 1),
  magenta: rgb(1, 0, 1),
});

/**
 * Whether a value is a `#RRGGBB` hex color.
 */
export function isHexColor(value: string): boolean {
  return HEX_COLOR_PATTERN.test(value);
}

/**
 * Resolve a color value to RGB.
 *
 * Hex channels are decoded pairwise and divided by 255 with no rounding.
 *
 * @param value - A named color or `#RRGGBB`
 * @param names - Named-color table (default: {@link NAMED_COLORS})
 * @throws {UnresolvableColorError} for anything else
 */
export function parseColor(value: unknown, names: ColorTable = NAMED_COLORS): RGB {
  if (typeof value !== "string") {
    throw new UnresolvableColorError(value);
  }

  if (Object.hasOwn(names, value)) {
    return names[value];
  }

  const match = HEX_COLOR_PATTERN.exec(value);

  if (!match) {
    throw new UnresolvableColorError(value);
  }

  return rgb(
    Number.parseInt(match[1], 16) / 255,
    Number.parseInt(match[2], 16) / 255,
    Number.parseInt(match[3], 16) / 255,
  );
}

/**
 * Convert an RGB color back to `#rrggbb` text.
 *
 * Channels are scaled to 0-255 and rounded, so resolving the result gives
 * back the same RGB value for any color that came from {@link parseColor}.
 */
export function colorToHex(color: RGB): string {
  const channel = (value: number) =>
    Math.round(Math.min(1, Math.max(0, value)) * 255)
      .toString(16)
      .padStart(2, "0");

  return `#${channel(color.red)}${channel(color.green)}${channel(color.blue)}`;
}

/**
 * Convert a Color to an array of numbers for PDF operators.
 */
export function colorToArray(color: RGB): number[] {
  return [color.red, color.green, color.blue];
}

/**
 * Operand text for `rg` / `RG`: `"1 0 0"` for red.
 */
export function colorOperands(color: RGB): string {
  return colorToArray(color).map(formatOperand).join(" ");
}
