/**
 * Page size presets.
 *
 * The renderer accepts any positive width and height; presets only save
 * callers from remembering point values.
 */

export interface PageSize {
  width: number;
  height: number;
}

/** Portrait sizes in points (1 point = 1/72 inch) */
export const PAGE_SIZES = {
  letter: { width: 612, height: 792 },
  a4: { width: 595, height: 842 },
  legal: { width: 612, height: 1008 },
} as const satisfies Record<string, PageSize>;

export type PageSizePreset = keyof typeof PAGE_SIZES;

export type PageOrientation = "portrait" | "landscape";

export interface PageSizeOptions {
  /** Preset to start from (default: "letter") */
  size?: PageSizePreset;
  /** Swaps the preset's sides when "landscape" */
  orientation?: PageOrientation;
  /** Overrides the preset width */
  width?: number;
  /** Overrides the preset height */
  height?: number;
}

/**
 * Resolve a page size: the preset, turned for landscape, then any explicit
 * width or height on top.
 *
 * @example
 * ```ts
 * resolvePageSize({}) // { width: 612, height: 792 }
 * resolvePageSize({ size: "a4", orientation: "landscape" }) // { width: 842, height: 595 }
 * resolvePageSize({ size: "legal", width: 600 }) // { width: 600, height: 1008 }
 * ```
 */
export function resolvePageSize(options: PageSizeOptions = {}): PageSize {
  const preset: PageSize = PAGE_SIZES[options.size ?? "letter"];
  const turned =
    options.orientation === "landscape" ? { width: preset.height, height: preset.width } : preset;

  return {
    width: options.width ?? turned.width,
    height: options.height ?? turned.height,
  };
}
