/**
 * Generation options and their defaults.
 */

import type { EmitContext } from "#src/content/operator-emitter";
import type { PageDefaults } from "#src/document/page-processor";
import type { Margins } from "#src/elements/types";
import { type AttributeValidator, createAttributeValidator } from "#src/elements/validator";
import { type FontAliasTable, FONT_ALIASES } from "#src/fonts/standard-14";
import { type ColorTable, NAMED_COLORS } from "#src/helpers/colors";
import { type PageSizeOptions, resolvePageSize } from "#src/helpers/page-size";
import { ImageRegistry, type ImageResolver } from "#src/images/image-registry";

/**
 * Values used when a document leaves them out.
 */
export interface GenerationDefaults extends PageSizeOptions {
  /** Page margins as [top, right, bottom, left] (default: all 0) */
  margins?: Margins;
  /** Info /Creator when the document sets none */
  creator?: string;
  /** Info /Producer when the document sets none */
  producer?: string;
}

export interface GenerationOptions {
  /** Attribute validator (default: zod schemas accepting {@link colors}) */
  validator?: AttributeValidator;
  /** Image resolver (default: an empty {@link ImageRegistry}) */
  images?: ImageResolver;
  /** Named colors (default: {@link NAMED_COLORS}) */
  colors?: ColorTable;
  /** Font aliases (default: {@link FONT_ALIASES}) */
  fonts?: FontAliasTable;
  defaults?: GenerationDefaults;
  /** Receives non-fatal conditions such as ignored path commands */
  onWarning?: (message: string) => void;
}

export interface ResolvedOptions {
  validator: AttributeValidator;
  images: ImageResolver;
  colors: ColorTable;
  fonts: FontAliasTable;
  page: PageDefaults;
  creator?: string;
  producer?: string;
  onWarning?: (message: string) => void;
}

const NO_MARGINS: Margins = [0, 0, 0, 0];

/**
 * Fill in every option the caller left out.
 *
 * A custom color table without a custom validator gets a validator that
 * accepts those colors.
 *
 * @example
 * ```ts
 * resolveOptions({ defaults: { size: "a4" } }).page // { width: 595, height: 842, margins: [0, 0, 0, 0] }
 * ```
 */
export function resolveOptions(options: GenerationOptions = {}): ResolvedOptions {
  const colors = options.colors ?? NAMED_COLORS;
  const defaults = options.defaults ?? {};

  return {
    validator: options.validator ?? createAttributeValidator(colors),
    images: options.images ?? new ImageRegistry(),
    colors,
    fonts: options.fonts ?? FONT_ALIASES,
    page: { ...resolvePageSize(defaults), margins: defaults.margins ?? NO_MARGINS },
    creator: defaults.creator,
    producer: defaults.producer,
    onWarning: options.onWarning,
  };
}

export function toEmitContext(options: ResolvedOptions): EmitContext {
  return {
    validator: options.validator,
    images: options.images,
    colors: options.colors,
    onWarning: options.onWarning,
  };
}
