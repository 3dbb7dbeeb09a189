/**
 * elemental-pdf
 *
 * Render declarative element trees to PDF content streams and PDF 1.4 files.
 */

export { version } from "../package.json";

// ─────────────────────────────────────────────────────────────────────────────
// High-level API
// ─────────────────────────────────────────────────────────────────────────────

export {
  type GenerationDefaults,
  type GenerationOptions,
  type ResolvedOptions,
  resolveOptions,
} from "./api/options";
export {
  type RenderResult,
  renderDocument,
  renderDocumentBytes,
  renderDocumentWithWarnings,
  renderOperators,
} from "./api/render";

// ─────────────────────────────────────────────────────────────────────────────
// Elements and Validation
// ─────────────────────────────────────────────────────────────────────────────

export { createElementSchemas, type AttributesOf } from "./elements/schemas";
export type {
  CircleElement,
  DocumentElement,
  Element,
  ElementOf,
  ElementType,
  GroupElement,
  ImageElement,
  LineElement,
  Margins,
  PageElement,
  PathElement,
  RectElement,
  ShapeElement,
  TextElement,
  TransformOp,
} from "./elements/types";
export {
  type AttributeValidator,
  createAttributeValidator,
  readDocument,
  readElement,
  readPage,
  validateAttributes,
} from "./elements/validator";

// ─────────────────────────────────────────────────────────────────────────────
// Pipeline Stages
// ─────────────────────────────────────────────────────────────────────────────

export {
  CIRCLE_BEZIER_FACTOR,
  type EmitContext,
  emitOperators,
  paintOperator,
} from "./content/operator-emitter";
export { type PathCommand, parsePathData, pathDataToOperators } from "./content/path-data";
export { type Matrix, transformMatrix, transformToOperator } from "./content/transforms";
export { mapElementCoordinates, webToPdfY } from "./document/coordinates";
export {
  type AssembledDocument,
  type AssembleOptions,
  assembleDocument,
  type DocumentInfo,
} from "./document/document-assembler";
export {
  type PageDefaults,
  type PageMetadata,
  type PageResult,
  processPage,
  processPageElement,
} from "./document/page-processor";

// ─────────────────────────────────────────────────────────────────────────────
// Colors, Fonts, Images and Page Sizes
// ─────────────────────────────────────────────────────────────────────────────

export {
  type ColorTable,
  type ColorValue,
  colorToHex,
  type NamedColor,
  NAMED_COLORS,
  parseColor,
  type RGB,
  rgb,
} from "./helpers/colors";
export {
  type FontAliasTable,
  FONT_ALIASES,
  resolveBaseFont,
  STANDARD_14_FONTS,
  type Standard14FontName,
} from "./fonts/standard-14";
export {
  type ImagePixels,
  ImageRegistry,
  type ImageResolver,
  type ImageSource,
  type ResolvedImage,
} from "./images/image-registry";
export {
  PAGE_SIZES,
  type PageOrientation,
  type PageSize,
  type PageSizeOptions,
  type PageSizePreset,
  resolvePageSize,
} from "./helpers/page-size";

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────

export {
  AssemblyInvariantError,
  AttributeValidationError,
  PdfGenerationError,
  StructuralError,
  UnresolvableColorError,
  UnsupportedElementError,
} from "./errors";
