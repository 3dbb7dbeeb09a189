/**
 * Zod schemas for element attributes.
 *
 * One object schema per element kind. Container kinds (group, page,
 * document) only check that their children are an array; the children
 * themselves are read one by one so each reports its own errors.
 */

import { z } from "zod";
import { type ColorTable, isHexColor, NAMED_COLORS } from "#src/helpers/colors";

// ─────────────────────────────────────────────────────────────────────────────
// Shared Field Schemas
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Any finite number (coordinates, offsets).
 */
export const CoordinateSchema = z.number().finite("expected a finite number");

/**
 * Sizes and widths that may be zero but never negative.
 */
export const LengthSchema = CoordinateSchema.nonnegative("must be at least 0");

/**
 * Font sizes and page dimensions.
 */
export const PositiveSchema = CoordinateSchema.positive("must be greater than 0");

/**
 * A string with at least one non-whitespace character.
 */
export const NonBlankSchema = z.string().refine(value => value.trim().length > 0, {
  message: "must not be blank",
});

/**
 * Page margins in points: `[top, right, bottom, left]`.
 */
export const MarginsSchema = z.tuple([LengthSchema, LengthSchema, LengthSchema, LengthSchema]);
export type Margins = z.infer<typeof MarginsSchema>;

/**
 * A single group transform.
 *
 * - translate: move by (dx, dy)
 * - rotate: counter-clockwise, in degrees
 * - scale: stretch by (sx, sy)
 */
export const TransformOpSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("translate"), dx: CoordinateSchema, dy: CoordinateSchema }),
  z.object({ type: z.literal("rotate"), degrees: CoordinateSchema }),
  z.object({ type: z.literal("scale"), sx: CoordinateSchema, sy: CoordinateSchema }),
]);
export type TransformOp = z.infer<typeof TransformOpSchema>;

/** Message attached to color refinements; the validator keys on it. */
export const COLOR_MESSAGE = "expected a named color or #RRGGBB";

/**
 * Color attribute accepted against a named-color table.
 */
export function colorSchema(colors: ColorTable = NAMED_COLORS) {
  return z.string().refine(value => Object.hasOwn(colors, value) || isHexColor(value), {
    message: COLOR_MESSAGE,
  });
}

// ─────────────────────────────────────────────────────────────────────────────
// Element Schemas
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Build the attribute schema of every element kind.
 *
 * @param colors - Named colors accepted by fill and stroke
 */
export function createElementSchemas(colors: ColorTable = NAMED_COLORS) {
  const color = colorSchema(colors);

  const rect = z.object({
    type: z.literal("rect"),
    x: CoordinateSchema,
    y: CoordinateSchema,
    width: LengthSchema,
    height: LengthSchema,
    fill: color.optional(),
    stroke: color.optional(),
    strokeWidth: LengthSchema.optional(),
  });

  const circle = z.object({
    type: z.literal("circle"),
    cx: CoordinateSchema,
    cy: CoordinateSchema,
    r: LengthSchema,
    fill: color.optional(),
    stroke: color.optional(),
    strokeWidth: LengthSchema.optional(),
  });

  const line = z.object({
    type: z.literal("line"),
    x1: CoordinateSchema,
    y1: CoordinateSchema,
    x2: CoordinateSchema,
    y2: CoordinateSchema,
    stroke: color.optional(),
    strokeWidth: LengthSchema.optional(),
  });

  const path = z.object({
    type: z.literal("path"),
    d: NonBlankSchema,
    fill: color.optional(),
    stroke: color.optional(),
    strokeWidth: LengthSchema.optional(),
  });

  const text = z.object({
    type: z.literal("text"),
    x: CoordinateSchema,
    y: CoordinateSchema,
    font: NonBlankSchema,
    size: PositiveSchema,
    fill: color.optional(),
    content: z.string(),
  });

  const image = z.object({
    type: z.literal("image"),
    x: CoordinateSchema,
    y: CoordinateSchema,
    width: LengthSchema,
    height: LengthSchema,
    src: NonBlankSchema,
  });

  const group = z.object({
    type: z.literal("group"),
    transforms: z.array(TransformOpSchema).optional(),
    children: z.array(z.unknown()),
  });

  const page = z.object({
    type: z.literal("page"),
    width: PositiveSchema.optional(),
    height: PositiveSchema.optional(),
    margins: MarginsSchema.optional(),
    children: z.array(z.unknown()),
  });

  const document = z.object({
    type: z.literal("document"),
    title: z.string().optional(),
    author: z.string().optional(),
    subject: z.string().optional(),
    keywords: z.string().optional(),
    creator: z.string().optional(),
    producer: z.string().optional(),
    width: PositiveSchema.optional(),
    height: PositiveSchema.optional(),
    margins: MarginsSchema.optional(),
    pages: z.array(z.unknown()),
  });

  return { rect, circle, line, path, text, image, group, page, document };
}

export type ElementSchemas = ReturnType<typeof createElementSchemas>;

/** Tag of every element kind. */
export type ElementType = keyof ElementSchemas;

/**
 * Validated attributes of one element kind. Container kinds still hold
 * their children unread.
 */
export type AttributesOf<K extends ElementType> = z.infer<ElementSchemas[K]>;
