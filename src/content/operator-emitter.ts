/**
 * Element → content-stream operators.
 *
 * Emits newline-separated operators for one element tree. Coordinates
 * are written as given; mapping web coordinates to PDF space happens
 * before this, in the page processor.
 */

import type { AttributeValidator } from "#src/elements/validator";
import { readElement } from "#src/elements/validator";
import type {
  CircleElement,
  Element,
  GroupElement,
  ImageElement,
  LineElement,
  PathElement,
  RectElement,
  ShapeElement,
  TextElement,
} from "#src/elements/types";
import { UnresolvableColorError, UnsupportedElementError } from "#src/errors";
import { type ColorTable, colorOperands, parseColor, type RGB } from "#src/helpers/colors";
import { formatOperand, formatOperation } from "#src/helpers/format";
import type { ImageResolver, ResolvedImage } from "#src/images/image-registry";
import { PdfName } from "#src/objects/pdf-name";
import { pathDataToOperators } from "./path-data";
import { encodeTextOperand } from "./text";
import { transformToOperator } from "./transforms";

/**
 * Control-point offset of a quarter-circle Bézier arc, per unit radius.
 */
export const CIRCLE_BEZIER_FACTOR = 0.552284749831;

/**
 * Collaborators and tables the emitter works with.
 */
export interface EmitContext {
  validator: AttributeValidator;
  images: ImageResolver;
  colors: ColorTable;
  onWarning?: (message: string) => void;
  /** Called for every image drawn */
  onImage?: (image: ResolvedImage) => void;
}

/**
 * Paint operator for a shape: `B` for fill and stroke, `S` for stroke
 * only, otherwise `f`. An unstyled shape is filled with whatever fill
 * color is current.
 */
export function paintOperator(hasFill: boolean, hasStroke: boolean): "B" | "f" | "S" {
  if (hasFill && hasStroke) {
    return "B";
  }

  return hasStroke && !hasFill ? "S" : "f";
}

/**
 * Validate an element tree and emit its operators.
 *
 * @throws {StructuralError} for malformed nodes
 * @throws {UnsupportedElementError} for unknown tags, pages and documents
 * @throws {AttributeValidationError} for invalid attributes
 */
export function emitOperators(node: unknown, context: EmitContext): string {
  return emitElement(readElement(node, context.validator), context).join("\n");
}

/**
 * Emit the operator lines of an already validated element.
 */
export function emitElement(element: Element, context: EmitContext): string[] {
  switch (element.type) {
    case "rect":
      return emitRect(element, context);
    case "circle":
      return emitCircle(element, context);
    case "line":
      return emitLine(element, context);
    case "path":
      return emitPath(element, context);
    case "text":
      return emitText(element, context);
    case "image":
      return emitImage(element, context);
    case "group":
      return emitGroup(element, context);
    case "page":
    case "document":
      throw new UnsupportedElementError(element.type);
  }
}

function resolveColor(
  value: string,
  element: Element,
  field: string,
  colors: ColorTable,
): RGB {
  try {
    return parseColor(value, colors);
  } catch (error) {
    if (error instanceof UnresolvableColorError) {
      throw new UnresolvableColorError(value, element.type, field);
    }

    throw error;
  }
}

function shapeOperators(element: ShapeElement, path: string[], context: EmitContext): string[] {
  const operators: string[] = [];

  if (element.strokeWidth !== undefined) {
    operators.push(formatOperation([element.strokeWidth], "w"));
  }

  if (element.fill !== undefined) {
    const color = resolveColor(element.fill, element, "fill", context.colors);

    operators.push(`${colorOperands(color)} rg`);
  }

  if (element.stroke !== undefined) {
    const color = resolveColor(element.stroke, element, "stroke", context.colors);

    operators.push(`${colorOperands(color)} RG`);
  }

  for (const operator of path) {
    operators.push(operator);
  }

  operators.push(paintOperator(element.fill !== undefined, element.stroke !== undefined));

  return operators;
}

function emitRect(rect: RectElement, context: EmitContext): string[] {
  const path = formatOperation([rect.x, rect.y, rect.width, rect.height], "re");

  return shapeOperators(rect, [path], context);
}

/**
 * Four Bézier arcs starting at the top: top → right → bottom → left → top.
 */
function emitCircle(circle: CircleElement, context: EmitContext): string[] {
  const { cx, cy, r } = circle;
  const k = r * CIRCLE_BEZIER_FACTOR;

  const path = [
    formatOperation([cx, cy + r], "m"),
    formatOperation([cx + k, cy + r, cx + r, cy + k, cx + r, cy], "c"),
    formatOperation([cx + r, cy - k, cx + k, cy - r, cx, cy - r], "c"),
    formatOperation([cx - k, cy - r, cx - r, cy - k, cx - r, cy], "c"),
    formatOperation([cx - r, cy + k, cx - k, cy + r, cx, cy + r], "c"),
  ];

  return shapeOperators(circle, path, context);
}

function emitPath(path: PathElement, context: EmitContext): string[] {
  return shapeOperators(path, pathDataToOperators(path.d, context.onWarning), context);
}

/**
 * Lines are always stroked, in black unless a stroke color is given.
 */
function emitLine(line: LineElement, context: EmitContext): string[] {
  const operators: string[] = [];

  if (line.strokeWidth !== undefined) {
    operators.push(formatOperation([line.strokeWidth], "w"));
  }

  const stroke =
    line.stroke === undefined ? "0 0 0" : colorOperands(resolveColor(line.stroke, line, "stroke", context.colors));

  operators.push(
    `${stroke} RG`,
    formatOperation([line.x1, line.y1], "m"),
    formatOperation([line.x2, line.y2], "l"),
    "S",
  );

  return operators;
}

/**
 * Text is filled in black unless a fill color is given. The font is
 * referenced by its own name; the document maps it to a standard font.
 */
function emitText(text: TextElement, context: EmitContext): string[] {
  const fill =
    text.fill === undefined ? "0 0 0" : colorOperands(resolveColor(text.fill, text, "fill", context.colors));

  return [
    "BT",
    `${fill} rg`,
    `${PdfName.of(text.font).toString()} ${formatOperand(text.size)} Tf`,
    formatOperation([text.x, text.y], "Td"),
    `${encodeTextOperand(text.content, context.onWarning)} Tj`,
    "ET",
  ];
}

/**
 * Images are drawn into the unit square, so the natural size is applied
 * first and then scaled to the requested box.
 */
function emitImage(image: ImageElement, context: EmitContext): string[] {
  const resolved = context.images.resolve(image.src);

  context.onImage?.(resolved);

  const scaleX = image.width / resolved.naturalWidth;
  const scaleY = image.height / resolved.naturalHeight;

  return [
    "q",
    formatOperation([scaleX, 0, 0, scaleY, image.x, image.y], "cm"),
    formatOperation([resolved.naturalWidth, 0, 0, resolved.naturalHeight, 0, 0], "cm"),
    `${PdfName.of(resolved.resourceName).toString()} Do`,
    "Q",
  ];
}

function emitGroup(group: GroupElement, context: EmitContext): string[] {
  const operators = ["q"];

  for (const transform of group.transforms ?? []) {
    operators.push(transformToOperator(transform));
  }

  for (const child of group.children) {
    for (const operator of emitElement(child, context)) {
      operators.push(operator);
    }
  }

  operators.push("Q");

  return operators;
}
