/**
 * Web → PDF coordinate mapping.
 *
 * Element trees are written with the origin at the top-left and y growing
 * downward. PDF puts the origin at the bottom-left with y growing upward.
 */

import type { Element, Margins, TransformOp } from "#src/elements/types";

/**
 * Map a web y coordinate to PDF space.
 *
 * Margins are accepted but do not shift the result; they only set the
 * page's MediaBox origin.
 */
export function webToPdfY(y: number, pageHeight: number, _margins?: Margins): number {
  return pageHeight - y;
}

function mapTransform(op: TransformOp, pageHeight: number, margins?: Margins): TransformOp {
  if (op.type === "translate") {
    return { ...op, dy: webToPdfY(op.dy, pageHeight, margins) };
  }

  return op;
}

/**
 * Rewrite an element's coordinates into PDF space.
 *
 * - rect, image: anchored at their top-left, so `y' = H - y - height`
 * - circle, line, text: `y' = H - y` for every y
 * - path: unchanged, path data is taken as already in PDF space
 * - group: translate offsets are mapped, rotate and scale are not;
 *   children are mapped recursively
 * - page, document: unchanged
 *
 * Returns a new element; the input is not modified.
 */
export function mapElementCoordinates(element: Element, pageHeight: number, margins?: Margins): Element {
  switch (element.type) {
    case "rect":
    case "image":
      return { ...element, y: webToPdfY(element.y, pageHeight, margins) - element.height };
    case "circle":
      return { ...element, cy: webToPdfY(element.cy, pageHeight, margins) };
    case "line":
      return {
        ...element,
        y1: webToPdfY(element.y1, pageHeight, margins),
        y2: webToPdfY(element.y2, pageHeight, margins),
      };
    case "text":
      return { ...element, y: webToPdfY(element.y, pageHeight, margins) };
    case "group":
      return {
        ...element,
        ...(element.transforms
          ? { transforms: element.transforms.map(op => mapTransform(op, pageHeight, margins)) }
          : {}),
        children: element.children.map(child => mapElementCoordinates(child, pageHeight, margins)),
      };
    case "path":
    case "page":
    case "document":
      return element;
  }
}
