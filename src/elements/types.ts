/**
 * Element tree types.
 *
 * An element is a plain object tagged by `type`. Leaf kinds are exactly
 * their validated attributes; container kinds hold child elements.
 */

import type { AttributesOf, ElementType } from "./schemas";

export type { ElementType, Margins, TransformOp } from "./schemas";

export type RectElement = AttributesOf<"rect">;
export type CircleElement = AttributesOf<"circle">;
export type LineElement = AttributesOf<"line">;
export type PathElement = AttributesOf<"path">;
export type TextElement = AttributesOf<"text">;
export type ImageElement = AttributesOf<"image">;

export type GroupElement = Omit<AttributesOf<"group">, "children"> & {
  children: Element[];
};

export type PageElement = Omit<AttributesOf<"page">, "children"> & {
  children: Element[];
};

export type DocumentElement = Omit<AttributesOf<"document">, "pages"> & {
  pages: PageElement[];
};

/**
 * Any element.
 */
export type Element =
  | RectElement
  | CircleElement
  | LineElement
  | PathElement
  | TextElement
  | ImageElement
  | GroupElement
  | PageElement
  | DocumentElement;

/**
 * Elements that draw with fill and stroke.
 */
export type ShapeElement = RectElement | CircleElement | PathElement;

/**
 * The element of a given kind.
 */
export type ElementOf<K extends ElementType> = Extract<Element, { type: K }>;
