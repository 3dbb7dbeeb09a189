/**
 * Page processing: inheritance, coordinate mapping and emission.
 */

import { emitElement, type EmitContext } from "#src/content/operator-emitter";
import type { Element, Margins, PageElement } from "#src/elements/types";
import { readPage } from "#src/elements/validator";
import type { ResolvedImage } from "#src/images/image-registry";
import { mapElementCoordinates } from "./coordinates";

/**
 * Page attributes a document hands down to its pages.
 */
export interface PageDefaults {
  width: number;
  height: number;
  margins: Margins;
}

export interface PageMetadata {
  /** Number of top-level elements on the page */
  elementCount: number;
  /** Whether any group on the page carries transforms */
  hasTransforms: boolean;
}

/**
 * A processed page, ready for the document assembler.
 */
export interface PageResult {
  width: number;
  height: number;
  margins: Margins;
  /** Operators of every top-level element, newline-separated */
  contentStream: string;
  /** Images drawn on the page, each once, in order of first use */
  images: ResolvedImage[];
  metadata: PageMetadata;
}

/**
 * Merge a page's attributes over the document defaults. Values on the
 * page win.
 */
export function resolvePageAttributes(page: PageElement, defaults: PageDefaults): PageDefaults {
  return {
    width: page.width ?? defaults.width,
    height: page.height ?? defaults.height,
    margins: page.margins ?? defaults.margins,
  };
}

/**
 * Whether an element tree contains a group with at least one transform.
 */
export function hasTransforms(element: Element): boolean {
  if (element.type !== "group") {
    return false;
  }

  return (element.transforms?.length ?? 0) > 0 || element.children.some(hasTransforms);
}

/**
 * Process one page: validate it, resolve its size, map coordinates and
 * emit a content stream.
 *
 * @throws {PdfGenerationError} for the first invalid element on the page
 */
export function processPage(page: unknown, defaults: PageDefaults, context: EmitContext): PageResult {
  return processPageElement(readPage(page, context.validator), defaults, context);
}

/**
 * Process a page that has already been read and validated.
 */
export function processPageElement(
  element: PageElement,
  defaults: PageDefaults,
  context: EmitContext,
): PageResult {
  const { width, height, margins } = resolvePageAttributes(element, defaults);

  const images = new Map<string, ResolvedImage>();
  const pageContext: EmitContext = {
    ...context,
    onImage: image => {
      if (!images.has(image.resourceName)) {
        images.set(image.resourceName, image);
      }

      context.onImage?.(image);
    },
  };

  const streams = element.children.map(child =>
    emitElement(mapElementCoordinates(child, height, margins), pageContext).join("\n"),
  );

  return {
    width,
    height,
    margins,
    contentStream: streams.join("\n"),
    images: [...images.values()],
    metadata: {
      elementCount: element.children.length,
      hasTransforms: element.children.some(hasTransforms),
    },
  };
}
