/**
 * Public rendering entry points.
 *
 * `renderOperators` turns one element tree into content-stream operators.
 * `renderDocument` turns a document element into a complete PDF 1.4 file.
 * Both are synchronous and pure apart from the warning callback; the first
 * invalid element aborts the whole call and nothing is returned.
 */

import { emitOperators } from "#src/content/operator-emitter";
import {
  type AssembledDocument,
  assembleDocument,
  type DocumentInfo,
} from "#src/document/document-assembler";
import { processPageElement } from "#src/document/page-processor";
import type { DocumentElement, Element } from "#src/elements/types";
import { readDocument } from "#src/elements/validator";
import { type GenerationOptions, resolveOptions, toEmitContext } from "./options";

/**
 * Output of {@link renderDocumentWithWarnings}.
 */
export interface RenderResult {
  text: string;
  warnings: string[];
}

/**
 * Render one element tree to newline-separated content-stream operators.
 *
 * Coordinates are written as given, without any y-axis flip.
 *
 * @example
 * ```ts
 * renderOperators({ type: "rect", x: 10, y: 20, width: 100, height: 50, fill: "red" });
 * // "1 0 0 rg\n10 20 100 50 re\nf"
 * ```
 *
 * @throws {PdfGenerationError} for malformed, unknown or invalid elements
 */
export function renderOperators(element: Element, options?: GenerationOptions): string {
  return emitOperators(element, toEmitContext(resolveOptions(options)));
}

/**
 * Render a document element to a PDF file.
 *
 * Pages without width, height or margins inherit them from the document,
 * which in turn falls back to `options.defaults`.
 *
 * @throws {PdfGenerationError} for the first invalid element in any page
 * @throws {AssemblyInvariantError} if a written offset does not match its object
 */
export function renderDocument(document: DocumentElement, options?: GenerationOptions): string {
  return generate(document, options).text;
}

/**
 * Render a document element to the bytes of a PDF file.
 */
export function renderDocumentBytes(
  document: DocumentElement,
  options?: GenerationOptions,
): Uint8Array {
  return generate(document, options).bytes;
}

/**
 * Render a document and collect warnings instead of reporting them one by
 * one. A caller's `onWarning` still sees each warning as it is raised.
 */
export function renderDocumentWithWarnings(
  document: DocumentElement,
  options: GenerationOptions = {},
): RenderResult {
  const warnings: string[] = [];

  const { text } = generate(document, {
    ...options,
    onWarning: message => {
      warnings.push(message);
      options.onWarning?.(message);
    },
  });

  return { text, warnings };
}

function generate(node: DocumentElement, options?: GenerationOptions): AssembledDocument {
  const resolved = resolveOptions(options);
  const document = readDocument(node, resolved.validator);
  const context = toEmitContext(resolved);

  const defaults = {
    width: document.width ?? resolved.page.width,
    height: document.height ?? resolved.page.height,
    margins: document.margins ?? resolved.page.margins,
  };

  const pages = document.pages.map(page => processPageElement(page, defaults, context));

  const info: DocumentInfo = {
    title: document.title,
    author: document.author,
    subject: document.subject,
    keywords: document.keywords,
    creator: document.creator ?? resolved.creator,
    producer: document.producer ?? resolved.producer,
  };

  return assembleDocument(info, pages, { fonts: resolved.fonts, onWarning: resolved.onWarning });
}
