/**
 * Element reading and attribute validation.
 *
 * Reading an element tree happens in two layers: a structural check that
 * the node is a tagged object at all, then the attribute validator for its
 * kind. The validator is a collaborator; callers may pass their own as
 * long as it returns the attributes or throws.
 */

import type { z } from "zod";
import {
  AttributeValidationError,
  StructuralError,
  UnresolvableColorError,
  UnsupportedElementError,
} from "#src/errors";
import { type ColorTable, NAMED_COLORS } from "#src/helpers/colors";
import {
  type AttributesOf,
  COLOR_MESSAGE,
  createElementSchemas,
  type ElementType,
} from "./schemas";
import type { DocumentElement, Element, PageElement } from "./types";

/**
 * Checks the attributes of each element kind.
 *
 * Each entry returns the attributes when they are valid and throws
 * (normally an {@link AttributeValidationError}) when they are not.
 */
export type AttributeValidator = {
  readonly [K in ElementType]: (attributes: unknown) => AttributesOf<K>;
};

/**
 * A node that passed the structural check.
 */
export interface ElementNode {
  type: string;
  node: object;
}

/**
 * Create the default zod-backed validator.
 *
 * @param colors - Named colors accepted by fill and stroke
 */
export function createAttributeValidator(colors: ColorTable = NAMED_COLORS): AttributeValidator {
  const schemas = createElementSchemas(colors);

  return {
    rect: attributes => parseAttributes("rect", schemas.rect, attributes),
    circle: attributes => parseAttributes("circle", schemas.circle, attributes),
    line: attributes => parseAttributes("line", schemas.line, attributes),
    path: attributes => parseAttributes("path", schemas.path, attributes),
    text: attributes => parseAttributes("text", schemas.text, attributes),
    image: attributes => parseAttributes("image", schemas.image, attributes),
    group: attributes => parseAttributes("group", schemas.group, attributes),
    page: attributes => parseAttributes("page", schemas.page, attributes),
    document: attributes => parseAttributes("document", schemas.document, attributes),
  };
}

/**
 * Validate the attributes of one element kind.
 */
export function validateAttributes<K extends ElementType>(
  validator: AttributeValidator,
  kind: K,
  attributes: unknown,
): AttributesOf<K> {
  return validator[kind](attributes);
}

function parseAttributes<T>(
  kind: ElementType,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  attributes: unknown,
): T {
  const result = schema.safeParse(attributes);

  if (result.success) {
    return result.data;
  }

  const [issue] = result.error.issues;

  if (!issue) {
    throw new AttributeValidationError(kind, "attributes", "valid attributes", attributes);
  }

  throw toValidationError(kind, issue, attributes);
}

/**
 * Turn a zod issue into the error naming the offending field.
 */
function toValidationError(
  kind: ElementType,
  issue: z.ZodIssue,
  attributes: unknown,
): AttributeValidationError {
  const field = issue.path.length > 0 ? issue.path.join(".") : "attributes";
  const received = valueAtPath(attributes, issue.path);

  if (issue.code === "custom" && issue.message === COLOR_MESSAGE) {
    return new UnresolvableColorError(received, kind, field);
  }

  const expected = issue.code === "invalid_type" ? `expected ${issue.expected}` : issue.message;

  return new AttributeValidationError(kind, field, expected, received);
}

function valueAtPath(value: unknown, path: readonly (string | number)[]): unknown {
  let current = value;

  for (const key of path) {
    if (typeof current !== "object" || current === null) {
      return undefined;
    }

    current = Reflect.get(current, key);
  }

  return current;
}

/**
 * Check that a node is a tagged element object.
 *
 * @throws {StructuralError} for anything without a string `type`
 */
export function readNode(node: unknown): ElementNode {
  if (typeof node !== "object" || node === null || Array.isArray(node)) {
    throw new StructuralError(
      `Expected an element object, got ${Array.isArray(node) ? "array" : node === null ? "null" : typeof node}`,
    );
  }

  if (!("type" in node) || typeof node.type !== "string") {
    throw new StructuralError("Element is missing a string 'type' tag");
  }

  return { type: node.type, node };
}

/**
 * Read and validate an element tree.
 *
 * Children of groups, pages and documents are read recursively. The first
 * invalid node aborts the read.
 *
 * @throws {StructuralError} for malformed nodes
 * @throws {UnsupportedElementError} for unknown tags
 * @throws {AttributeValidationError} for invalid attributes
 */
export function readElement(node: unknown, validator: AttributeValidator): Element {
  const { type, node: attributes } = readNode(node);

  switch (type) {
    case "rect":
      return validator.rect(attributes);
    case "circle":
      return validator.circle(attributes);
    case "line":
      return validator.line(attributes);
    case "path":
      return validator.path(attributes);
    case "text":
      return validator.text(attributes);
    case "image":
      return validator.image(attributes);
    case "group": {
      const group = validator.group(attributes);

      return { ...group, children: group.children.map(child => readElement(child, validator)) };
    }
    case "page":
      return readPage(node, validator);
    case "document":
      return readDocument(node, validator);
    default:
      throw new UnsupportedElementError(type);
  }
}

/**
 * Read and validate a page element.
 *
 * @throws {StructuralError} if the node is some other element
 */
export function readPage(node: unknown, validator: AttributeValidator): PageElement {
  const { type, node: attributes } = readNode(node);

  if (type !== "page") {
    throw new StructuralError(`Expected a page element, got "${type}"`);
  }

  const page = validator.page(attributes);

  return { ...page, children: page.children.map(child => readElement(child, validator)) };
}

/**
 * Read and validate a document element with all of its pages.
 *
 * @throws {StructuralError} if the node is some other element
 */
export function readDocument(node: unknown, validator: AttributeValidator): DocumentElement {
  const { type, node: attributes } = readNode(node);

  if (type !== "document") {
    throw new StructuralError(`Expected a document element, got "${type}"`);
  }

  const document = validator.document(attributes);

  return { ...document, pages: document.pages.map(page => readPage(page, validator)) };
}
