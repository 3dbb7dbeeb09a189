/**
 * Error classes for element rendering and document assembly.
 *
 * Everything the library throws extends PdfGenerationError. Input problems
 * surface at the element or attribute where they are found and abort the
 * whole call; there is no partial output.
 *
 * - StructuralError: the node is not an element at all
 * - UnsupportedElementError: the tag is unknown or has no operators
 * - AttributeValidationError: a field is missing, mistyped or out of range
 * - UnresolvableColorError: a color is neither a known name nor #RRGGBB
 * - AssemblyInvariantError: internal, offsets disagree with the written bytes
 */

/**
 * Base class for all errors raised while generating PDF output.
 */
export class PdfGenerationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PdfGenerationError";
  }
}

/**
 * Error when a node is not a well-formed element.
 *
 * Thrown for non-object nodes, nodes without a string `type`, and
 * child lists that are not arrays.
 */
export class StructuralError extends PdfGenerationError {
  constructor(message: string) {
    super(message);
    this.name = "StructuralError";
  }
}

/**
 * Error when an element tag is not recognized or cannot be rendered
 * in the position it appears.
 */
export class UnsupportedElementError extends PdfGenerationError {
  constructor(readonly elementType: string) {
    super(`Element type "${elementType}" not yet implemented`);
    this.name = "UnsupportedElementError";
  }
}

/**
 * Error when an element attribute fails validation.
 */
export class AttributeValidationError extends PdfGenerationError {
  constructor(
    readonly elementType: string,
    readonly field: string,
    readonly expected: string,
    readonly received: unknown,
  ) {
    super(
      `Invalid attribute '${field}' in ${elementType} element: ${expected}. Got: ${describeValue(received)}`,
    );
    this.name = "AttributeValidationError";
  }
}

/**
 * Error when a color value cannot be resolved to RGB.
 *
 * Raised directly by the color resolver (field "color"), and by the
 * emitter for fill/stroke attributes that slipped past a custom validator.
 */
export class UnresolvableColorError extends AttributeValidationError {
  constructor(
    readonly value: unknown,
    elementType = "color",
    field = "color",
  ) {
    super(elementType, field, "expected a named color or #RRGGBB", value);
    this.name = "UnresolvableColorError";
  }
}

/**
 * Internal error when a recorded byte offset does not point at the object
 * it was recorded for. Indicates a bug in the writer, never bad input.
 */
export class AssemblyInvariantError extends PdfGenerationError {
  constructor(
    readonly objectNumber: number,
    readonly offset: number,
  ) {
    super(`Object ${objectNumber} not found at recorded offset ${offset}`);
    this.name = "AssemblyInvariantError";
  }
}

function describeValue(value: unknown): string {
  if (value === undefined) {
    return "undefined";
  }

  if (typeof value === "string") {
    return JSON.stringify(value);
  }

  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
