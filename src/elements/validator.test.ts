import { describe, expect, it } from "vitest";
import {
  AttributeValidationError,
  StructuralError,
  UnresolvableColorError,
  UnsupportedElementError,
} from "#src/errors";
import { NAMED_COLORS, rgb } from "#src/helpers/colors";
import {
  createAttributeValidator,
  readDocument,
  readElement,
  readNode,
  readPage,
  validateAttributes,
} from "./validator";

const validator = createAttributeValidator();

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }

  throw new Error("Expected function to throw");
}

describe("readNode", () => {
  it("rejects non-objects", () => {
    expect(() => readNode(42)).toThrow(StructuralError);
    expect(() => readNode(42)).toThrow("Expected an element object, got number");
    expect(() => readNode(null)).toThrow("Expected an element object, got null");
    expect(() => readNode([])).toThrow("Expected an element object, got array");
  });

  it("rejects nodes without a string type", () => {
    expect(() => readNode({ x: 1 })).toThrow("Element is missing a string 'type' tag");
    expect(() => readNode({ type: 3 })).toThrow(StructuralError);
  });

  it("returns the tag", () => {
    expect(readNode({ type: "rect" }).type).toBe("rect");
  });
});

describe("readElement", () => {
  it("returns valid attributes", () => {
    const rect = readElement(
      { type: "rect", x: 10, y: 20, width: 100, height: 50, fill: "#ff0000" },
      validator,
    );

    expect(rect).toEqual({ type: "rect", x: 10, y: 20, width: 100, height: 50, fill: "#ff0000" });
  });

  it("drops attributes the kind does not know", () => {
    const line = readElement({ type: "line", x1: 0, y1: 0, x2: 5, y2: 5, color: "red" }, validator);

    expect(line).toEqual({ type: "line", x1: 0, y1: 0, x2: 5, y2: 5 });
  });

  it("rejects unknown tags", () => {
    const error = catchError(() => readElement({ type: "ellipse" }, validator));

    expect(error).toBeInstanceOf(UnsupportedElementError);
    expect(error).toHaveProperty("message", 'Element type "ellipse" not yet implemented');
  });

  it("reports a missing field", () => {
    expect(() => readElement({ type: "rect", x: 0, y: 0, width: 10 }, validator)).toThrow(
      "Invalid attribute 'height' in rect element: expected number. Got: undefined",
    );
  });

  it("reports a negative radius", () => {
    const error = catchError(() => readElement({ type: "circle", cx: 0, cy: 0, r: -5 }, validator));

    expect(error).toBeInstanceOf(AttributeValidationError);
    expect(error).toHaveProperty("field", "r");
    expect(error).toHaveProperty("received", -5);
    expect(error).toHaveProperty(
      "message",
      "Invalid attribute 'r' in circle element: must be at least 0. Got: -5",
    );
  });

  it("reports a wrong type", () => {
    expect(() =>
      readElement({ type: "text", x: "10", y: 0, font: "Arial", size: 12, content: "" }, validator),
    ).toThrow(`Invalid attribute 'x' in text element: expected number. Got: "10"`);
  });

  it("reports a non-positive font size", () => {
    expect(() =>
      readElement({ type: "text", x: 0, y: 0, font: "Arial", size: 0, content: "" }, validator),
    ).toThrow("Invalid attribute 'size' in text element: must be greater than 0. Got: 0");
  });

  it("reports blank path data", () => {
    expect(() => readElement({ type: "path", d: "  " }, validator)).toThrow(
      `Invalid attribute 'd' in path element: must not be blank. Got: "  "`,
    );
  });

  it("reports unresolvable colors", () => {
    const error = catchError(() =>
      readElement({ type: "rect", x: 0, y: 0, width: 1, height: 1, stroke: "#12345" }, validator),
    );

    expect(error).toBeInstanceOf(UnresolvableColorError);
    expect(error).toHaveProperty("field", "stroke");
    expect(error).toHaveProperty(
      "message",
      `Invalid attribute 'stroke' in rect element: expected a named color or #RRGGBB. Got: "#12345"`,
    );
  });

  it("accepts colors from a custom table", () => {
    const custom = createAttributeValidator({ ...NAMED_COLORS, orange: rgb(1, 0.5, 0) });
    const node = { type: "circle", cx: 0, cy: 0, r: 1, fill: "orange" };

    expect(readElement(node, custom)).toEqual(node);
    expect(() => readElement(node, validator)).toThrow(UnresolvableColorError);
  });

  it("reads group children", () => {
    const group = readElement(
      {
        type: "group",
        transforms: [{ type: "translate", dx: 5, dy: 5 }],
        children: [{ type: "line", x1: 0, y1: 0, x2: 1, y2: 1 }],
      },
      validator,
    );

    expect(group).toEqual({
      type: "group",
      transforms: [{ type: "translate", dx: 5, dy: 5 }],
      children: [{ type: "line", x1: 0, y1: 0, x2: 1, y2: 1 }],
    });
  });

  it("reports errors in nested children", () => {
    const node = {
      type: "group",
      children: [{ type: "group", children: [{ type: "circle", cx: 0, cy: 0 }] }],
    };

    expect(() => readElement(node, validator)).toThrow(
      "Invalid attribute 'r' in circle element: expected number. Got: undefined",
    );
  });

  it("reports unknown transforms by path", () => {
    const error = catchError(() =>
      readElement({ type: "group", transforms: [{ type: "skew" }], children: [] }, validator),
    );

    expect(error).toBeInstanceOf(AttributeValidationError);
    expect(error).toHaveProperty("field", "transforms.0.type");
    expect(error).toHaveProperty("received", "skew");
  });

  it("requires document pages to be pages", () => {
    const node = { type: "document", pages: [{ type: "rect", x: 0, y: 0, width: 1, height: 1 }] };

    expect(() => readElement(node, validator)).toThrow('Expected a page element, got "rect"');
  });
});

describe("readPage", () => {
  it("reads children and keeps page attributes", () => {
    const page = readPage(
      { type: "page", width: 842, margins: [72, 72, 72, 72], children: [] },
      validator,
    );

    expect(page).toEqual({ type: "page", width: 842, margins: [72, 72, 72, 72], children: [] });
  });

  it("rejects margins of the wrong shape", () => {
    expect(() => readPage({ type: "page", margins: [1, 2], children: [] }, validator)).toThrow(
      AttributeValidationError,
    );
  });
});

describe("validateAttributes", () => {
  it("validates one kind", () => {
    const attributes = validateAttributes(validator, "image", {
      type: "image",
      x: 0,
      y: 0,
      width: 20,
      height: 10,
      src: "logo.png",
    });

    expect(attributes.src).toBe("logo.png");
  });
});

describe("readDocument", () => {
  it("reads every page", () => {
    const document = readDocument(
      { type: "document", title: "Report", pages: [{ type: "page", children: [] }] },
      validator,
    );

    expect(document).toEqual({
      type: "document",
      title: "Report",
      pages: [{ type: "page", children: [] }],
    });
  });

  it("rejects other elements", () => {
    expect(() => readDocument({ type: "page", children: [] }, validator)).toThrow(
      'Expected a document element, got "page"',
    );
  });
});
