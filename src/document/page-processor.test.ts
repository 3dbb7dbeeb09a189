import { describe, expect, it } from "vitest";
import type { EmitContext } from "#src/content/operator-emitter";
import { createAttributeValidator } from "#src/elements/validator";
import { AttributeValidationError, StructuralError } from "#src/errors";
import { NAMED_COLORS } from "#src/helpers/colors";
import { ImageRegistry } from "#src/images/image-registry";
import { hasTransforms, type PageDefaults, processPage, resolvePageAttributes } from "./page-processor";

const defaults: PageDefaults = { width: 612, height: 792, margins: [72, 72, 72, 72] };

function createContext(): EmitContext {
  return {
    validator: createAttributeValidator(),
    images: new ImageRegistry().register("logo.png", { width: 10, height: 10 }),
    colors: NAMED_COLORS,
  };
}

describe("resolvePageAttributes", () => {
  it("inherits everything the page leaves out", () => {
    expect(resolvePageAttributes({ type: "page", children: [] }, defaults)).toEqual({
      width: 612,
      height: 792,
      margins: [72, 72, 72, 72],
    });
  });

  it("lets the page override single values", () => {
    expect(resolvePageAttributes({ type: "page", width: 842, children: [] }, defaults)).toEqual({
      width: 842,
      height: 792,
      margins: [72, 72, 72, 72],
    });
  });
});

describe("hasTransforms", () => {
  it("looks into nested groups", () => {
    expect(
      hasTransforms({
        type: "group",
        transforms: [],
        children: [{ type: "group", transforms: [{ type: "rotate", degrees: 5 }], children: [] }],
      }),
    ).toBe(true);
  });

  it("ignores empty transform lists and non-groups", () => {
    expect(hasTransforms({ type: "group", transforms: [], children: [] })).toBe(false);
    expect(hasTransforms({ type: "rect", x: 0, y: 0, width: 1, height: 1 })).toBe(false);
  });
});

describe("processPage", () => {
  it("maps and emits the page content", () => {
    const result = processPage(
      {
        type: "page",
        children: [{ type: "rect", x: 10, y: 20, width: 100, height: 50, fill: "#ff0000" }],
      },
      defaults,
      createContext(),
    );

    expect(result.contentStream).toBe("1 0 0 rg\n10 722 100 50 re\nf");
    expect(result.width).toBe(612);
    expect(result.height).toBe(792);
    expect(result.margins).toEqual([72, 72, 72, 72]);
  });

  it("maps against the page's own height", () => {
    const result = processPage(
      {
        type: "page",
        height: 500,
        children: [{ type: "rect", x: 0, y: 0, width: 10, height: 0 }],
      },
      defaults,
      createContext(),
    );

    expect(result.contentStream).toBe("0 500 10 0 re\nf");
  });

  it("joins top-level elements with newlines", () => {
    const result = processPage(
      {
        type: "page",
        children: [
          { type: "line", x1: 0, y1: 0, x2: 10, y2: 0 },
          { type: "circle", cx: 0, cy: 792, r: 0 },
        ],
      },
      defaults,
      createContext(),
    );

    expect(result.contentStream.split("\n")).toEqual([
      "0 0 0 RG",
      "0 792 m",
      "10 792 l",
      "S",
      "0 0 m",
      "0 0 0 0 0 0 c",
      "0 0 0 0 0 0 c",
      "0 0 0 0 0 0 c",
      "0 0 0 0 0 0 c",
      "f",
    ]);
  });

  it("writes an empty stream for an empty page", () => {
    const result = processPage({ type: "page", children: [] }, defaults, createContext());

    expect(result.contentStream).toBe("");
    expect(result.metadata).toEqual({ elementCount: 0, hasTransforms: false });
  });

  it("records element count and transforms", () => {
    const result = processPage(
      {
        type: "page",
        children: [
          { type: "rect", x: 0, y: 0, width: 1, height: 1 },
          {
            type: "group",
            transforms: [{ type: "translate", dx: 0, dy: 0 }],
            children: [{ type: "rect", x: 0, y: 0, width: 1, height: 1 }],
          },
        ],
      },
      defaults,
      createContext(),
    );

    expect(result.metadata).toEqual({ elementCount: 2, hasTransforms: true });
  });

  it("lists each drawn image once", () => {
    const image = { type: "image", x: 0, y: 0, width: 10, height: 10, src: "logo.png" };

    const result = processPage({ type: "page", children: [image, image] }, defaults, createContext());

    expect(result.images.map(resolved => resolved.resourceName)).toEqual(["Im1"]);
  });

  it("aborts on the first invalid element", () => {
    expect(() =>
      processPage(
        { type: "page", children: [{ type: "circle", cx: 0, cy: 0, r: -1 }] },
        defaults,
        createContext(),
      ),
    ).toThrow(AttributeValidationError);
  });

  it("rejects nodes that are not pages", () => {
    expect(() => processPage({ type: "group", children: [] }, defaults, createContext())).toThrow(
      StructuralError,
    );
  });
});
