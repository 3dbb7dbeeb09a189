import { describe, expect, it } from "vitest";
import { UnresolvableColorError } from "#src/errors";
import { colorOperands, colorToArray, colorToHex, NAMED_COLORS, parseColor, rgb } from "./colors";

describe("rgb", () => {
  it("creates RGB color object", () => {
    const color = rgb(0.5, 0.3, 0.8);

    expect(color.type).toBe("RGB");
    expect(color.red).toBe(0.5);
    expect(color.green).toBe(0.3);
    expect(color.blue).toBe(0.8);
  });
});

describe("parseColor", () => {
  it("resolves every named color", () => {
    expect(parseColor("red")).toEqual(rgb(1, 0, 0));
    expect(parseColor("green")).toEqual(rgb(0, 1, 0));
    expect(parseColor("blue")).toEqual(rgb(0, 0, 1));
    expect(parseColor("black")).toEqual(rgb(0, 0, 0));
    expect(parseColor("white")).toEqual(rgb(1, 1, 1));
    expect(parseColor("yellow")).toEqual(rgb(1, 1, 0));
    expect(parseColor("cyan")).toEqual(rgb(0, 1, 1));
    expect(parseColor("magenta")).toEqual(rgb(1, 0, 1));
  });

  it("decodes hex channels pairwise", () => {
    expect(parseColor("#ff0000")).toEqual(rgb(1, 0, 0));
    expect(parseColor("#00FF00")).toEqual(rgb(0, 1, 0));
  });

  it("keeps full precision", () => {
    const color = parseColor("#808080");

    expect(color.red).toBe(128 / 255);
    expect(colorOperands(color)).toBe("0.5019607843137255 0.5019607843137255 0.5019607843137255");
  });

  it("rejects malformed hex", () => {
    expect(() => parseColor("#fff")).toThrow(UnresolvableColorError);
    expect(() => parseColor("#gg0000")).toThrow(UnresolvableColorError);
    expect(() => parseColor("ff0000")).toThrow(UnresolvableColorError);
  });

  it("rejects unknown names instead of defaulting to black", () => {
    expect(() => parseColor("purple")).toThrow(UnresolvableColorError);
  });

  it("rejects non-strings", () => {
    expect(() => parseColor(42)).toThrow(UnresolvableColorError);
  });

  it("does not treat prototype keys as names", () => {
    expect(() => parseColor("toString")).toThrow(UnresolvableColorError);
  });

  it("uses a caller-supplied table", () => {
    const names = { ...NAMED_COLORS, orange: rgb(1, 0.5, 0) };

    expect(parseColor("orange", names)).toEqual(rgb(1, 0.5, 0));
    expect(() => parseColor("orange")).toThrow(UnresolvableColorError);
  });
});

describe("colorToHex", () => {
  it("writes lowercase six-digit hex", () => {
    expect(colorToHex(rgb(1, 0, 0))).toBe("#ff0000");
    expect(colorToHex(rgb(0, 0, 0))).toBe("#000000");
  });

  it("round-trips through parseColor", () => {
    for (const value of ["#808080", "#123abc", "cyan", "#FFFFFF", "#010203"]) {
      const resolved = parseColor(value);

      expect(parseColor(colorToHex(resolved))).toEqual(resolved);
    }
  });
});

describe("colorToArray", () => {
  it("converts RGB to array", () => {
    expect(colorToArray(rgb(1, 0.5, 0))).toEqual([1, 0.5, 0]);
  });
});

describe("colorOperands", () => {
  it("writes integers without decimal point", () => {
    expect(colorOperands(parseColor("#ff0000"))).toBe("1 0 0");
  });
});
