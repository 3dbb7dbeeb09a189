import { describe, expect, it } from "vitest";
import { PAGE_SIZES, resolvePageSize } from "./page-size";

describe("resolvePageSize", () => {
  it("defaults to letter portrait", () => {
    expect(resolvePageSize({})).toEqual({ width: 612, height: 792 });
  });

  it("resolves presets", () => {
    expect(resolvePageSize({ size: "a4" })).toEqual({ width: 595, height: 842 });
    expect(resolvePageSize({ size: "legal" })).toEqual({ width: 612, height: 1008 });
  });

  it("swaps dimensions for landscape", () => {
    expect(resolvePageSize({ size: "letter", orientation: "landscape" })).toEqual({
      width: 792,
      height: 612,
    });
  });

  it("prefers explicit dimensions", () => {
    expect(resolvePageSize({ size: "a4", width: 400, height: 600 })).toEqual({
      width: 400,
      height: 600,
    });
  });

  it("overrides a single dimension", () => {
    expect(resolvePageSize({ width: 400 })).toEqual({ width: 400, height: PAGE_SIZES.letter.height });
    expect(resolvePageSize({ size: "a4", orientation: "landscape", height: 500 })).toEqual({
      width: 842,
      height: 500,
    });
  });
});
