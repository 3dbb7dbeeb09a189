import { describe, expect, it } from "vitest";
import { serializeObjectText } from "#src/test-utils";
import { PdfDict } from "./pdf-dict";
import { PdfName } from "./pdf-name";
import { PdfNumber } from "./pdf-number";
import { PdfRef } from "./pdf-ref";

describe("PdfDict", () => {
  it("writes one entry per line in insertion order", () => {
    const dict = PdfDict.of({
      Type: PdfName.Catalog,
      Pages: PdfRef.of(2),
    });

    expect(serializeObjectText(dict)).toBe("<<\n/Type /Catalog\n/Pages 2 0 R\n>>");
  });

  it("writes an empty dict", () => {
    expect(serializeObjectText(new PdfDict())).toBe("<<\n>>");
  });

  it("matches other names by value", () => {
    const dict = new PdfDict();

    dict.set("Fancy Font", PdfNumber.of(1));
    dict.set(PdfName.of("Fancy Font"), PdfNumber.of(2));

    expect(dict.size).toBe(1);
    expect(dict.get(PdfName.of("Fancy Font"))).toEqual(PdfNumber.of(2));
    expect(serializeObjectText(dict)).toBe("<<\n/Fancy#20Font 2\n>>");
  });

  it("accepts string and PdfName keys interchangeably", () => {
    const dict = new PdfDict();

    dict.set("Count", PdfNumber.of(1));
    dict.set(PdfName.Count, PdfNumber.of(2));

    expect(dict.size).toBe(1);
    expect(dict.has("Count")).toBe(true);
    expect(dict.get(PdfName.Count)).toEqual(PdfNumber.of(2));
  });

  it("nests dictionaries", () => {
    const dict = PdfDict.of({
      Font: PdfDict.of({ F1: PdfRef.of(2) }),
    });

    expect(serializeObjectText(dict)).toBe("<<\n/Font <<\n/F1 2 0 R\n>>\n>>");
  });
});
