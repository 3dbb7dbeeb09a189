/**
 * Document assembly: object numbering, page objects and the final file.
 *
 * Object numbers are assigned in a fixed order:
 *
 * 1. Catalog
 * 2. one Font per distinct font name, in order of first use
 * 3. one image XObject per embedded image, in order of first use
 * 4. one content stream per page
 * 5. one Page per page
 * 6. the Pages collection
 * 7. Info, only when some metadata field is set
 */

import {
  type FontAliasTable,
  FONT_ALIASES,
  resolveBaseFont,
  usesWinAnsiEncoding,
} from "#src/fonts/standard-14";
import { bytesToHex } from "#src/helpers/strings";
import type { ImagePixels, ResolvedImage } from "#src/images/image-registry";
import { PdfArray } from "#src/objects/pdf-array";
import { PdfDict } from "#src/objects/pdf-dict";
import { PdfName, unescapeName } from "#src/objects/pdf-name";
import { PdfNumber } from "#src/objects/pdf-number";
import type { PdfObject } from "#src/objects/pdf-object";
import { PdfRef } from "#src/objects/pdf-ref";
import { PdfStream } from "#src/objects/pdf-stream";
import { PdfString } from "#src/objects/pdf-string";
import { type IndirectObject, type WriteResult, writeComplete } from "#src/writer/pdf-writer";
import type { PageResult } from "./page-processor";

/**
 * Document metadata written to the Info dictionary.
 */
export interface DocumentInfo {
  title?: string;
  author?: string;
  subject?: string;
  keywords?: string;
  creator?: string;
  producer?: string;
}

export interface AssembleOptions {
  /** Font alias table (default: {@link FONT_ALIASES}) */
  fonts?: FontAliasTable;
  onWarning?: (message: string) => void;
}

/**
 * A finished file.
 */
export interface AssembledDocument extends WriteResult {
  /** The file as text; every byte is 7-bit ASCII */
  text: string;
}

// `/Name size Tf` on a line of its own. Tj operands never end a line
// with Tf, so text content cannot produce a false match.
const FONT_OPERATOR_PATTERN = /^\/(\S+)\s+[-+]?(?:\d+\.?\d*|\.\d+)\s+Tf$/gm;

const INFO_KEYS = [
  ["title", "Title"],
  ["author", "Author"],
  ["subject", "Subject"],
  ["keywords", "Keywords"],
  ["creator", "Creator"],
  ["producer", "Producer"],
] as const;

const decoder = new TextDecoder();

/**
 * Font names a content stream selects with `Tf`, unescaped, each once.
 *
 * @example
 * ```ts
 * collectFontNames("BT\n/Times#20New#20Roman 12 Tf\nET") // ["Times New Roman"]
 * ```
 */
export function collectFontNames(contentStream: string): string[] {
  const names = new Set<string>();

  for (const [, escaped] of contentStream.matchAll(FONT_OPERATOR_PATTERN)) {
    names.add(unescapeName(escaped));
  }

  return [...names];
}

/**
 * Build the Info dictionary, or nothing when no field is set.
 */
export function buildInfoDict(info: DocumentInfo): PdfDict | undefined {
  const dict = new PdfDict();

  for (const [key, name] of INFO_KEYS) {
    const value = info[key];

    if (value !== undefined) {
      dict.set(name, PdfString.fromText(value));
    }
  }

  return dict.size > 0 ? dict : undefined;
}

function buildFontDict(name: string, options: AssembleOptions): PdfDict {
  const baseFont = resolveBaseFont(name, options.fonts ?? FONT_ALIASES, options.onWarning);

  const font = PdfDict.of({
    Type: PdfName.Font,
    Subtype: PdfName.of("Type1"),
    BaseFont: PdfName.of(baseFont),
  });

  if (usesWinAnsiEncoding(baseFont)) {
    font.set("Encoding", PdfName.of("WinAnsiEncoding"));
  }

  return font;
}

/**
 * An image XObject with its samples hex-encoded, so the file stays text.
 */
function buildImageXObject(image: ResolvedImage, pixels: ImagePixels): PdfStream {
  const data = new TextEncoder().encode(`${bytesToHex(pixels.data)}>`);

  return new PdfStream(
    [
      ["Type", PdfName.XObject],
      ["Subtype", PdfName.of("Image")],
      ["Width", PdfNumber.of(image.naturalWidth)],
      ["Height", PdfNumber.of(image.naturalHeight)],
      ["ColorSpace", PdfName.of(pixels.colorSpace)],
      ["BitsPerComponent", PdfNumber.of(pixels.bitsPerComponent)],
      ["Filter", PdfName.of("ASCIIHexDecode")],
    ],
    data,
  );
}

function buildResourceDict(entries: ReadonlyMap<string, PdfRef>): PdfDict {
  const dict = new PdfDict();

  for (const [name, ref] of entries) {
    dict.set(name, ref);
  }

  return dict;
}

/**
 * The page's MediaBox: `[left bottom width height]`, with the origin
 * taken from the left and bottom margins.
 */
export function mediaBox(page: Pick<PageResult, "width" | "height" | "margins">): PdfArray {
  const [, , bottom, left] = page.margins;

  return PdfArray.of(
    PdfNumber.of(left),
    PdfNumber.of(bottom),
    PdfNumber.of(page.width),
    PdfNumber.of(page.height),
  );
}

/**
 * Assemble processed pages into a complete PDF 1.4 file.
 *
 * @throws {AssemblyInvariantError} if a written offset does not match its object
 */
export function assembleDocument(
  info: DocumentInfo,
  pages: readonly PageResult[],
  options: AssembleOptions = {},
): AssembledDocument {
  const pageFonts = pages.map(page => collectFontNames(page.contentStream));
  const fontNames = [...new Set(pageFonts.flat())];

  const embedded = new Map<string, { image: ResolvedImage; pixels: ImagePixels }>();

  for (const page of pages) {
    for (const image of page.images) {
      if (embedded.has(image.resourceName)) {
        continue;
      }

      if (image.pixels) {
        embedded.set(image.resourceName, { image, pixels: image.pixels });
      } else {
        options.onWarning?.(`Image ${image.resourceName} has no pixel data and is not embedded`);
      }
    }
  }

  let nextObjectNumber = 1;
  const allocate = () => PdfRef.of(nextObjectNumber++);

  const catalogRef = allocate();
  const fontRefs = new Map(fontNames.map(name => [name, allocate()] as const));
  const imageRefs = new Map([...embedded.keys()].map(name => [name, allocate()] as const));
  const contentRefs = pages.map(() => allocate());
  const pageRefs = pages.map(() => allocate());
  const pagesRef = allocate();
  const infoDict = buildInfoDict(info);
  const infoRef = infoDict ? allocate() : undefined;

  const objects: IndirectObject[] = [];
  const add = (ref: PdfRef, object: PdfObject) => objects.push({ ref, object });

  add(catalogRef, PdfDict.of({ Type: PdfName.Catalog, Pages: pagesRef }));

  for (const [name, ref] of fontRefs) {
    add(ref, buildFontDict(name, options));
  }

  for (const [name, ref] of imageRefs) {
    const entry = embedded.get(name);

    if (entry) {
      add(ref, buildImageXObject(entry.image, entry.pixels));
    }
  }

  pages.forEach((page, index) => {
    add(contentRefs[index], PdfStream.fromText(page.contentStream));
  });

  pages.forEach((page, index) => {
    const fonts = new Map<string, PdfRef>();
    const images = new Map<string, PdfRef>();

    for (const name of pageFonts[index]) {
      const ref = fontRefs.get(name);

      if (ref) {
        fonts.set(name, ref);
      }
    }

    for (const image of page.images) {
      const ref = imageRefs.get(image.resourceName);

      if (ref) {
        images.set(image.resourceName, ref);
      }
    }

    const resources = new PdfDict();

    if (fonts.size > 0) {
      resources.set(PdfName.Font, buildResourceDict(fonts));
    }

    if (images.size > 0) {
      resources.set(PdfName.XObject, buildResourceDict(images));
    }

    add(
      pageRefs[index],
      PdfDict.of({
        Type: PdfName.Page,
        Parent: pagesRef,
        MediaBox: mediaBox(page),
        Resources: resources,
        Contents: contentRefs[index],
      }),
    );
  });

  add(
    pagesRef,
    PdfDict.of({
      Type: PdfName.Pages,
      Kids: new PdfArray(pageRefs),
      Count: PdfNumber.of(pages.length),
    }),
  );

  if (infoRef && infoDict) {
    add(infoRef, infoDict);
  }

  const result = writeComplete(objects, { version: "1.4", root: catalogRef, info: infoRef });

  return { ...result, text: decoder.decode(result.bytes) };
}
