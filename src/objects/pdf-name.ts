import { CHAR_HASH, DELIMITERS, PRINTABLE_MAX, PRINTABLE_MIN, WHITESPACE } from "#src/helpers/chars";
import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfPrimitive } from "./pdf-primitive";

// Characters that need hex escaping in names (PDF 1.7 spec 7.3.5):
// whitespace, delimiters and # itself, plus anything outside printable ASCII
const NAME_NEEDS_ESCAPE = new Set([...WHITESPACE, ...DELIMITERS, CHAR_HASH]);

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/**
 * Escape a PDF name for serialization (without the leading slash).
 *
 * @example
 * ```ts
 * escapeName("Times New Roman") // "Times#20New#20Roman"
 * ```
 */
export function escapeName(name: string): string {
  let result = "";

  for (const byte of encoder.encode(name)) {
    if (byte < PRINTABLE_MIN || byte > PRINTABLE_MAX || NAME_NEEDS_ESCAPE.has(byte)) {
      result += `#${byte.toString(16).toUpperCase().padStart(2, "0")}`;
    } else {
      result += String.fromCharCode(byte);
    }
  }

  return result;
}

/**
 * Reverse {@link escapeName}: decode `#XX` sequences back to the name.
 */
export function unescapeName(escaped: string): string {
  const bytes: number[] = [];

  for (let i = 0; i < escaped.length; i++) {
    const hex = escaped.slice(i + 1, i + 3);

    if (escaped[i] === "#" && /^[0-9A-Fa-f]{2}$/.test(hex)) {
      bytes.push(Number.parseInt(hex, 16));
      i += 2;
    } else {
      bytes.push(escaped.charCodeAt(i));
    }
  }

  return decoder.decode(new Uint8Array(bytes));
}

/**
 * PDF name object.
 *
 * In PDF: `/Type`, `/Page`, `/Length`
 *
 * The structural names below are shared instances:
 * `PdfName.of("Type") === PdfName.Type`. Other names, such as font and
 * image resource names taken from elements, get a fresh instance each
 * time; compare them by `value`.
 */
export class PdfName implements PdfPrimitive {
  get type(): "name" {
    return "name";
  }

  private static common = new Map<string, PdfName>();

  private constructor(readonly value: string) {}

  private static intern(name: string): PdfName {
    const interned = new PdfName(name);

    PdfName.common.set(name, interned);

    return interned;
  }

  /**
   * Get a PdfName for the given string.
   * The leading `/` should NOT be included.
   */
  static of(name: string): PdfName {
    return PdfName.common.get(name) ?? new PdfName(name);
  }

  /**
   * The name as written in content streams and dictionaries: `/Times#20Roman`.
   */
  toString(): string {
    return `/${escapeName(this.value)}`;
  }

  toBytes(writer: ByteWriter): void {
    writer.writeAscii(this.toString());
  }

  // Common PDF names
  static readonly Type = PdfName.intern("Type");
  static readonly Page = PdfName.intern("Page");
  static readonly Pages = PdfName.intern("Pages");
  static readonly Catalog = PdfName.intern("Catalog");
  static readonly Count = PdfName.intern("Count");
  static readonly Kids = PdfName.intern("Kids");
  static readonly Parent = PdfName.intern("Parent");
  static readonly MediaBox = PdfName.intern("MediaBox");
  static readonly Resources = PdfName.intern("Resources");
  static readonly Contents = PdfName.intern("Contents");
  static readonly Length = PdfName.intern("Length");
  static readonly Filter = PdfName.intern("Filter");
  static readonly Font = PdfName.intern("Font");
  static readonly XObject = PdfName.intern("XObject");
}
