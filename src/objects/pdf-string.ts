import { bytesToHex, encodeUtf16BE, escapeLiteralString, isAscii } from "#src/helpers/strings";
import { CHAR_PARENTHESIS_CLOSE, CHAR_PARENTHESIS_OPEN } from "#src/helpers/chars";
import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfPrimitive } from "./pdf-primitive";

/**
 * PDF string object.
 *
 * In PDF: `(Hello World)` (literal) or `<FEFF00E9>` (hex)
 *
 * Stores raw bytes.
 */
export class PdfString implements PdfPrimitive {
  get type(): "string" {
    return "string";
  }

  constructor(
    readonly bytes: Uint8Array,
    readonly format: "literal" | "hex" = "literal",
  ) {}

  /**
   * Create a text string (Info values and similar).
   *
   * ASCII text is written as a literal string. Anything else is encoded
   * as UTF-16BE with a byte-order mark and written in hex, which keeps
   * the file 7-bit clean.
   */
  static fromText(text: string): PdfString {
    if (isAscii(text)) {
      return new PdfString(new TextEncoder().encode(text), "literal");
    }

    return new PdfString(encodeUtf16BE(text), "hex");
  }

  toBytes(writer: ByteWriter): void {
    if (this.format === "hex") {
      writer.writeAscii(`<${bytesToHex(this.bytes)}>`);
    } else {
      writer.writeByte(CHAR_PARENTHESIS_OPEN);
      writer.writeBytes(escapeLiteralString(this.bytes));
      writer.writeByte(CHAR_PARENTHESIS_CLOSE);
    }
  }
}
