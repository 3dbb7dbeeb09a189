import type { ByteWriter } from "#src/io/byte-writer";
import { PdfDict } from "./pdf-dict";
import { PdfName } from "./pdf-name";
import type { PdfObject } from "./pdf-object";

const encoder = new TextEncoder();

/**
 * PDF stream object (dictionary + data).
 *
 * In PDF:
 * ```
 * <<
 * /Length 5
 * >>
 * stream
 * ...data...
 * endstream
 * ```
 *
 * /Length is always written first and always equals the byte length of
 * the data; the newline before `endstream` is an end-of-line marker and
 * not part of the data.
 */
export class PdfStream extends PdfDict {
  override get type(): "stream" {
    return "stream";
  }

  readonly data: Uint8Array;

  constructor(
    entries?: Iterable<[PdfName | string, PdfObject]>,
    data: Uint8Array = new Uint8Array(0),
  ) {
    super(entries);
    this.data = data;
  }

  /**
   * Create a stream holding text (content-stream operators).
   */
  static fromText(text: string, entries: Record<string, PdfObject> = {}): PdfStream {
    return new PdfStream(Object.entries(entries), encoder.encode(text));
  }

  override toBytes(writer: ByteWriter): void {
    writer.writeAscii("<<\n");
    writer.writeAscii(`/Length ${this.data.length}\n`);
    this.writeEntries(writer, PdfName.Length);
    writer.writeAscii(">>\nstream\n");
    writer.writeBytes(this.data);
    writer.writeAscii("\nendstream");
  }
}
