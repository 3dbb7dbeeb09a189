import type { ByteWriter } from "#src/io/byte-writer";
import { PdfName } from "./pdf-name";
import type { PdfObject } from "./pdf-object";
import type { PdfPrimitive } from "./pdf-primitive";

function keyOf(key: PdfName | string): string {
  return typeof key === "string" ? key : key.value;
}

/**
 * PDF dictionary object.
 *
 * In PDF: `<< /Type /Page /MediaBox [0 0 612 792] >>`
 *
 * Keys are always PdfName, matched by value; entries keep insertion order,
 * which is the order they are written in.
 */
export class PdfDict implements PdfPrimitive {
  get type(): "dict" | "stream" {
    return "dict";
  }

  private entries = new Map<string, [PdfName, PdfObject]>();

  constructor(entries?: Iterable<[PdfName | string, PdfObject]>) {
    if (entries) {
      for (const [key, value] of entries) {
        this.set(key, value);
      }
    }
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Get value for key. Key can be string or PdfName.
   */
  get(key: PdfName | string): PdfObject | undefined {
    return this.entries.get(keyOf(key))?.[1];
  }

  /**
   * Set value for key. Key can be string or PdfName.
   */
  set(key: PdfName | string, value: PdfObject): void {
    this.entries.set(keyOf(key), [typeof key === "string" ? PdfName.of(key) : key, value]);
  }

  has(key: PdfName | string): boolean {
    return this.entries.has(keyOf(key));
  }

  *[Symbol.iterator](): Iterator<[PdfName, PdfObject]> {
    yield* this.entries.values();
  }

  /**
   * Create dict from entries.
   */
  static of(entries: Record<string, PdfObject>): PdfDict {
    return new PdfDict(Object.entries(entries));
  }

  /**
   * Write `/Key value` lines, one per entry.
   */
  protected writeEntries(writer: ByteWriter, skip?: PdfName): void {
    for (const [key, value] of this.entries.values()) {
      if (key.value === skip?.value) {
        continue;
      }

      key.toBytes(writer);
      writer.writeAscii(" ");
      value.toBytes(writer);
      writer.writeAscii("\n");
    }
  }

  toBytes(writer: ByteWriter): void {
    writer.writeAscii("<<\n");
    this.writeEntries(writer);
    writer.writeAscii(">>");
  }
}
