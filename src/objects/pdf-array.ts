import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfObject } from "./pdf-object";
import type { PdfPrimitive } from "./pdf-primitive";

/**
 * PDF array object.
 *
 * In PDF: `[1 2 3]`, `[3 0 R 5 0 R]`
 */
export class PdfArray implements PdfPrimitive {
  get type(): "array" {
    return "array";
  }

  private readonly items: PdfObject[];

  constructor(items: readonly PdfObject[] = []) {
    this.items = [...items];
  }

  get length(): number {
    return this.items.length;
  }

  /**
   * Get item at index. Returns undefined if out of bounds.
   */
  at(index: number): PdfObject | undefined {
    return this.items.at(index);
  }

  push(...values: PdfObject[]): void {
    this.items.push(...values);
  }

  *[Symbol.iterator](): Iterator<PdfObject> {
    yield* this.items;
  }

  /**
   * Create array from items.
   */
  static of(...items: PdfObject[]): PdfArray {
    return new PdfArray(items);
  }

  toBytes(writer: ByteWriter): void {
    writer.writeAscii("[");

    this.items.forEach((item, index) => {
      if (index > 0) {
        writer.writeAscii(" ");
      }

      item.toBytes(writer);
    });

    writer.writeAscii("]");
  }
}
