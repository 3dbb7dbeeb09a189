import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfPrimitive } from "./pdf-primitive";

/**
 * PDF indirect reference.
 *
 * In PDF: `1 0 R`, `42 0 R`
 *
 * Generated documents never reuse object numbers, so the generation is
 * always 0 unless given explicitly.
 */
export class PdfRef implements PdfPrimitive {
  get type(): "ref" {
    return "ref";
  }

  private constructor(
    readonly objectNumber: number,
    readonly generation: number,
  ) {}

  /**
   * Create a reference. Object numbers start at 1; 0 is the free-list head.
   */
  static of(objectNumber: number, generation: number = 0): PdfRef {
    if (!Number.isInteger(objectNumber) || objectNumber < 1) {
      throw new RangeError(`Invalid object number: ${objectNumber}`);
    }

    return new PdfRef(objectNumber, generation);
  }

  /**
   * Returns the PDF syntax representation: "1 0 R"
   */
  toString(): string {
    return `${this.objectNumber} ${this.generation} R`;
  }

  toBytes(writer: ByteWriter): void {
    writer.writeAscii(this.toString());
  }
}
