/**
 * Indirect object serialization.
 */

import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfObject } from "#src/objects/pdf-object";
import type { PdfRef } from "#src/objects/pdf-ref";

/**
 * Write an indirect object definition.
 *
 * Format: "N G obj\n[object]\nendobj" (the caller writes the newline that
 * separates it from the next object).
 */
export function writeIndirectObject(writer: ByteWriter, ref: PdfRef, obj: PdfObject): void {
  writer.writeAscii(`${ref.objectNumber} ${ref.generation} obj\n`);
  obj.toBytes(writer);
  writer.writeAscii("\nendobj");
}
