/**
 * Helpers shared by the test files.
 */

import { ByteWriter } from "#src/io/byte-writer";
import type { PdfObject } from "#src/objects/pdf-object";

const decoder = new TextDecoder();

/**
 * Serialize a PDF object to its textual form.
 */
export function serializeObjectText(obj: PdfObject): string {
  const writer = new ByteWriter({ initialSize: 256 });

  obj.toBytes(writer);

  return decoder.decode(writer.toBytes());
}
