/**
 * Interface for PDF objects that can serialize themselves.
 *
 * Each concrete object class writes its own byte representation to a
 * ByteWriter; dictionaries and arrays recurse into their members.
 */

import type { ByteWriter } from "#src/io/byte-writer";

export interface PdfPrimitive {
  /**
   * The type discriminator for this object.
   */
  readonly type: string;

  /**
   * Write this object's PDF byte representation to the given ByteWriter.
   */
  toBytes(writer: ByteWriter): void;
}
