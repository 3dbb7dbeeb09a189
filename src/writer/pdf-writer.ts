/**
 * PDF file writer.
 *
 * Writes a complete file in one pass: header, every indirect object in
 * numbering order, then the xref table and trailer. Uses a single
 * ByteWriter for the whole file so offsets are read straight off the
 * write position.
 */

import { AssemblyInvariantError } from "#src/errors";
import { ByteWriter } from "#src/io/byte-writer";
import type { PdfObject } from "#src/objects/pdf-object";
import type { PdfRef } from "#src/objects/pdf-ref";

import { writeIndirectObject } from "./serializer";
import { writeXRefTable, type XRefWriteEntry } from "./xref-writer";

/**
 * An object together with the reference it is written under.
 */
export interface IndirectObject {
  ref: PdfRef;
  object: PdfObject;
}

/**
 * Options for PDF writing.
 */
export interface WriteOptions {
  /** PDF version string (default: "1.4") */
  version?: string;

  /** Root catalog reference */
  root: PdfRef;

  /** Info dictionary reference (optional) */
  info?: PdfRef;
}

/**
 * Result of a write operation.
 */
export interface WriteResult {
  /** The written PDF bytes */
  bytes: Uint8Array;

  /** Object number → byte offset of its `N G obj` line */
  offsets: Map<number, number>;

  /** Byte offset where the xref section starts */
  xrefOffset: number;
}

const decoder = new TextDecoder();

/**
 * Write a complete PDF from scratch.
 *
 * Structure:
 * ```
 * %PDF-1.4
 * 1 0 obj
 * ...
 * endobj
 * 2 0 obj
 * ...
 * endobj
 * xref
 * ...
 * trailer
 * ...
 * startxref
 * ...
 * %%EOF
 * ```
 *
 * Objects are written in the order given. Their offsets are checked
 * against the finished bytes before returning.
 *
 * @throws {AssemblyInvariantError} if a recorded offset does not land on its object
 */
export function writeComplete(objects: readonly IndirectObject[], options: WriteOptions): WriteResult {
  const writer = new ByteWriter();

  const version = options.version ?? "1.4";
  writer.writeAscii(`%PDF-${version}\n`);

  const offsets = new Map<number, number>();
  const entries: XRefWriteEntry[] = [
    // Object 0 is always the free list head
    { objectNumber: 0, generation: 65535, type: "free", offset: 0 },
  ];

  for (const { ref, object } of objects) {
    offsets.set(ref.objectNumber, writer.position);
    entries.push({
      objectNumber: ref.objectNumber,
      generation: ref.generation,
      type: "inuse",
      offset: writer.position,
    });

    writeIndirectObject(writer, ref, object);
    writer.writeAscii("\n");
  }

  const xrefOffset = writer.position;
  let highest = 0;

  for (const { ref } of objects) {
    highest = Math.max(highest, ref.objectNumber);
  }

  writeXRefTable(writer, {
    xrefOffset,
    size: highest + 1,
    entries,
    root: options.root,
    info: options.info,
  });

  const bytes = writer.toBytes();

  verifyOffsets(bytes, objects, offsets);

  return { bytes, offsets, xrefOffset };
}

/**
 * Check that every recorded offset points at the start of its object.
 *
 * @throws {AssemblyInvariantError} on the first mismatch
 */
export function verifyOffsets(
  bytes: Uint8Array,
  objects: readonly IndirectObject[],
  offsets: ReadonlyMap<number, number>,
): void {
  for (const { ref } of objects) {
    const offset = offsets.get(ref.objectNumber);

    if (offset === undefined) {
      throw new AssemblyInvariantError(ref.objectNumber, -1);
    }

    const expected = `${ref.objectNumber} ${ref.generation} obj`;
    const actual = decoder.decode(bytes.subarray(offset, offset + expected.length));

    if (actual !== expected) {
      throw new AssemblyInvariantError(ref.objectNumber, offset);
    }
  }
}
