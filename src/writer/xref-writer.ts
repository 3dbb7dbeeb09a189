/**
 * Cross-reference table and trailer writing (PDF 1.4 classic xref).
 */

import type { ByteWriter } from "#src/io/byte-writer";
import { PdfDict } from "#src/objects/pdf-dict";
import { PdfNumber } from "#src/objects/pdf-number";
import type { PdfObject } from "#src/objects/pdf-object";
import type { PdfRef } from "#src/objects/pdf-ref";

/**
 * Represents an entry in the xref section.
 */
export interface XRefWriteEntry {
  /** The object number */
  objectNumber: number;

  /** The generation number */
  generation: number;

  /** Entry type */
  type: "inuse" | "free";

  /** For inuse: byte offset. For free: next free object number */
  offset: number;
}

/**
 * Options for writing the xref section.
 */
export interface XRefWriteOptions {
  /** Byte offset where the xref section starts */
  xrefOffset: number;

  /** Maximum object number + 1 (for /Size) */
  size: number;

  /** Object entries to include */
  entries: XRefWriteEntry[];

  /** Root catalog reference */
  root: PdfRef;

  /** Info dictionary reference (optional) */
  info?: PdfRef;
}

interface XRefSubsection {
  start: number;
  entries: XRefWriteEntry[];
}

/**
 * Group consecutive object numbers into subsections.
 *
 * For example: [0, 1, 2, 7, 8] → [{start: 0, 3 entries}, {start: 7, 2 entries}]
 */
function groupIntoSubsections(entries: XRefWriteEntry[]): XRefSubsection[] {
  const sorted = [...entries].sort((a, b) => a.objectNumber - b.objectNumber);
  const subsections: XRefSubsection[] = [];
  let current: XRefSubsection | null = null;

  for (const entry of sorted) {
    if (current !== null && entry.objectNumber === current.start + current.entries.length) {
      current.entries.push(entry);
    } else {
      current = { start: entry.objectNumber, entries: [entry] };
      subsections.push(current);
    }
  }

  return subsections;
}

/**
 * Format a single xref table entry (exactly 20 bytes).
 *
 * Format: "OOOOOOOOOO GGGGG n\r\n" or "OOOOOOOOOO GGGGG f\r\n"
 */
export function formatXRefTableEntry(entry: XRefWriteEntry): string {
  const offset = entry.offset.toString().padStart(10, "0");
  const generation = entry.generation.toString().padStart(5, "0");
  const marker = entry.type === "free" ? "f" : "n";

  return `${offset} ${generation} ${marker}\r\n`;
}

/**
 * Build the trailer dictionary.
 */
function buildTrailerDict(options: XRefWriteOptions): PdfDict {
  const entries: [string, PdfObject][] = [
    ["Size", PdfNumber.of(options.size)],
    ["Root", options.root],
  ];

  if (options.info) {
    entries.push(["Info", options.info]);
  }

  return new PdfDict(entries);
}

/**
 * Write the xref table, trailer and end-of-file marker.
 *
 * Format:
 * ```
 * xref
 * 0 3
 * 0000000000 65535 f
 * 0000000009 00000 n
 * 0000000058 00000 n
 * trailer
 * <<
 * /Size 3
 * /Root 1 0 R
 * >>
 * startxref
 * 115
 * %%EOF
 * ```
 */
export function writeXRefTable(writer: ByteWriter, options: XRefWriteOptions): void {
  writer.writeAscii("xref\n");

  for (const subsection of groupIntoSubsections(options.entries)) {
    writer.writeAscii(`${subsection.start} ${subsection.entries.length}\n`);

    for (const entry of subsection.entries) {
      writer.writeAscii(formatXRefTableEntry(entry));
    }
  }

  writer.writeAscii("trailer\n");
  buildTrailerDict(options).toBytes(writer);
  writer.writeAscii("\n");

  writer.writeAscii("startxref\n");
  writer.writeAscii(`${options.xrefOffset}\n`);
  writer.writeAscii("%%EOF\n");
}
