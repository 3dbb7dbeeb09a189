/**
 * PDF string encoding utilities.
 */

import {
  CHAR_BACKSLASH,
  CHAR_PARENTHESIS_CLOSE,
  CHAR_PARENTHESIS_OPEN,
  CHAR_QUESTION,
  SINGLE_BYTE_MASK,
} from "./chars";

/**
 * Escape a PDF literal string for serialization.
 *
 * Backslash-escapes `\`, `(` and `)`; other bytes pass through unchanged.
 *
 * @param bytes - Raw string bytes
 * @returns Escaped bytes safe for literal string output
 */
export function escapeLiteralString(bytes: Uint8Array): Uint8Array {
  let escapeCount = 0;

  for (const byte of bytes) {
    if (
      byte === CHAR_BACKSLASH ||
      byte === CHAR_PARENTHESIS_OPEN ||
      byte === CHAR_PARENTHESIS_CLOSE
    ) {
      escapeCount++;
    }
  }

  if (escapeCount === 0) {
    return bytes;
  }

  const result = new Uint8Array(bytes.length + escapeCount);
  let j = 0;

  for (const byte of bytes) {
    if (
      byte === CHAR_BACKSLASH ||
      byte === CHAR_PARENTHESIS_OPEN ||
      byte === CHAR_PARENTHESIS_CLOSE
    ) {
      result[j++] = CHAR_BACKSLASH;
    }

    result[j++] = byte;
  }

  return result;
}

/**
 * Convert bytes to uppercase hex string.
 *
 * @example
 * ```ts
 * bytesToHex(new Uint8Array([72, 101, 108, 108, 111])) // "48656C6C6F"
 * ```
 */
export function bytesToHex(bytes: Uint8Array): string {
  let hex = "";

  for (const byte of bytes) {
    hex += byte.toString(16).toUpperCase().padStart(2, "0");
  }

  return hex;
}

/**
 * Whether every UTF-16 code unit of the string is 7-bit ASCII.
 */
export function isAscii(text: string): boolean {
  for (let i = 0; i < text.length; i++) {
    if (text.charCodeAt(i) > 0x7f) {
      return false;
    }
  }

  return true;
}

/**
 * Encode text as single-byte Latin-1 codes.
 *
 * Code points above 255 have no single-byte form; each becomes "?" and
 * is reported in `replaced`. Surrogate pairs count as one character.
 */
export function encodeLatin1(text: string): { bytes: Uint8Array; replaced: string[] } {
  const bytes: number[] = [];
  const replaced: string[] = [];

  for (const char of text) {
    const code = char.codePointAt(0) ?? CHAR_QUESTION;

    if (code <= SINGLE_BYTE_MASK) {
      bytes.push(code);
    } else {
      bytes.push(CHAR_QUESTION);
      replaced.push(char);
    }
  }

  return { bytes: new Uint8Array(bytes), replaced };
}

/**
 * Encode text as UTF-16BE with a leading byte-order mark, the form PDF
 * uses for text strings outside PDFDocEncoding (Info dictionary values).
 */
export function encodeUtf16BE(text: string): Uint8Array {
  const bytes = new Uint8Array(2 + text.length * 2);

  bytes[0] = 0xfe;
  bytes[1] = 0xff;

  for (let i = 0; i < text.length; i++) {
    const unit = text.charCodeAt(i);

    bytes[2 + i * 2] = unit >> 8;
    bytes[3 + i * 2] = unit & SINGLE_BYTE_MASK;
  }

  return bytes;
}
