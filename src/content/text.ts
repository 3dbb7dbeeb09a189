/**
 * Text content as a `Tj` string operand.
 *
 * The standard fonts are referenced with WinAnsiEncoding, which covers
 * Latin-1. Printable ASCII is written as a literal string; anything else
 * goes out as a hex string so the content stream stays 7-bit clean.
 */

import { bytesToHex, encodeLatin1, escapeLiteralString } from "#src/helpers/strings";

const PRINTABLE_TEXT = /^[\x20-\x7e]*$/;

const decoder = new TextDecoder();

/**
 * Encode text content as a string operand: `(Hello)` or `<48E9>`.
 *
 * Characters outside Latin-1 become "?" and are reported through
 * `onWarning`.
 */
export function encodeTextOperand(content: string, onWarning?: (message: string) => void): string {
  if (PRINTABLE_TEXT.test(content)) {
    const escaped = escapeLiteralString(new TextEncoder().encode(content));

    return `(${decoder.decode(escaped)})`;
  }

  const { bytes, replaced } = encodeLatin1(content);

  if (replaced.length > 0) {
    onWarning?.(`Replaced characters without a WinAnsi form with "?": ${replaced.join(" ")}`);
  }

  return `<${bytesToHex(bytes)}>`;
}
