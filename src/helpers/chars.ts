/**
 * PDF character constants (PDF spec 7.2.2)
 */

// Line endings
export const LF = 0x0a;
export const CR = 0x0d;

// Whitespace
export const SPACE = 0x20;
export const TAB = 0x09;
export const NUL = 0x00;
export const FF = 0x0c;

/**
 * PDF whitespace characters: NUL, TAB, LF, FF, CR, SPACE
 */
export const WHITESPACE: ReadonlySet<number> = new Set([NUL, TAB, LF, FF, CR, SPACE]);

// Delimiters
export const CHAR_PARENTHESIS_OPEN = 0x28; // (
export const CHAR_PARENTHESIS_CLOSE = 0x29; // )
export const CHAR_BACKSLASH = 0x5c; // \
export const CHAR_HASH = 0x23; // #

/**
 * PDF delimiter characters: ( ) < > [ ] { } / %
 */
export const DELIMITERS: ReadonlySet<number> = new Set([
  CHAR_PARENTHESIS_OPEN,
  CHAR_PARENTHESIS_CLOSE,
  0x3c,
  0x3e,
  0x5b,
  0x5d,
  0x7b,
  0x7d,
  0x2f,
  0x25,
]);

/**
 * Printable ASCII range that may appear unescaped in names and literal strings.
 */
export const PRINTABLE_MIN = 0x21;
export const PRINTABLE_MAX = 0x7e;

/**
 * Placeholder byte for characters with no single-byte encoding ("?").
 */
export const CHAR_QUESTION = 0x3f;

/**
 * Byte mask for limiting values to a single byte (0-255).
 */
export const SINGLE_BYTE_MASK = 0xff;
