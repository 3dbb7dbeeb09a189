import { describe, expect, it } from "vitest";
import { bytesToHex, encodeLatin1, encodeUtf16BE, escapeLiteralString, isAscii } from "./strings";

const ascii = (text: string) => new TextEncoder().encode(text);
const decode = (bytes: Uint8Array) => new TextDecoder().decode(bytes);

describe("escapeLiteralString", () => {
  it("returns input unchanged when nothing needs escaping", () => {
    const bytes = ascii("Hello");

    expect(escapeLiteralString(bytes)).toBe(bytes);
  });

  it("escapes parentheses and backslashes", () => {
    expect(decode(escapeLiteralString(ascii("a(b)c\\d")))).toBe("a\\(b\\)c\\\\d");
  });
});

describe("bytesToHex", () => {
  it("writes uppercase pairs", () => {
    expect(bytesToHex(new Uint8Array([72, 101, 108, 108, 111]))).toBe("48656C6C6F");
    expect(bytesToHex(new Uint8Array([0, 255]))).toBe("00FF");
  });
});

describe("isAscii", () => {
  it("detects non-ASCII text", () => {
    expect(isAscii("plain text")).toBe(true);
    expect(isAscii("café")).toBe(false);
  });
});

describe("encodeLatin1", () => {
  it("keeps Latin-1 characters as single bytes", () => {
    const { bytes, replaced } = encodeLatin1("café");

    expect(Array.from(bytes)).toEqual([0x63, 0x61, 0x66, 0xe9]);
    expect(replaced).toEqual([]);
  });

  it("replaces characters above 255 with ?", () => {
    const { bytes, replaced } = encodeLatin1("a•b");

    expect(Array.from(bytes)).toEqual([0x61, 0x3f, 0x62]);
    expect(replaced).toEqual(["•"]);
  });

  it("treats a surrogate pair as one character", () => {
    const { bytes, replaced } = encodeLatin1("\u{1F4A1}");

    expect(Array.from(bytes)).toEqual([0x3f]);
    expect(replaced).toEqual(["\u{1F4A1}"]);
  });
});

describe("encodeUtf16BE", () => {
  it("prefixes a byte-order mark", () => {
    expect(Array.from(encodeUtf16BE("é"))).toEqual([0xfe, 0xff, 0x00, 0xe9]);
  });
});
