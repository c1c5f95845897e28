/**
 * Statement decoding
 *
 * BAC exports are not consistently encoded. Each candidate encoding is tried
 * with a fatal decoder and the first one that accepts the bytes wins.
 *
 * UTF-8 goes first: the WHATWG windows-1252 decoder maps every byte, so it
 * never fails and anything after it would be unreachable.
 */

import { DecodeError } from "../errors.js";

export const DEFAULT_ENCODINGS = ["utf-8", "windows-1252", "iso-8859-1"];

const UTF8_BOM = [0xef, 0xbb, 0xbf];

function hasUtf8Bom(bytes: Uint8Array): boolean {
  return UTF8_BOM.every((byte, i) => bytes[i] === byte);
}

function tryDecode(bytes: Uint8Array, encoding: string): string | null {
  try {
    return new TextDecoder(encoding, { fatal: true }).decode(bytes);
  } catch (error) {
    // RangeError: encoding unknown to this runtime; TypeError: invalid bytes
    if (error instanceof RangeError || error instanceof TypeError) {
      return null;
    }
    throw error;
  }
}

/**
 * Decode raw statement bytes into text
 * @throws DecodeError when no encoding in the list accepts the bytes
 */
export function decodeStatement(
  bytes: Uint8Array,
  encodings: string[] = DEFAULT_ENCODINGS
): string {
  const candidates = hasUtf8Bom(bytes) ? ["utf-8", ...encodings] : encodings;

  for (const encoding of candidates) {
    const text = tryDecode(bytes, encoding);
    if (text !== null) {
      return text;
    }
  }

  throw new DecodeError(encodings);
}
