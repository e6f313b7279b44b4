// One byte per character.
//
// Text is framed by its character count, so each character must fit in a
// single byte (code points 0..255).

import { XdrError, XdrErrorCode } from "../errors.ts";

export function encodeSingleByteText(value: string): Uint8Array {
  const out = new Uint8Array(value.length);
  for (let i = 0; i < value.length; i++) {
    const code = value.charCodeAt(i);
    if (code > 0xff) {
      throw new XdrError(
        XdrErrorCode.OUT_OF_RANGE,
        `character U+${code.toString(16).toUpperCase().padStart(4, "0")} at index ${i} does not fit in one byte`,
      );
    }
    out[i] = code;
  }
  return out;
}

const CHUNK = 8192;

export function decodeSingleByteText(bytes: Uint8Array): string {
  let out = "";
  for (let i = 0; i < bytes.length; i += CHUNK) {
    out += String.fromCharCode(...bytes.subarray(i, i + CHUNK));
  }
  return out;
}
