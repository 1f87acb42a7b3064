/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * ISO 10303-21 simple string encoding.
 *
 * Encoding, per code point:
 * - ' -> ''
 * - \ -> \ (written as-is)
 * - U+0020..U+007E -> unchanged
 * - U+0000..U+001F, U+007F..U+00FF -> \X\HH
 * - U+0100..U+FFFF -> \X2\HHHH\X0\
 * - U+10000..U+10FFFF -> \X4\HHHHHHHH\X0\
 *
 * The delimiting apostrophes are not part of the encoded content.
 */

/** Thrown for a code point no STEP escape can carry */
export class UnrepresentableCharacterError extends Error {
  constructor(public readonly codePoint: number) {
    super(`Code point 0x${codePoint.toString(16).toUpperCase()} has no STEP string encoding`);
    this.name = 'UnrepresentableCharacterError';
  }
}

const MAX_CODE_POINT = 0x10ffff;

function hex(value: number, width: number): string {
  return value.toString(16).toUpperCase().padStart(width, '0');
}

function encodeCodePoint(codePoint: number, char: string): string {
  if (char === "'") return "''";
  if (char === '\\') return '\\';
  if (codePoint >= 0x20 && codePoint <= 0x7e) return char;
  if (codePoint <= 0xff) return `\\X\\${hex(codePoint, 2)}`;
  if (codePoint <= 0xffff) return `\\X2\\${hex(codePoint, 4)}\\X0\\`;
  if (codePoint <= MAX_CODE_POINT) return `\\X4\\${hex(codePoint, 8)}\\X0\\`;
  throw new UnrepresentableCharacterError(codePoint);
}

/**
 * Encode a string as STEP simple string content (without the quotes).
 *
 * A lone surrogate is a code point in U+D800..U+DFFF and is written with \X2\.
 */
export function encodeStepString(text: string): string {
  let result = '';
  // for..of walks code points, so astral characters arrive whole
  for (const char of text) {
    const codePoint = char.codePointAt(0);
    if (codePoint === undefined) continue;
    result += encodeCodePoint(codePoint, char);
  }
  return result;
}

/** Encode and wrap in apostrophes: O'Brien -> 'O''Brien' */
export function quoteStepString(text: string): string {
  return `'${encodeStepString(text)}'`;
}

const HEX_DIGIT = /^[0-9A-Fa-f]$/;

function isHex(text: string): boolean {
  for (const char of text) {
    if (!HEX_DIGIT.test(char)) return false;
  }
  return text.length > 0;
}

/**
 * Read a \X2\ or \X4\ run starting after its opening directive.
 * Returns the decoded text and the index just past \X0\, or null when
 * the run is malformed (the caller then keeps the backslash literally).
 */
function readHexRun(
  content: string,
  start: number,
  width: number,
): { text: string; end: number } | null {
  const close = content.indexOf('\\X0\\', start);
  if (close === -1) return null;
  const digits = content.slice(start, close);
  if (digits.length === 0 || digits.length % width !== 0 || !isHex(digits)) return null;

  let text = '';
  for (let i = 0; i < digits.length; i += width) {
    const codePoint = parseInt(digits.slice(i, i + width), 16);
    if (codePoint > MAX_CODE_POINT) return null;
    // \X2\ carries UTF-16 code units, \X4\ full code points
    text += width === 4 ? String.fromCharCode(codePoint) : String.fromCodePoint(codePoint);
  }
  return { text, end: close + 4 };
}

/**
 * Decode STEP simple string content (the text between the apostrophes).
 *
 * Handles:
 * - '' -> '
 * - \X\HH - ISO 8859-1 byte
 * - \X2\HHHH...\X0\ - UTF-16 code units, any number per run
 * - \X4\HHHHHHHH...\X0\ - code points, any number per run
 * - \S\c - c + 128 (ISO 8859 upper half)
 * - \PA\ .. \PI\ - code page switches (stripped)
 *
 * Any other backslash is kept as-is.
 */
export function decodeStepString(content: string): string {
  let result = '';
  let i = 0;

  while (i < content.length) {
    const char = content[i];

    if (char === "'") {
      result += "'";
      i += content[i + 1] === "'" ? 2 : 1;
      continue;
    }

    if (char !== '\\') {
      result += char;
      i++;
      continue;
    }

    if (content.startsWith('\\X2\\', i)) {
      const run = readHexRun(content, i + 4, 4);
      if (run) {
        result += run.text;
        i = run.end;
        continue;
      }
    } else if (content.startsWith('\\X4\\', i)) {
      const run = readHexRun(content, i + 4, 8);
      if (run) {
        result += run.text;
        i = run.end;
        continue;
      }
    } else if (content.startsWith('\\X\\', i)) {
      const digits = content.slice(i + 3, i + 5);
      if (digits.length === 2 && isHex(digits)) {
        result += String.fromCharCode(parseInt(digits, 16));
        i += 5;
        continue;
      }
    } else if (content.startsWith('\\S\\', i) && i + 3 < content.length) {
      result += String.fromCharCode(content.charCodeAt(i + 3) + 128);
      i += 4;
      continue;
    } else if (/^\\P[A-I]\\/.test(content.slice(i, i + 4))) {
      i += 4;
      continue;
    }

    result += '\\';
    i++;
  }

  return result;
}
