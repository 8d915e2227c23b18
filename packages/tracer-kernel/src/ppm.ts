/**
 * Binary PPM (P6) codec.
 *
 * Format: "P6" <ws> width <ws> height <ws> maxval <single ws> RGB bytes.
 * '#' comments may appear anywhere in the header. Only maxval ≤ 255
 * (one byte per channel) is supported.
 */

import type { Framebuffer } from './framebuffer.js';
import { ImageTexture, type WrapMode } from './texture.js';

export function encodePPM(fb: Framebuffer): Uint8Array {
  const header = new TextEncoder().encode(`P6\n${fb.width} ${fb.height}\n255\n`);
  const out = new Uint8Array(header.length + fb.width * fb.height * 3);
  out.set(header, 0);

  let offset = header.length;
  for (const pixel of fb.buffer) {
    out[offset++] = (pixel >> 16) & 0xff;
    out[offset++] = (pixel >> 8) & 0xff;
    out[offset++] = pixel & 0xff;
  }
  return out;
}

export function decodePPM(bytes: Uint8Array, wrap: WrapMode = 'clamp'): ImageTexture {
  let pos = 0;

  const isSpace = (b: number) => b === 0x20 || b === 0x09 || b === 0x0a || b === 0x0d;

  function skipSpaceAndComments() {
    while (pos < bytes.length) {
      if (isSpace(bytes[pos])) {
        pos++;
      } else if (bytes[pos] === 0x23) { // '#'
        while (pos < bytes.length && bytes[pos] !== 0x0a) pos++;
      } else {
        break;
      }
    }
  }

  function token(what: string): string {
    skipSpaceAndComments();
    const start = pos;
    while (pos < bytes.length && !isSpace(bytes[pos]) && bytes[pos] !== 0x23) pos++;
    if (pos === start) {
      throw new Error(`PPM header truncated: missing ${what}`);
    }
    return String.fromCharCode(...bytes.subarray(start, pos));
  }

  function integer(what: string): number {
    const raw = token(what);
    if (!/^\d+$/.test(raw)) {
      throw new Error(`PPM header: ${what} must be a non-negative integer, got "${raw}"`);
    }
    return Number(raw);
  }

  const magic = token('magic number');
  if (magic !== 'P6') {
    throw new Error(`Not a binary PPM: expected magic "P6", got "${magic}"`);
  }
  const width = integer('width');
  const height = integer('height');
  const maxval = integer('maxval');
  if (width === 0 || height === 0) {
    throw new Error(`PPM image is empty (${width}x${height})`);
  }
  if (maxval === 0 || maxval > 255) {
    throw new Error(`PPM maxval must be in 1..255, got ${maxval}`);
  }
  if (pos >= bytes.length || !isSpace(bytes[pos])) {
    throw new Error('PPM header must end with a single whitespace byte');
  }
  pos++;

  const expected = width * height * 3;
  if (bytes.length - pos < expected) {
    throw new Error(
      `PPM pixel data truncated: expected ${expected} bytes, got ${bytes.length - pos}`
    );
  }

  const data = new Uint8ClampedArray(expected);
  for (let i = 0; i < expected; i++) {
    const v = bytes[pos + i];
    data[i] = maxval === 255 ? v : Math.round((v * 255) / maxval);
  }
  return new ImageTexture(width, height, data, wrap);
}
