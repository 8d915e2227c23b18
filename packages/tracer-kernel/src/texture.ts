/**
 * Textures: immutable RGB grids addressed by (u, v) in [0, 1].
 *
 * One texture instance is shared by every cube face that draws from it;
 * nothing here copies pixel data per primitive.
 *
 * Addressing: u runs left → right, v runs bottom → top, so v = 1 is the
 * first row of the stored image. Non-finite coordinates read as 0.
 */

import { Color } from './color.js';

export type WrapMode = 'clamp' | 'repeat';

export interface Texture {
  readonly width: number;
  readonly height: number;
  sample(u: number, v: number): Color;
}

export class ImageTexture implements Texture {
  constructor(
    readonly width: number,
    readonly height: number,
    /** Row-major RGB triples, top row first. */
    readonly data: Uint8ClampedArray,
    readonly wrap: WrapMode = 'clamp',
  ) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new Error(`Texture size must be positive integers, got ${width}x${height}`);
    }
    if (data.length !== width * height * 3) {
      throw new Error(
        `Texture data length ${data.length} does not match ${width}x${height} RGB (${width * height * 3})`
      );
    }
  }

  sample(u: number, v: number): Color {
    const x = texel(this.address(u), this.width);
    const y = texel(1 - this.address(v), this.height);
    const i = (y * this.width + x) * 3;
    return new Color(this.data[i], this.data[i + 1], this.data[i + 2]);
  }

  private address(t: number): number {
    if (!Number.isFinite(t)) return 0;
    if (this.wrap === 'repeat') return t - Math.floor(t);
    return Math.min(1, Math.max(0, t));
  }
}

function texel(t: number, size: number): number {
  return Math.min(size - 1, Math.max(0, Math.floor(t * size)));
}

// ─── Procedural textures ─────────────────────────────────────────

/** Build a texture from a per-texel color function (x, y from the top-left). */
export function proceduralTexture(
  width: number,
  height: number,
  fn: (x: number, y: number) => Color,
  wrap: WrapMode = 'repeat',
): ImageTexture {
  const data = new Uint8ClampedArray(width * height * 3);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const c = fn(x, y);
      const i = (y * width + x) * 3;
      data[i] = c.r;
      data[i + 1] = c.g;
      data[i + 2] = c.b;
    }
  }
  return new ImageTexture(width, height, data, wrap);
}

export function solidTexture(color: Color): ImageTexture {
  return proceduralTexture(1, 1, () => color, 'clamp');
}

/** cells × cells board, `a` on the top-left texel. */
export function checkerTexture(a: Color, b: Color, cells = 8): ImageTexture {
  return proceduralTexture(cells, cells, (x, y) => ((x + y) % 2 === 0 ? a : b));
}

/**
 * Noisy variation around a base color. Stands in for the block art.
 * Deterministic for a given seed.
 */
export function speckleTexture(base: Color, variation: number, size = 16, seed = 1): ImageTexture {
  return proceduralTexture(size, size, (x, y) => {
    const n = hash(x, y, seed) * 2 - 1;
    return base.scale(1 + n * variation);
  });
}

/** Integer hash → [0, 1). */
function hash(x: number, y: number, seed: number): number {
  let h = Math.imul(x, 374761393) ^ Math.imul(y, 668265263) ^ Math.imul(seed, 2246822519);
  h = Math.imul(h ^ (h >>> 13), 1274126177);
  h ^= h >>> 16;
  return (h >>> 0) / 4294967296;
}
