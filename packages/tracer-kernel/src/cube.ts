/**
 * Axis-aligned cube: the only scene primitive.
 *
 * Ray intersection uses the slab method. Face textures: top and bottom
 * have their own texture, the four vertical faces all draw from `side`.
 *
 *   cube.rayIntersect([0.5, 0.5, 5], [0, 0, -1])
 *     → { point: [0.5, 0.5, 1], normal: [0, 0, 1], distance: 4, ... }
 */

import type { Vec3 } from './vec3.js';
import { along } from './vec3.js';
import type { Color } from './color.js';
import type { Material } from './material.js';
import { withDiffuse } from './material.js';
import type { Texture } from './texture.js';

/** Boundary-matching tolerance for face and normal classification. */
export const FACE_EPSILON = 1e-4;

export interface Hit {
  point: Vec3;
  normal: Vec3;
  /** Ray parameter of the entry point (world units for a unit direction). */
  distance: number;
  /** Cube material with diffuse replaced by the sampled texel. */
  material: Material;
}

export interface FaceTextures {
  top: Texture;
  side: Texture;
  bottom: Texture;
}

export type FaceName = 'top' | 'bottom' | 'left' | 'right' | 'front' | 'back';

export class Cube {
  readonly top: Texture;
  readonly side: Texture;
  readonly bottom: Texture;

  constructor(
    readonly min: Vec3,
    readonly max: Vec3,
    readonly material: Material,
    textures: FaceTextures,
  ) {
    for (let a = 0; a < 3; a++) {
      if (!(min[a] <= max[a])) {
        throw new Error(
          `Cube min must be <= max on every axis, got min=[${min.join(', ')}] max=[${max.join(', ')}]`
        );
      }
    }
    this.top = textures.top;
    this.side = textures.side;
    this.bottom = textures.bottom;
  }

  /**
   * First intersection of the ray with the box surface, or null.
   * `direction` must be unit length. A ray starting inside the box misses.
   */
  rayIntersect(origin: Vec3, direction: Vec3): Hit | null {
    let tEnter = -Infinity;
    let tExit = Infinity;

    for (let a = 0; a < 3; a++) {
      // Zero components give ±Infinity. 0/0 (origin on a plane the ray
      // runs parallel to) gives NaN: a grazing ray, counted as a miss.
      let t0 = (this.min[a] - origin[a]) / direction[a];
      let t1 = (this.max[a] - origin[a]) / direction[a];
      if (Number.isNaN(t0) || Number.isNaN(t1)) return null;
      if (t0 > t1) {
        const tmp = t0; t0 = t1; t1 = tmp;
      }
      if (t0 > tEnter) tEnter = t0;
      if (t1 < tExit) tExit = t1;
      if (tEnter > tExit) return null;
    }

    if (tEnter < 0) return null;

    const point = along(origin, direction, tEnter);
    return {
      point,
      normal: this.normalAt(point),
      distance: tEnter,
      material: withDiffuse(this.material, this.texelAt(point)),
    };
  }

  /** Which face the texture lookup treats a surface point as lying on. */
  faceAt(p: Vec3): FaceName {
    if (Math.abs(p[1] - this.max[1]) < FACE_EPSILON) return 'top';
    if (Math.abs(p[1] - this.min[1]) < FACE_EPSILON) return 'bottom';
    if (Math.abs(p[0] - this.min[0]) < FACE_EPSILON) return 'left';
    if (Math.abs(p[0] - this.max[0]) < FACE_EPSILON) return 'right';
    return Math.abs(p[2] - this.min[2]) < Math.abs(p[2] - this.max[2]) ? 'back' : 'front';
  }

  /** Sample the face texture under a surface point. */
  texelAt(p: Vec3): Color {
    const face = this.faceAt(p);
    switch (face) {
      case 'top':
        return this.top.sample(this.fraction(p, 0), this.fraction(p, 2));
      case 'bottom':
        return this.bottom.sample(this.fraction(p, 0), this.fraction(p, 2));
      case 'left':
      case 'right':
        return this.side.sample(this.fraction(p, 2), this.fraction(p, 1));
      case 'front':
      case 'back':
        return this.side.sample(this.fraction(p, 0), this.fraction(p, 1));
    }
  }

  /**
   * Outward normal at a surface point. Checks x, then y, then z
   * boundaries, first match wins; this order differs from faceAt() on
   * edges, where the two may disagree.
   */
  normalAt(p: Vec3): Vec3 {
    if (Math.abs(p[0] - this.min[0]) < FACE_EPSILON) return [-1, 0, 0];
    if (Math.abs(p[0] - this.max[0]) < FACE_EPSILON) return [1, 0, 0];
    if (Math.abs(p[1] - this.min[1]) < FACE_EPSILON) return [0, -1, 0];
    if (Math.abs(p[1] - this.max[1]) < FACE_EPSILON) return [0, 1, 0];
    if (Math.abs(p[2] - this.min[2]) < FACE_EPSILON) return [0, 0, -1];
    return [0, 0, 1];
  }

  /** Position of p across the box on one axis, 0 at min, 1 at max. */
  private fraction(p: Vec3, axis: number): number {
    return (p[axis] - this.min[axis]) / (this.max[axis] - this.min[axis]);
  }
}
