/**
 * Surface materials. Immutable once attached to a cube; a hit carries a
 * derived copy whose diffuse color is the sampled texel.
 */

import { Color } from './color.js';

export interface Material {
  /** [diffuse weight, specular weight] */
  readonly albedo: readonly [number, number];
  /** Specular exponent. */
  readonly specular: number;
  /** Reserved. Shading ignores it. */
  readonly transparency: number;
  /** Fresnel base reflectance (f0), also the reflection blend weight. */
  readonly reflectivity: number;
  readonly diffuse: Color;
  readonly fresnelColor: Color;
}

export interface MaterialOptions {
  albedo?: [number, number];
  specular?: number;
  transparency?: number;
  reflectivity?: number;
  diffuse?: Color;
  fresnelColor?: Color;
}

export function material(opts: MaterialOptions = {}): Material {
  const albedo = opts.albedo ?? [1, 0];
  const m: Material = {
    albedo: [albedo[0], albedo[1]],
    specular: opts.specular ?? 0,
    transparency: opts.transparency ?? 0,
    reflectivity: opts.reflectivity ?? 0,
    diffuse: opts.diffuse ?? Color.white(),
    fresnelColor: opts.fresnelColor ?? Color.white(),
  };
  if (m.reflectivity < 0 || m.reflectivity > 1) {
    throw new Error(`reflectivity must be in [0, 1], got ${m.reflectivity}`);
  }
  if (m.specular < 0) {
    throw new Error(`specular exponent must be non-negative, got ${m.specular}`);
  }
  return m;
}

export function withDiffuse(base: Material, diffuse: Color): Material {
  return { ...base, diffuse };
}
