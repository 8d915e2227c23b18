/**
 * Scene assembly: flat object lists and the per-frame render context.
 *
 * There is no hierarchy and no acceleration structure: every ray is
 * tested against every cube, in list order.
 */

import type { Vec3 } from './vec3.js';
import { Color } from './color.js';
import { Cube, type FaceTextures } from './cube.js';
import { material, type Material } from './material.js';
import type { Texture } from './texture.js';
import type { Light } from './light.js';
import type { Camera } from './camera.js';

/** Everything one frame reads. Nothing in it changes while rendering. */
export interface RenderContext {
  objects: readonly Cube[];
  /** Enclosing shell shown where the scene misses. Never casts shadows. */
  skybox: readonly Cube[];
  lights: readonly Light[];
  camera: Camera;
  isNight: boolean;
}

/**
 * Fill the box [min, max] with voxels of edge `voxelSize`.
 * The last voxel on each axis is clipped to `max`. All voxels share the
 * same texture handles and material.
 */
export function createVoxelizedCube(
  min: Vec3,
  max: Vec3,
  textures: FaceTextures,
  mat: Material,
  voxelSize: number,
): Cube[] {
  if (!(voxelSize > 0)) {
    throw new Error(`voxelSize must be positive, got ${voxelSize}`);
  }
  const steps = [0, 1, 2].map(a => Math.ceil((max[a] - min[a]) / voxelSize));
  const cubes: Cube[] = [];

  for (let i = 0; i < steps[0]; i++) {
    for (let j = 0; j < steps[1]; j++) {
      for (let k = 0; k < steps[2]; k++) {
        const lo: Vec3 = [
          min[0] + i * voxelSize,
          min[1] + j * voxelSize,
          min[2] + k * voxelSize,
        ];
        const hi: Vec3 = [
          Math.min(lo[0] + voxelSize, max[0]),
          Math.min(lo[1] + voxelSize, max[1]),
          Math.min(lo[2] + voxelSize, max[2]),
        ];
        cubes.push(new Cube(lo, hi, mat, textures));
      }
    }
  }
  return cubes;
}

export interface SkyboxFaces {
  front: Texture;
  back: Texture;
  left: Texture;
  right: Texture;
  top: Texture;
  bottom: Texture;
}

/** Thickness of each skybox wall. */
const SKY_WALL = 0.01;

/**
 * Six thin walls enclosing a cube of edge `size` centered at the origin.
 * Each wall uses one texture on all of its faces.
 */
export function createSkybox(faces: SkyboxFaces, size: number): Cube[] {
  if (!(size > 0)) {
    throw new Error(`Skybox size must be positive, got ${size}`);
  }
  const h = size / 2;
  const t = SKY_WALL;
  const sky = material({
    albedo: [1, 0],
    diffuse: Color.white(),
    fresnelColor: Color.white(),
  });
  const wall = (min: Vec3, max: Vec3, tex: Texture) =>
    new Cube(min, max, sky, { top: tex, side: tex, bottom: tex });

  return [
    wall([-h, -h, h], [h, h, h + t], faces.front),
    wall([-h, -h, -h - t], [h, h, -h], faces.back),
    wall([-h - t, -h, -h], [-h, h, h], faces.left),
    wall([h, -h, -h], [h + t, h, h], faces.right),
    wall([-h, h, -h], [h, h + t, h], faces.top),
    wall([-h, -h - t, -h], [h, -h, h], faces.bottom),
  ];
}
