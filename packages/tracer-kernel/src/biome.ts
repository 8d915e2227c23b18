/**
 * Demo scene: a cherry blossom biome.
 *
 * Two grass banks split by a river, a hill, two cherry trees, a plank
 * bridge and a glowstone lamp on a post, all voxelized at the same
 * block size inside a sky shell. Block art is procedural.
 *
 * Also owns the day/night cycle that animates the lights between frames.
 */

import type { Vec3 } from './vec3.js';
import { Color } from './color.js';
import { Camera } from './camera.js';
import type { Cube, FaceTextures } from './cube.js';
import type { Light } from './light.js';
import { material, type Material } from './material.js';
import { speckleTexture, type Texture } from './texture.js';
import { createVoxelizedCube, createSkybox } from './scene.js';

export interface BiomeOptions {
  /** Voxel edge length. Default 3.75. */
  voxelSize?: number;
  /** Skybox edge length. Default 100. */
  skyboxSize?: number;
}

export type BiomeTexture =
  | 'grass_top' | 'grass_side' | 'dirt' | 'cherry_log' | 'wood_plank'
  | 'cherry_leaves' | 'water' | 'glowstone' | 'sky' | 'sky_horizon';

export type BiomeMaterial = 'grass' | 'wood' | 'leaves' | 'water' | 'glowstone';

export interface Biome {
  objects: Cube[];
  skybox: Cube[];
  textures: Record<BiomeTexture, Texture>;
  materials: Record<BiomeMaterial, Material>;
}

// ─── Block art ──────────────────────────────────────────────────

function biomeTextures(): Record<BiomeTexture, Texture> {
  return {
    grass_top: speckleTexture(new Color(95, 159, 53), 0.18, 16, 1),
    grass_side: speckleTexture(new Color(121, 85, 58), 0.2, 16, 2),
    dirt: speckleTexture(new Color(134, 96, 67), 0.2, 16, 3),
    cherry_log: speckleTexture(new Color(84, 52, 58), 0.15, 16, 4),
    wood_plank: speckleTexture(new Color(226, 178, 172), 0.1, 16, 5),
    cherry_leaves: speckleTexture(new Color(240, 170, 200), 0.15, 16, 6),
    water: speckleTexture(new Color(50, 90, 200), 0.1, 16, 7),
    glowstone: speckleTexture(new Color(250, 210, 120), 0.2, 16, 8),
    sky: speckleTexture(new Color(120, 170, 235), 0.04, 8, 9),
    sky_horizon: speckleTexture(new Color(170, 200, 240), 0.04, 8, 10),
  };
}

function biomeMaterials(): Record<BiomeMaterial, Material> {
  return {
    grass: material({
      albedo: [0.9, 0.3], specular: 0.05, reflectivity: 0.1,
      diffuse: new Color(34, 139, 34), fresnelColor: new Color(255, 255, 255),
    }),
    wood: material({
      albedo: [0.6, 0.2], specular: 0.1, reflectivity: 0.2,
      diffuse: new Color(160, 82, 45), fresnelColor: new Color(200, 200, 200),
    }),
    leaves: material({
      albedo: [0.5, 0.1], specular: 0.1, reflectivity: 0.1,
      diffuse: new Color(255, 182, 193), fresnelColor: new Color(255, 200, 220),
    }),
    water: material({
      albedo: [0.4, 0.3], specular: 0.8, transparency: 0.7, reflectivity: 0.5,
      diffuse: new Color(0, 0, 255), fresnelColor: new Color(63, 96, 188),
    }),
    glowstone: material({
      albedo: [1.0, 0.9], specular: 0.3, reflectivity: 0.5,
      diffuse: new Color(255, 215, 0), fresnelColor: new Color(255, 255, 200),
    }),
  };
}

// ─── Layout ─────────────────────────────────────────────────────

interface BlockSpec {
  min: Vec3;
  max: Vec3;
  /** [top, side, bottom] */
  faces: [BiomeTexture, BiomeTexture, BiomeTexture];
  material: BiomeMaterial;
}

const GRASS: BlockSpec['faces'] = ['grass_top', 'grass_side', 'dirt'];
const LOG: BlockSpec['faces'] = ['cherry_log', 'cherry_log', 'cherry_log'];
const LEAVES: BlockSpec['faces'] = ['cherry_leaves', 'cherry_leaves', 'cherry_leaves'];

const LAYOUT: BlockSpec[] = [
  // banks and river bed
  { min: [-10, -5.5, -10], max: [-2, 0, 10], faces: GRASS, material: 'grass' },
  { min: [-2, -5.5, -10], max: [2, -2.75, 10], faces: GRASS, material: 'grass' },
  { min: [2, -5.5, -10], max: [10, 0, 10], faces: GRASS, material: 'grass' },
  { min: [-2, -3, -10], max: [2, -0.5, 10], faces: ['water', 'water', 'water'], material: 'water' },
  // hill
  { min: [-10, 0, -10], max: [-3, 3, -2], faces: GRASS, material: 'grass' },
  // first tree
  { min: [-7.5, -1, -7.5], max: [-5.5, 7, -5.5], faces: LOG, material: 'wood' },
  { min: [-9.5, 7, -9.5], max: [-3.5, 9.75, -3.5], faces: LEAVES, material: 'leaves' },
  { min: [-8.5, 9.75, -8.5], max: [-4.5, 12.5, -4.5], faces: LEAVES, material: 'leaves' },
  // second tree
  { min: [6.5, -1, 6.5], max: [8.5, 5, 8.5], faces: LOG, material: 'wood' },
  { min: [4.5, 5, 4.5], max: [10.5, 7.75, 10.5], faces: LEAVES, material: 'leaves' },
  { min: [5.5, 7.75, 5.5], max: [9.5, 10.5, 9.5], faces: LEAVES, material: 'leaves' },
  // bridge, post and lamp
  { min: [-5, 0, 1], max: [5, 1, 3], faces: ['wood_plank', 'wood_plank', 'wood_plank'], material: 'wood' },
  { min: [6.5, 0, -8], max: [7, 5, -7], faces: LOG, material: 'wood' },
  { min: [5.5, 5, -8.5], max: [8.5, 7.75, -5.75], faces: ['glowstone', 'glowstone', 'glowstone'], material: 'glowstone' },
];

export function createBiome(options: BiomeOptions = {}): Biome {
  const voxelSize = options.voxelSize ?? 3.75;
  const skyboxSize = options.skyboxSize ?? 100;
  const textures = biomeTextures();
  const materials = biomeMaterials();

  const objects: Cube[] = [];
  for (const block of LAYOUT) {
    const [top, side, bottom] = block.faces;
    const faces: FaceTextures = { top: textures[top], side: textures[side], bottom: textures[bottom] };
    objects.push(...createVoxelizedCube(block.min, block.max, faces, materials[block.material], voxelSize));
  }

  const skybox = createSkybox({
    front: textures.sky_horizon,
    back: textures.sky,
    left: textures.sky,
    right: textures.sky,
    top: textures.sky_horizon,
    bottom: textures.sky,
  }, skyboxSize);

  return { objects, skybox, textures, materials };
}

export function defaultCamera(): Camera {
  return new Camera([0, 5, 35], [0, 0, 0], [0, 1, 0]);
}

// ─── Day / night ────────────────────────────────────────────────

export interface LightingState {
  lights: Light[];
  isNight: boolean;
  /** Sun angle in [0, 2π); night is [π, 2π). */
  sunAngle: number;
}

const SUN_COLOR = new Color(255, 255, 224);
const MOON_COLOR = new Color(135, 206, 235);

/** Lamp light centered in the glowstone block, lit only at night. */
export function glowstoneLight(): Light {
  return { position: [7, 6.375, -7.125], color: new Color(255, 223, 0), intensity: 0.01 };
}

function orbitPosition(angle: number): Vec3 {
  return [15 * Math.cos(angle), 25 * Math.sin(angle), 15];
}

/** Lights for a point in the cycle; one full day is 2π time units. */
export function dayNightCycle(time: number): LightingState {
  const TAU = 2 * Math.PI;
  const sunAngle = ((time % TAU) + TAU) % TAU;
  const isNight = sunAngle >= Math.PI;

  if (!isNight) {
    return {
      lights: [{ position: orbitPosition(sunAngle), color: SUN_COLOR, intensity: 1 }],
      isNight,
      sunAngle,
    };
  }

  const moonAngle = (sunAngle + Math.PI) % TAU;
  return {
    lights: [
      { position: orbitPosition(moonAngle), color: MOON_COLOR, intensity: 0.5 },
      glowstoneLight(),
    ],
    isNight,
    sunAngle,
  };
}
