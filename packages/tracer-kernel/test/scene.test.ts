import { describe, it, expect } from 'vitest';
import {
  Color, Framebuffer, material, solidTexture,
  createVoxelizedCube, createSkybox, createBiome, defaultCamera, dayNightCycle, glowstoneLight,
  nearestHit, render, DAY_SKY,
} from '../src/index.js';
import type { FaceTextures, SkyboxFaces, Vec3 } from '../src/index.js';

const EPSILON = 1e-9;

function near(actual: number, expected: number, tol = EPSILON) {
  expect(Math.abs(actual - expected)).toBeLessThan(tol);
}

const white = solidTexture(Color.white());
const faces: FaceTextures = { top: white, side: white, bottom: white };

// ─── Voxelization ───────────────────────────────────────────────

describe('createVoxelizedCube', () => {
  it('rounds the voxel count up on every axis', () => {
    const cubes = createVoxelizedCube([0, 0, 0], [10, 5, 5], faces, material(), 4);
    expect(cubes).toHaveLength(3 * 2 * 2);
  });

  it('clips the last voxel to the box', () => {
    const cubes = createVoxelizedCube([0, 0, 0], [10, 5, 5], faces, material(), 4);
    const last = cubes[cubes.length - 1];
    expect(last.min).toEqual([8, 4, 4]);
    expect(last.max).toEqual([10, 5, 5]);
  });

  it('shares texture handles and material across voxels', () => {
    const mat = material({ albedo: [0.5, 0.5] });
    const cubes = createVoxelizedCube([0, 0, 0], [2, 2, 2], faces, mat, 1);
    expect(cubes).toHaveLength(8);
    for (const cube of cubes) {
      expect(cube.top).toBe(white);
      expect(cube.material).toBe(mat);
    }
  });

  it('rejects a non-positive voxel size', () => {
    expect(() => createVoxelizedCube([0, 0, 0], [1, 1, 1], faces, material(), 0))
      .toThrow('voxelSize must be positive');
  });
});

// ─── Skybox ─────────────────────────────────────────────────────

describe('createSkybox', () => {
  const sky: SkyboxFaces = {
    front: white, back: white, left: white, right: white, top: white, bottom: white,
  };

  it('builds six walls', () => {
    expect(createSkybox(sky, 100)).toHaveLength(6);
  });

  it('encloses the origin at half the size on every axis', () => {
    const walls = createSkybox(sky, 100);
    const axes: Vec3[] = [[1, 0, 0], [-1, 0, 0], [0, 1, 0], [0, -1, 0], [0, 0, 1], [0, 0, -1]];
    for (const dir of axes) {
      const hit = nearestHit([0, 0, 0], dir, walls);
      expect(hit).not.toBeNull();
      near(hit?.distance ?? NaN, 50);
    }
  });

  it('rejects a non-positive size', () => {
    expect(() => createSkybox(sky, -1)).toThrow('Skybox size must be positive');
  });
});

// ─── Biome ──────────────────────────────────────────────────────

describe('createBiome', () => {
  it('voxelizes the layout at the default block size', () => {
    const biome = createBiome();
    expect(biome.objects).toHaveLength(129);
    expect(biome.skybox).toHaveLength(6);
  });

  it('renders the bridge at the center of the default view', () => {
    const biome = createBiome();
    const { lights, isNight } = dayNightCycle(Math.PI / 4);
    const fb = new Framebuffer(8, 6);
    render(fb, { objects: biome.objects, skybox: biome.skybox, lights, camera: defaultCamera(), isNight });

    const hit = nearestHit([0, 5, 35], [0, -5 / Math.hypot(5, 35), -35 / Math.hypot(5, 35)], biome.objects);
    expect(hit?.normal).toEqual([0, 0, 1]);
    near(hit?.point[2] ?? NaN, 3, 1e-9);
    expect(fb.getPixel(4, 3)).not.toBe(DAY_SKY.toHex());
  });
});

// ─── Day / night ────────────────────────────────────────────────

describe('dayNightCycle', () => {
  it('has one sun on the horizon at time 0', () => {
    const state = dayNightCycle(0);
    expect(state.isNight).toBe(false);
    expect(state.lights).toHaveLength(1);
    const [sun] = state.lights;
    near(sun.position[0], 15);
    near(sun.position[1], 0);
    near(sun.position[2], 15);
    expect(sun.intensity).toBe(1);
  });

  it('switches to moon and lamp after π', () => {
    const state = dayNightCycle(Math.PI + 0.5);
    expect(state.isNight).toBe(true);
    expect(state.lights).toHaveLength(2);
    expect(state.lights[0].intensity).toBe(0.5);
    expect(state.lights[1]).toEqual(glowstoneLight());
  });

  it('wraps negative time into the cycle', () => {
    const state = dayNightCycle(-Math.PI / 2);
    expect(state.isNight).toBe(true);
    near(state.sunAngle, 1.5 * Math.PI);
  });
});
