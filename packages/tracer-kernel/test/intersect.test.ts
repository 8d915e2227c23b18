import { describe, it, expect } from 'vitest';
import { Cube, Color, material, solidTexture, proceduralTexture } from '../src/index.js';
import type { Vec3, FaceTextures } from '../src/index.js';

const RED = new Color(255, 0, 0);
const GREEN = new Color(0, 255, 0);
const BLUE = new Color(0, 0, 255);

const faces: FaceTextures = {
  top: solidTexture(RED),
  side: solidTexture(GREEN),
  bottom: solidTexture(BLUE),
};

function unitCube(textures: FaceTextures = faces): Cube {
  return new Cube([0, 0, 0], [1, 1, 1], material({ albedo: [0.7, 0.2], specular: 8 }), textures);
}

describe('Cube.rayIntersect: misses', () => {
  const cube = unitCube();

  it('misses a ray entirely outside the box extent', () => {
    expect(cube.rayIntersect([5, 5, 5], [1, 0, 0])).toBeNull();
  });

  it('misses a box behind the ray origin', () => {
    expect(cube.rayIntersect([0.5, 0.5, 5], [0, 0, 1])).toBeNull();
  });

  it('misses when the ray starts inside the box', () => {
    expect(cube.rayIntersect([0.5, 0.5, 0.5], [0, 0, -1])).toBeNull();
  });

  it('misses a parallel ray passing beside the box', () => {
    expect(cube.rayIntersect([2, 0.5, 5], [0, 0, -1])).toBeNull();
  });
});

describe('Cube.rayIntersect: hits', () => {
  const cube = unitCube();

  it('hits the front face head-on', () => {
    const hit = cube.rayIntersect([0.5, 0.5, 5], [0, 0, -1]);
    expect(hit).not.toBeNull();
    expect(hit?.point).toEqual([0.5, 0.5, 1]);
    expect(hit?.normal).toEqual([0, 0, 1]);
    expect(hit?.distance).toBe(4);
  });

  it('misses when the origin lies on a slab plane of a parallel axis', () => {
    // x: (0 - 0) / 0 is NaN
    expect(cube.rayIntersect([0, 0.5, 5], [0, 0, -1])).toBeNull();
    expect(cube.rayIntersect([0.5, 1, 5], [0, 0, -1])).toBeNull();
    expect(cube.rayIntersect([0.5, 0.5, 5], [0, 0, -1])).not.toBeNull();
  });

  it('carries the cube material with a texture-derived diffuse', () => {
    const hit = cube.rayIntersect([0.5, 5, 0.5], [0, -1, 0]);
    expect(hit?.material.albedo).toEqual([0.7, 0.2]);
    expect(hit?.material.specular).toBe(8);
    expect(hit?.material.diffuse.equals(RED)).toBe(true);
    // base material untouched
    expect(cube.material.diffuse.equals(Color.white())).toBe(true);
  });
});

describe('Face classification', () => {
  const cube = unitCube();
  const cases: { face: string; origin: Vec3; dir: Vec3; normal: Vec3; color: Color }[] = [
    { face: 'top',    origin: [0.5, 5, 0.5],  dir: [0, -1, 0], normal: [0, 1, 0],  color: RED },
    { face: 'bottom', origin: [0.5, -4, 0.5], dir: [0, 1, 0],  normal: [0, -1, 0], color: BLUE },
    { face: 'left',   origin: [-4, 0.5, 0.5], dir: [1, 0, 0],  normal: [-1, 0, 0], color: GREEN },
    { face: 'right',  origin: [5, 0.5, 0.5],  dir: [-1, 0, 0], normal: [1, 0, 0],  color: GREEN },
    { face: 'back',   origin: [0.5, 0.5, -4], dir: [0, 0, 1],  normal: [0, 0, -1], color: GREEN },
    { face: 'front',  origin: [0.5, 0.5, 5],  dir: [0, 0, -1], normal: [0, 0, 1],  color: GREEN },
  ];

  for (const c of cases) {
    it(`${c.face} face center reports only the ${c.face} normal and texture`, () => {
      const hit = cube.rayIntersect(c.origin, c.dir);
      expect(hit).not.toBeNull();
      if (!hit) return;
      expect(hit.distance).toBe(4);
      expect(hit.normal).toEqual(c.normal);
      expect(cube.faceAt(hit.point)).toBe(c.face);
      expect(hit.material.diffuse.equals(c.color)).toBe(true);
    });
  }

  it('a point on the top face never reports a side normal', () => {
    for (const [x, z] of [[0.2, 0.3], [0.8, 0.1], [0.5, 0.9]]) {
      const hit = cube.rayIntersect([x, 3, z], [0, -1, 0]);
      expect(hit?.normal).toEqual([0, 1, 0]);
    }
  });
});

describe('Per-face UV', () => {
  // 2x2 texture, texels named by (column, row from top)
  const A = new Color(10, 0, 0), B = new Color(20, 0, 0);
  const C = new Color(30, 0, 0), D = new Color(40, 0, 0);
  const quad = proceduralTexture(2, 2, (x, y) => [[A, B], [C, D]][y][x], 'clamp');
  const cube = unitCube({ top: quad, side: quad, bottom: quad });

  it('top face: u from x, v from z', () => {
    // u=0.25 → column 0; v=0.25 → row 1 (v grows upward)
    expect(cube.rayIntersect([0.25, 5, 0.25], [0, -1, 0])?.material.diffuse.equals(C)).toBe(true);
    expect(cube.rayIntersect([0.75, 5, 0.75], [0, -1, 0])?.material.diffuse.equals(B)).toBe(true);
  });

  it('left/right faces: u from z, v from y', () => {
    // right face at z=0.75 (u), y=0.25 (v)
    expect(cube.rayIntersect([5, 0.25, 0.75], [-1, 0, 0])?.material.diffuse.equals(D)).toBe(true);
  });

  it('front/back faces: u from x, v from y', () => {
    expect(cube.rayIntersect([0.25, 0.75, 5], [0, 0, -1])?.material.diffuse.equals(A)).toBe(true);
    expect(cube.rayIntersect([0.75, 0.25, 5], [0, 0, -1])?.material.diffuse.equals(D)).toBe(true);
  });
});

describe('Cube construction', () => {
  it('rejects inverted corners', () => {
    expect(() => new Cube([0, 2, 0], [1, 1, 1], material(), faces))
      .toThrow('Cube min must be <= max');
  });

  it('shares texture handles instead of copying them', () => {
    const a = unitCube();
    const b = new Cube([2, 0, 0], [3, 1, 1], material(), faces);
    expect(a.side).toBe(b.side);
  });
});
