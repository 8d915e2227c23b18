import { describe, it, expect, beforeEach } from 'vitest';
import { Camera, Color, Cube, material, solidTexture, type Light, type Vec3 } from '@voxel-tracer/kernel';
import * as registry from '../src/registry.js';

const white = solidTexture(Color.white());

function block(min: Vec3, max: Vec3): registry.BlockEntry {
  return {
    cubes: [new Cube(min, max, material(), { top: white, side: white, bottom: white })],
    material: null,
    textures: null,
  };
}

beforeEach(() => {
  registry.clear();
});

// ─── Named entries ──────────────────────────────────────────────

describe('textures and materials', () => {
  it('auto-generates sequential ids', () => {
    expect(registry.createTexture(white, 'solid').texture_id).toBe('texture_1');
    expect(registry.createTexture(white, 'solid').texture_id).toBe('texture_2');
    expect(registry.createMaterial(material()).material_id).toBe('material_1');
  });

  it('skips auto ids already taken by a name', () => {
    registry.createTexture(white, 'solid', 'texture_1');
    expect(registry.createTexture(white, 'solid').texture_id).toBe('texture_2');
  });

  it('reads back texture size and material colors', () => {
    const t = registry.createTexture(white, 'solid', 'snow');
    expect(t.readback).toEqual({ width: 1, height: 1 });
    const m = registry.createMaterial(material({ diffuse: new Color(255, 0, 128) }), 'pink');
    expect(m.readback.diffuse).toBe('#ff0080');
    expect(m.readback.albedo).toEqual([1, 0]);
  });

  it('rejects names with other characters', () => {
    expect(() => registry.createTexture(white, 'solid', 'bad name')).toThrow(
      'Invalid texture name "bad name". Use only letters, digits, hyphens, underscores.'
    );
  });

  it('lists what is available when a lookup misses', () => {
    registry.createTexture(white, 'solid', 'snow');
    registry.createTexture(white, 'solid', 'ice');
    expect(() => registry.getTexture('mud')).toThrow(
      'Texture "mud" not found. Available textures: [snow, ice]'
    );
    expect(() => registry.getMaterial('gold')).toThrow(
      'Material "gold" not found. Available materials: []'
    );
  });

  it('builds face sets from texture ids', () => {
    registry.createTexture(white, 'solid', 'snow');
    const faces = registry.faceTextures('snow', 'snow', 'snow');
    expect(faces.top).toBe(white);
    expect(() => registry.faceTextures('snow', 'rock', 'snow')).toThrow('Texture "rock" not found');
  });
});

// ─── Blocks & lights ────────────────────────────────────────────

describe('blocks', () => {
  it('reports cube count and bounds', () => {
    const entry: registry.BlockEntry = {
      ...block([0, 0, 0], [1, 1, 1]),
      cubes: [...block([0, 0, 0], [1, 1, 1]).cubes, ...block([1, -2, 0], [3, 1, 4]).cubes],
    };
    const result = registry.addBlock(entry, 'wall');
    expect(result.block_id).toBe('wall');
    expect(result.readback.cube_count).toBe(2);
    expect(result.readback.bounds).toEqual({ min: [0, -2, 0], max: [3, 1, 4] });
  });

  it('rejects an empty block', () => {
    expect(() => registry.addBlock({ cubes: [], material: null, textures: null })).toThrow('at least one cube');
  });

  it('snapshot concatenates blocks in insertion order', () => {
    const a = block([0, 0, 0], [1, 1, 1]);
    const b = block([5, 0, 0], [6, 1, 1]);
    registry.addBlock(a);
    registry.addBlock(b);
    expect(registry.snapshot().objects).toEqual([...a.cubes, ...b.cubes]);
  });

  it('deletes blocks and refuses unknown ids', () => {
    registry.addBlock(block([0, 0, 0], [1, 1, 1]), 'crate');
    registry.removeBlock('crate');
    expect(registry.snapshot().objects).toHaveLength(0);
    expect(() => registry.removeBlock('crate')).toThrow('Block "crate" not found; cannot delete.');
  });
});

describe('lights', () => {
  it('puts the day/night lights ahead of user lights', () => {
    const lamp: Light = { position: [0, 3, 0], color: Color.white(), intensity: 0.2 };
    registry.addLight(lamp, 'lamp');
    const ctx = registry.snapshot();
    expect(ctx.isNight).toBe(false);
    expect(ctx.lights).toHaveLength(2);
    expect(ctx.lights[1]).toBe(lamp);
  });

  it('lights the lamp at night', () => {
    registry.setTime(Math.PI + 1);
    const ctx = registry.snapshot();
    expect(ctx.isNight).toBe(true);
    expect(ctx.lights).toHaveLength(2);
  });

  it('rejects a non-finite time', () => {
    expect(() => registry.setTime(Infinity)).toThrow('time must be finite');
  });
});

// ─── Scene ──────────────────────────────────────────────────────

describe('scene', () => {
  it('loads the biome as one block with its named textures', () => {
    const result = registry.loadBiome();
    expect(result.block_id).toBe('biome');
    expect(result.readback.cube_count).toBe(129);

    const scene = registry.describe();
    expect(scene.skybox_walls).toBe(6);
    expect(scene.textures.map((t) => t.texture_id)).toContain('grass_top');
    expect(scene.materials.map((m) => m.material_id)).toEqual(
      ['grass', 'wood', 'leaves', 'water', 'glowstone']
    );
  });

  it('clear resets the camera and time', () => {
    registry.setCamera(new Camera([10, 0, 0], [0, 0, 0], [0, 1, 0]));
    registry.setTime(2);
    registry.loadBiome();
    registry.clear();

    const scene = registry.describe();
    expect(scene.time).toBe(0);
    expect(scene.camera.eye).toEqual([0, 5, 35]);
    expect(scene.object_count).toBe(0);
    expect(scene.skybox_walls).toBe(0);
  });
});
