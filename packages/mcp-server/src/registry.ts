/**
 * Scene Registry: in-memory named store for everything a frame reads.
 *
 * Every mutating MCP tool stores its result here and returns
 * a structured readback so the LLM always knows the current state.
 */

import {
  createBiome, dayNightCycle, defaultCamera,
  type Camera, type Cube, type FaceTextures, type Light, type Material,
  type RenderContext, type Texture, type Vec3,
} from '@voxel-tracer/kernel';

const NAME = /^[a-zA-Z0-9_-]+$/;

/** One id → value map with auto-generated ids and readable lookup errors. */
class NamedStore<T> {
  private readonly entries = new Map<string, T>();
  private nextId = 1;

  constructor(
    private readonly label: string,
    private readonly plural: string,
    private readonly prefix: string,
  ) {}

  /** Store under `name`, or a fresh `<prefix>_N` id. A named entry replaces any existing one. */
  put(value: T, name?: string): string {
    if (name !== undefined && !NAME.test(name)) {
      throw new Error(
        `Invalid ${this.label.toLowerCase()} name "${name}". Use only letters, digits, hyphens, underscores.`
      );
    }
    let id = name;
    while (id === undefined || (name === undefined && this.entries.has(id))) {
      id = `${this.prefix}_${this.nextId++}`;
    }
    this.entries.set(id, value);
    return id;
  }

  get(id: string): T {
    const value = this.entries.get(id);
    if (value === undefined) {
      throw new Error(
        `${this.label} "${id}" not found. Available ${this.plural}: [${this.ids().join(', ')}]`
      );
    }
    return value;
  }

  remove(id: string): void {
    if (!this.entries.delete(id)) {
      throw new Error(`${this.label} "${id}" not found; cannot delete.`);
    }
  }

  ids(): string[] {
    return [...this.entries.keys()];
  }

  values(): T[] {
    return [...this.entries.values()];
  }

  list(): [string, T][] {
    return [...this.entries.entries()];
  }

  clear(): void {
    this.entries.clear();
    this.nextId = 1;
  }
}

// ─── Entries ────────────────────────────────────────────────────

export interface TextureEntry {
  texture: Texture;
  /** How it was made: solid, checker, speckle, ppm, biome. */
  kind: string;
}

export interface BlockEntry {
  cubes: Cube[];
  /** Material id, or null for blocks assembled from several materials. */
  material: string | null;
  /** Texture ids per face group, or null for multi-texture blocks. */
  textures: { top: string; side: string; bottom: string } | null;
}

const textures = new NamedStore<TextureEntry>('Texture', 'textures', 'texture');
const materials = new NamedStore<Material>('Material', 'materials', 'material');
const blocks = new NamedStore<BlockEntry>('Block', 'blocks', 'block');
const lights = new NamedStore<Light>('Light', 'lights', 'light');

let skybox: Cube[] = [];
let camera: Camera = defaultCamera();
let time = 0;

// ─── Textures & materials ───────────────────────────────────────

export interface TextureResult {
  texture_id: string;
  kind: string;
  readback: { width: number; height: number };
}

export function createTexture(texture: Texture, kind: string, name?: string): TextureResult {
  const id = textures.put({ texture, kind }, name);
  return textureResult(id, { texture, kind });
}

export function getTexture(id: string): Texture {
  return textures.get(id).texture;
}

function textureResult(id: string, entry: TextureEntry): TextureResult {
  return {
    texture_id: id,
    kind: entry.kind,
    readback: { width: entry.texture.width, height: entry.texture.height },
  };
}

export interface MaterialResult {
  material_id: string;
  readback: {
    albedo: [number, number];
    specular: number;
    transparency: number;
    reflectivity: number;
    diffuse: string;
    fresnel_color: string;
  };
}

export function createMaterial(material: Material, name?: string): MaterialResult {
  const id = materials.put(material, name);
  return materialResult(id, material);
}

export function getMaterial(id: string): Material {
  return materials.get(id);
}

function materialResult(id: string, m: Material): MaterialResult {
  return {
    material_id: id,
    readback: {
      albedo: [m.albedo[0], m.albedo[1]],
      specular: m.specular,
      transparency: m.transparency,
      reflectivity: m.reflectivity,
      diffuse: m.diffuse.toString(),
      fresnel_color: m.fresnelColor.toString(),
    },
  };
}

// ─── Blocks ─────────────────────────────────────────────────────

export interface BlockResult {
  block_id: string;
  readback: {
    cube_count: number;
    bounds: { min: Vec3; max: Vec3 };
    material: string | null;
    textures: BlockEntry['textures'];
  };
}

export function addBlock(entry: BlockEntry, name?: string): BlockResult {
  if (entry.cubes.length === 0) {
    throw new Error('Block must contain at least one cube');
  }
  const id = blocks.put(entry, name);
  return blockResult(id, entry);
}

/** Look up texture ids and build the face set a block draws from. */
export function faceTextures(top: string, side: string, bottom: string): FaceTextures {
  return { top: getTexture(top), side: getTexture(side), bottom: getTexture(bottom) };
}

export function removeBlock(id: string): void {
  blocks.remove(id);
}

function blockResult(id: string, entry: BlockEntry): BlockResult {
  const min: Vec3 = [Infinity, Infinity, Infinity];
  const max: Vec3 = [-Infinity, -Infinity, -Infinity];
  for (const cube of entry.cubes) {
    for (let a = 0; a < 3; a++) {
      min[a] = Math.min(min[a], cube.min[a]);
      max[a] = Math.max(max[a], cube.max[a]);
    }
  }
  return {
    block_id: id,
    readback: {
      cube_count: entry.cubes.length,
      bounds: { min, max },
      material: entry.material,
      textures: entry.textures,
    },
  };
}

// ─── Lights ─────────────────────────────────────────────────────

export interface LightResult {
  light_id: string;
  readback: { position: Vec3; color: string; intensity: number };
}

export function addLight(light: Light, name?: string): LightResult {
  const id = lights.put(light, name);
  return lightResult(id, light);
}

export function removeLight(id: string): void {
  lights.remove(id);
}

function lightResult(id: string, light: Light): LightResult {
  return {
    light_id: id,
    readback: { position: light.position, color: light.color.toString(), intensity: light.intensity },
  };
}

// ─── Camera & time ──────────────────────────────────────────────

export function getCamera(): Camera {
  return camera;
}

export function setCamera(next: Camera): void {
  camera = next;
}

export interface CameraResult {
  eye: Vec3;
  target: Vec3;
  up: Vec3;
  distance: number;
}

export function cameraResult(): CameraResult {
  return { eye: camera.eye, target: camera.target, up: camera.up, distance: camera.distance };
}

export function getTime(): number {
  return time;
}

export function setTime(next: number): void {
  if (!Number.isFinite(next)) {
    throw new Error(`time must be finite, got ${next}`);
  }
  time = next;
}

// ─── Scene ──────────────────────────────────────────────────────

/**
 * The render context for the current state: every block's cubes in
 * insertion order, the day/night lights for the current time followed
 * by the user lights.
 */
export function snapshot(): RenderContext {
  const cycle = dayNightCycle(time);
  return {
    objects: blocks.values().flatMap((b) => b.cubes),
    skybox,
    lights: [...cycle.lights, ...lights.values()],
    camera,
    isNight: cycle.isNight,
  };
}

export interface SceneReadback {
  time: number;
  is_night: boolean;
  camera: CameraResult;
  object_count: number;
  skybox_walls: number;
  textures: TextureResult[];
  materials: MaterialResult[];
  blocks: BlockResult[];
  lights: LightResult[];
}

export function describe(): SceneReadback {
  const ctx = snapshot();
  return {
    time,
    is_night: ctx.isNight,
    camera: cameraResult(),
    object_count: ctx.objects.length,
    skybox_walls: skybox.length,
    textures: textures.list().map(([id, entry]) => textureResult(id, entry)),
    materials: materials.list().map(([id, m]) => materialResult(id, m)),
    blocks: blocks.list().map(([id, entry]) => blockResult(id, entry)),
    lights: lights.list().map(([id, light]) => lightResult(id, light)),
  };
}

/**
 * Replace the whole scene with the demo biome. Its textures and
 * materials are registered under their biome names, all voxels go into
 * one "biome" block and the camera returns to its default pose.
 */
export function loadBiome(options: { voxelSize?: number; skyboxSize?: number } = {}): BlockResult {
  const biome = createBiome(options);
  clear();
  for (const [id, texture] of Object.entries(biome.textures)) {
    textures.put({ texture, kind: 'biome' }, id);
  }
  for (const [id, material] of Object.entries(biome.materials)) {
    materials.put(material, id);
  }
  skybox = biome.skybox;
  return addBlock({ cubes: biome.objects, material: null, textures: null }, 'biome');
}

/** Reset to an empty scene at time 0 with the default camera. */
export function clear(): void {
  textures.clear();
  materials.clear();
  blocks.clear();
  lights.clear();
  skybox = [];
  camera = defaultCamera();
  time = 0;
}
