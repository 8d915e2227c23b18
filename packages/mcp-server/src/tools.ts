/**
 * MCP Tool Registrations: 16 tools wrapping the ray tracing kernel.
 *
 * Every tool returns JSON describing the resulting state so the LLM
 * always knows the scene after every operation.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import {
  Camera, Color, Cube, Framebuffer,
  material, solidTexture, checkerTexture, speckleTexture, decodePPM, encodePPM,
  createVoxelizedCube, dayNightCycle, castRay, nearestHit, primaryRay,
  render, resolveRenderOptions, length, normalize,
  type Vec3,
} from '@voxel-tracer/kernel';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as registry from './registry.js';
import { log } from './log.js';

const coord = z.number().finite();
const vec3 = z.tuple([coord, coord, coord]);
const channel = z.number().min(0).max(255);
const rgb = z.tuple([channel, channel, channel]);
const wrapMode = z.enum(['clamp', 'repeat']);
const optionalName = z.string().optional()
  .describe('Optional name (letters, digits, hyphens, underscores only)');

function toColor([r, g, b]: [number, number, number]): Color {
  return new Color(r, g, b);
}

function reply(result: unknown): CallToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(result) }] };
}

/** At least one letter, digit, hyphen or underscore; otherwise only dots. */
const FILENAME = /^[\w.-]*[\w-][\w.-]*$/;

/** File name for a rendered frame; the default is frame_<time>.ppm. */
export function frameFileName(time: number, requested?: string): string {
  const fallback = `frame_${time.toFixed(2)}.ppm`;
  if (requested === undefined) return fallback;
  const safe = requested.replace(/[^a-zA-Z0-9_.-]/g, '_');
  return FILENAME.test(safe) ? safe : fallback;
}

export interface RayRequest {
  origin?: Vec3;
  direction?: Vec3;
  x?: number;
  y?: number;
  width: number;
  height: number;
}

/**
 * A ray from either an explicit direction (origin defaults to the eye)
 * or a pixel of a width x height frame, which always starts at the eye.
 */
export function resolveRay(req: RayRequest, camera: Camera, fov: number): { origin: Vec3; direction: Vec3 } {
  const pixel = req.x !== undefined || req.y !== undefined;
  if (req.direction !== undefined) {
    if (pixel) {
      throw new Error('Give either direction or pixel x and y, not both');
    }
    if (length(req.direction) === 0) {
      throw new Error('direction must be non-zero');
    }
    return { origin: req.origin ?? camera.eye, direction: normalize(req.direction) };
  }
  if (req.x === undefined || req.y === undefined) {
    throw new Error('Give either direction (with optional origin) or pixel x and y');
  }
  if (req.origin !== undefined) {
    throw new Error('origin applies only with direction; pixel rays start at the camera eye');
  }
  if (req.x >= req.width || req.y >= req.height) {
    throw new Error(`pixel (${req.x}, ${req.y}) is outside the ${req.width}x${req.height} frame`);
  }
  return {
    origin: camera.eye,
    direction: primaryRay(camera, req.x, req.y, req.width, req.height, fov),
  };
}

/** Where rendered frames go: $VOXEL_TRACER_OUTPUT_DIR, else $TMPDIR/voxel-tracer. */
export function outputDir(): string {
  return process.env.VOXEL_TRACER_OUTPUT_DIR
    ?? path.join(process.env.TMPDIR ?? '/tmp', 'voxel-tracer');
}

export function registerTools(server: McpServer): void {

  // ─── Textures & materials (3) ─────────────────────────────────

  server.tool(
    'create_texture',
    'Create a procedural texture: a solid color, a checkerboard, or noisy speckle around a base color.',
    {
      kind: z.enum(['solid', 'checker', 'speckle']).describe('Texture generator'),
      color: rgb.describe('Base color [r, g, b], 0-255'),
      color2: rgb.optional().describe('Second checker color (default: black)'),
      cells: z.number().int().min(1).max(256).default(8).describe('Checker cells per side'),
      variation: z.number().min(0).max(1).default(0.15).describe('Speckle brightness variation'),
      size: z.number().int().min(1).max(256).default(16).describe('Speckle texture size in texels'),
      seed: z.number().int().default(1).describe('Speckle noise seed'),
      name: optionalName,
    },
    async ({ kind, color, color2, cells, variation, size, seed, name }) => {
      const base = toColor(color);
      const texture = kind === 'solid'
        ? solidTexture(base)
        : kind === 'checker'
          ? checkerTexture(base, color2 ? toColor(color2) : Color.black(), cells)
          : speckleTexture(base, variation, size, seed);
      return reply(registry.createTexture(texture, kind, name));
    }
  );

  server.tool(
    'load_texture',
    'Load a binary PPM (P6) image from disk as a texture. v = 1 is the top row of the image.',
    {
      file_path: z.string().min(1).describe('Path to a .ppm file'),
      wrap: wrapMode.default('clamp').describe('Behavior outside [0, 1]'),
      name: optionalName,
    },
    async ({ file_path, wrap, name }) => {
      const texture = decodePPM(fs.readFileSync(file_path), wrap);
      return reply(registry.createTexture(texture, 'ppm', name));
    }
  );

  server.tool(
    'create_material',
    'Create a surface material. albedo = [diffuse weight, specular weight]; reflectivity is the Fresnel base reflectance.',
    {
      albedo: z.tuple([z.number().min(0), z.number().min(0)]).default([1, 0]),
      specular: z.number().min(0).default(0).describe('Specular exponent'),
      transparency: z.number().min(0).max(1).default(0).describe('Stored only; not rendered'),
      reflectivity: z.number().min(0).max(1).default(0),
      diffuse: rgb.default([255, 255, 255]).describe('Fallback diffuse color (textures replace it per hit)'),
      fresnel_color: rgb.default([255, 255, 255]).describe('Color blended in at grazing angles'),
      name: optionalName,
    },
    async ({ albedo, specular, transparency, reflectivity, diffuse, fresnel_color, name }) => {
      const mat = material({
        albedo, specular, transparency, reflectivity,
        diffuse: toColor(diffuse),
        fresnelColor: toColor(fresnel_color),
      });
      return reply(registry.createMaterial(mat, name));
    }
  );

  // ─── Blocks (2) ───────────────────────────────────────────────

  server.tool(
    'add_block',
    'Add an axis-aligned block from min to max corner. With voxel_size it is split into voxels of that edge, the last one on each axis clipped.',
    {
      min: vec3.describe('Min corner [x, y, z]'),
      max: vec3.describe('Max corner [x, y, z]'),
      material: z.string().describe('ID of material'),
      top: z.string().describe('ID of texture for the top face'),
      side: z.string().optional().describe('ID of texture for the four vertical faces (default: top)'),
      bottom: z.string().optional().describe('ID of texture for the bottom face (default: side)'),
      voxel_size: z.number().positive().optional().describe('Voxel edge length (default: one cube)'),
      name: optionalName,
    },
    async (params) => {
      const side = params.side ?? params.top;
      const bottom = params.bottom ?? side;
      const faces = registry.faceTextures(params.top, side, bottom);
      const mat = registry.getMaterial(params.material);
      const cubes = params.voxel_size === undefined
        ? [new Cube(params.min, params.max, mat, faces)]
        : createVoxelizedCube(params.min, params.max, faces, mat, params.voxel_size);
      const result = registry.addBlock({
        cubes,
        material: params.material,
        textures: { top: params.top, side, bottom },
      }, params.name);
      return reply(result);
    }
  );

  server.tool(
    'delete_block',
    'Remove a block from the scene.',
    {
      block: z.string().describe('ID of block to delete'),
    },
    async ({ block }) => {
      registry.removeBlock(block);
      return reply({ deleted: block, remaining_objects: registry.snapshot().objects.length });
    }
  );

  // ─── Lights (2) ───────────────────────────────────────────────

  server.tool(
    'add_light',
    'Add a point light. The day/night cycle lights are always present in addition to these.',
    {
      position: vec3.describe('Light position [x, y, z]'),
      color: rgb.default([255, 255, 255]).describe('Stored only; lighting is white'),
      intensity: z.number().min(0).default(1),
      name: optionalName,
    },
    async ({ position, color, intensity, name }) => {
      return reply(registry.addLight({ position, color: toColor(color), intensity }, name));
    }
  );

  server.tool(
    'delete_light',
    'Remove a user light.',
    {
      light: z.string().describe('ID of light to delete'),
    },
    async ({ light }) => {
      registry.removeLight(light);
      return reply({ deleted: light });
    }
  );

  // ─── Camera (3) ───────────────────────────────────────────────

  server.tool(
    'set_camera',
    'Place the camera. It looks from eye toward target; up must not be parallel to the view direction.',
    {
      eye: vec3,
      target: vec3.default([0, 0, 0]),
      up: vec3.default([0, 1, 0]),
      min_distance: z.number().positive().optional().describe('Closest zoom distance (default: 0.5)'),
    },
    async ({ eye, target, up, min_distance }) => {
      registry.setCamera(new Camera(eye, target, up, { minDistance: min_distance }));
      return reply(registry.cameraResult());
    }
  );

  server.tool(
    'orbit_camera',
    'Rotate the eye around the target by yaw (about up) and pitch, in radians. Distance is preserved; pitch stops short of the poles.',
    {
      yaw: coord.default(0),
      pitch: coord.default(0),
    },
    async ({ yaw, pitch }) => {
      registry.getCamera().orbit(yaw, pitch);
      return reply(registry.cameraResult());
    }
  );

  server.tool(
    'zoom_camera',
    'Move the eye toward (positive) or away from (negative) the target.',
    {
      delta: coord,
    },
    async ({ delta }) => {
      registry.getCamera().zoom(delta);
      return reply(registry.cameraResult());
    }
  );

  // ─── Scene (5) ────────────────────────────────────────────────

  server.tool(
    'build_biome',
    'Replace the scene with the cherry blossom demo biome: grass banks, a river, two trees, a bridge and a glowstone lamp inside a skybox.',
    {
      voxel_size: z.number().positive().default(3.75),
      skybox_size: z.number().positive().default(100),
    },
    async ({ voxel_size, skybox_size }) => {
      const start = Date.now();
      const block = registry.loadBiome({ voxelSize: voxel_size, skyboxSize: skybox_size });
      const elapsed = Date.now() - start;
      log('info', { event: 'scene_rebuilt', cubes: block.readback.cube_count, elapsed_ms: elapsed });
      return reply({ ...block, computed_in_ms: elapsed });
    }
  );

  server.tool(
    'set_time',
    'Set or advance the time of day. One full day is 2π; [0, π) is day with a sun, [π, 2π) is night with a moon and the lamp lit.',
    {
      time: coord.optional().describe('Absolute time'),
      advance: coord.optional().describe('Added to the current (or given) time'),
    },
    async ({ time, advance }) => {
      registry.setTime((time ?? registry.getTime()) + (advance ?? 0));
      const state = dayNightCycle(registry.getTime());
      return reply({
        time: registry.getTime(),
        sun_angle: state.sunAngle,
        is_night: state.isNight,
        cycle_lights: state.lights.map((l) => ({
          position: l.position, color: l.color.toString(), intensity: l.intensity,
        })),
      });
    }
  );

  server.tool(
    'cast_ray',
    'Trace one ray and report what it hits and the shaded color. Give either direction (origin defaults to the camera eye), or pixel x and y of a width x height frame seen from the camera.',
    {
      origin: vec3.optional().describe('Ray origin; only with direction'),
      direction: vec3.optional().describe('Normalized before tracing'),
      x: z.number().int().min(0).optional(),
      y: z.number().int().min(0).optional(),
      width: z.number().int().min(1).default(320),
      height: z.number().int().min(1).default(240),
      fov_deg: z.number().gt(0).lt(180).default(60),
    },
    async (params) => {
      const ctx = registry.snapshot();
      const options = resolveRenderOptions({ fov: (params.fov_deg * Math.PI) / 180 });

      const { origin, direction } = resolveRay(params, ctx.camera, options.fov);

      const hit = nearestHit(origin, direction, ctx.objects);
      const color = castRay(
        origin, direction, ctx.objects, ctx.skybox, ctx.lights, ctx.camera, ctx.isNight, options,
      );
      return reply({
        origin,
        direction,
        hit: hit && { point: hit.point, normal: hit.normal, distance: hit.distance },
        color: color.toString(),
      });
    }
  );

  server.tool(
    'render_frame',
    'Render the current scene to a binary PPM image file. Returns the file path and timing.',
    {
      width: z.number().int().min(1).max(4096).default(320),
      height: z.number().int().min(1).max(4096).default(240),
      fov_deg: z.number().gt(0).lt(180).default(60).describe('Vertical field of view in degrees'),
      advance: coord.optional().describe('Advance the time of day by this much before rendering'),
      filename: z.string()
        .regex(FILENAME, 'filename needs a letter, digit, hyphen or underscore and may only add dots')
        .optional()
        .describe('Output filename (default: frame_<time>.ppm)'),
    },
    async (params) => {
      if (params.advance !== undefined) {
        registry.setTime(registry.getTime() + params.advance);
      }
      const ctx = registry.snapshot();
      const fb = new Framebuffer(params.width, params.height);
      const stats = render(fb, ctx, { fov: (params.fov_deg * Math.PI) / 180 });
      const ppm = encodePPM(fb);

      // Write to output directory
      const dir = outputDir();
      fs.mkdirSync(dir, { recursive: true });
      const filePath = path.join(dir, frameFileName(registry.getTime(), params.filename));
      fs.writeFileSync(filePath, ppm);

      const elapsed = Math.round(stats.elapsedMs * 100) / 100;
      log('info', {
        event: 'frame_rendered', width: stats.width, height: stats.height,
        objects: ctx.objects.length, elapsed_ms: elapsed,
      });
      return reply({
        type: 'ppm_frame',
        file_path: filePath,
        file_size_bytes: ppm.byteLength,
        width: stats.width,
        height: stats.height,
        pixels: stats.pixels,
        time: registry.getTime(),
        is_night: ctx.isNight,
        elapsed_ms: elapsed,
      });
    }
  );

  // ─── Session (2) ──────────────────────────────────────────────

  server.tool(
    'get_scene',
    'Describe the whole scene: camera, time, textures, materials, blocks and lights.',
    {},
    async () => reply(registry.describe())
  );

  server.tool(
    'clear_scene',
    'Remove everything and reset the camera and time of day.',
    {},
    async () => {
      registry.clear();
      return reply(registry.describe());
    }
  );
}
