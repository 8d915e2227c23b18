/**
 * Frame compositor: one primary ray per pixel.
 *
 *   pixel → camera-space ray → world ray → nearest cube → lighting
 *         → Fresnel tint → packed color
 *
 * Pixels are independent: renderRows() over disjoint row bands is the
 * seam for splitting a frame across workers.
 */

import type { Vec3 } from './vec3.js';
import { sub, normalize } from './vec3.js';
import { Color } from './color.js';
import type { Cube, Hit } from './cube.js';
import type { Light } from './light.js';
import { calculateLighting, fresnel } from './light.js';
import type { Camera } from './camera.js';
import type { Framebuffer } from './framebuffer.js';
import type { RenderContext } from './scene.js';

export const DAY_SKY = new Color(63, 96, 188);
export const NIGHT_SKY = new Color(10, 10, 30);

// ─── Options ────────────────────────────────────────────────────

export interface RenderOptions {
  /** Vertical field of view in radians. Default π/3. */
  fov?: number;
  /** Background where both scene and skybox miss, by day. */
  dayColor?: Color;
  /** Same, by night. */
  nightColor?: Color;
}

export function resolveRenderOptions(options?: RenderOptions) {
  const opts = {
    fov: options?.fov ?? Math.PI / 3,
    dayColor: options?.dayColor ?? DAY_SKY,
    nightColor: options?.nightColor ?? NIGHT_SKY,
  };
  if (!(opts.fov > 0 && opts.fov < Math.PI)) {
    throw new Error(`fov must be in (0, π) radians, got ${opts.fov}`);
  }
  return opts;
}

export type ResolvedRenderOptions = ReturnType<typeof resolveRenderOptions>;

export interface RenderStats {
  width: number;
  height: number;
  pixels: number;
  elapsedMs: number;
}

// ─── Ray casting ────────────────────────────────────────────────

/** Nearest hit along the ray; the earlier object wins an exact tie. */
export function nearestHit(origin: Vec3, direction: Vec3, objects: readonly Cube[]): Hit | null {
  let closest: Hit | null = null;
  let zbuffer = Infinity;
  for (const object of objects) {
    const hit = object.rayIntersect(origin, direction);
    if (hit && hit.distance < zbuffer) {
      zbuffer = hit.distance;
      closest = hit;
    }
  }
  return closest;
}

/** Shade one ray. */
export function castRay(
  origin: Vec3,
  direction: Vec3,
  objects: readonly Cube[],
  skybox: readonly Cube[],
  lights: readonly Light[],
  camera: Pick<Camera, 'eye'>,
  isNight: boolean,
  options: Pick<ResolvedRenderOptions, 'dayColor' | 'nightColor'> = resolveRenderOptions(),
): Color {
  const hit = nearestHit(origin, direction, objects);

  if (!hit) {
    for (const wall of skybox) {
      const skyHit = wall.rayIntersect(origin, direction);
      if (skyHit) return skyHit.material.diffuse;
    }
    return isNight ? options.nightColor : options.dayColor;
  }

  const { point, normal, material } = hit;
  const viewDir = normalize(sub(camera.eye, point));
  const lit = calculateLighting(point, normal, viewDir, material, lights, objects);

  // Reflectivity enters twice: as f0 and again as the blend weight.
  const f = fresnel(normal, viewDir, material.reflectivity);
  return lit.lerp(material.fresnelColor, f * material.reflectivity);
}

/** World-space ray direction through pixel (x, y). */
export function primaryRay(
  camera: Camera,
  x: number,
  y: number,
  width: number,
  height: number,
  fov: number,
): Vec3 {
  const aspect = width / height;
  const perspective = Math.tan(fov / 2);
  const sx = ((2 * x) / width - 1) * aspect * perspective;
  const sy = (1 - (2 * y) / height) * perspective;
  return camera.baseChange(normalize([sx, sy, -1]));
}

// ─── Frame ──────────────────────────────────────────────────────

/** Render rows [yStart, yEnd) into the framebuffer without clearing it. */
export function renderRows(
  fb: Framebuffer,
  ctx: RenderContext,
  yStart: number,
  yEnd: number,
  options?: RenderOptions,
): void {
  const opts = resolveRenderOptions(options);
  const y1 = Math.min(yEnd, fb.height);
  for (let y = Math.max(0, yStart); y < y1; y++) {
    for (let x = 0; x < fb.width; x++) {
      const dir = primaryRay(ctx.camera, x, y, fb.width, fb.height, opts.fov);
      const color = castRay(
        ctx.camera.eye, dir, ctx.objects, ctx.skybox, ctx.lights, ctx.camera, ctx.isNight, opts,
      );
      fb.drawPixel(x, y, color.toHex());
    }
  }
}

/** Clear the framebuffer to black and render every pixel. */
export function render(fb: Framebuffer, ctx: RenderContext, options?: RenderOptions): RenderStats {
  const opts = resolveRenderOptions(options);
  const t0 = performance.now();
  fb.clear(0x000000);
  renderRows(fb, ctx, 0, fb.height, opts);
  return {
    width: fb.width,
    height: fb.height,
    pixels: fb.width * fb.height,
    elapsedMs: performance.now() - t0,
  };
}
