/**
 * Point lights, hard shadows and the diffuse + specular shading model.
 *
 * Shadows: one feeler ray per light, scanned against the object list in
 * order. The first occluder found sets the attenuation and ends the scan;
 * several overlapping occluders do not darken further.
 */

import type { Vec3 } from './vec3.js';
import { add, sub, scale, dot, length, normalize, negate } from './vec3.js';
import { Color } from './color.js';
import type { Material } from './material.js';
import type { Cube } from './cube.js';

export interface Light {
  position: Vec3;
  color: Color;
  intensity: number;
}

/** A surface sample to cast shadow feelers from. */
export interface SurfaceProbe {
  point: Vec3;
  normal: Vec3;
}

/** Shadow-ray origin offset along the normal, against self-intersection. */
export const SHADOW_BIAS = 1e-4;

/** Mirror an incident direction about a unit normal. */
export function reflect(incident: Vec3, normal: Vec3): Vec3 {
  return sub(incident, scale(normal, 2 * dot(incident, normal)));
}

/**
 * Shadow intensity in [0, 1] at a surface point for one light.
 * 0 = unoccluded; an occluder at hit distance d attenuates by
 * 1 - (d / lightDistance)², so occluders near the surface dominate.
 */
export function castShadow(probe: SurfaceProbe, light: Light, objects: readonly Cube[]): number {
  const toLight = sub(light.position, probe.point);
  const lightDistance = length(toLight);
  const lightDir = normalize(toLight);

  const offset = scale(probe.normal, SHADOW_BIAS);
  const origin = dot(lightDir, probe.normal) < 0
    ? sub(probe.point, offset)
    : add(probe.point, offset);

  for (const object of objects) {
    const hit = object.rayIntersect(origin, lightDir);
    if (hit && hit.distance < lightDistance) {
      const ratio = hit.distance / lightDistance;
      return 1 - Math.min(1, ratio * ratio);
    }
  }
  return 0;
}

/**
 * Direct lighting at a surface point, summed over all lights.
 * The sum is not clamped; packing saturates it later.
 */
export function calculateLighting(
  point: Vec3,
  normal: Vec3,
  viewDir: Vec3,
  material: Material,
  lights: readonly Light[],
  objects: readonly Cube[],
): Color {
  let result = Color.black();
  const probe: SurfaceProbe = { point, normal };

  for (const light of lights) {
    const shadow = castShadow(probe, light, objects);
    const intensity = light.intensity * (1 - shadow);
    const lightDir = normalize(sub(light.position, point));

    const diffuseFactor = Math.max(0, dot(normal, lightDir));
    const diffuse = material.diffuse.scale(diffuseFactor * material.albedo[0] * intensity);

    const reflectDir = reflect(negate(lightDir), normal);
    const specularFactor = Math.max(0, dot(reflectDir, viewDir)) ** material.specular;
    const specular = Color.white().scale(specularFactor * material.albedo[1] * intensity);

    result = result.add(diffuse).add(specular);
  }

  return result;
}

/** Schlick's approximation: f0 + (1 - f0)(1 - cos θ)^5. */
export function fresnel(normal: Vec3, viewDir: Vec3, f0: number): number {
  const cosTheta = Math.max(0, dot(normal, viewDir));
  return f0 + (1 - f0) * (1 - cosTheta) ** 5;
}
