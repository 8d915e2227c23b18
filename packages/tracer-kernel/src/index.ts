// Public API
export type { Vec3 } from './vec3.js';
export { add, sub, scale, dot, cross, length, normalize } from './vec3.js';
export { Color } from './color.js';

// Materials & textures
export type { Material, MaterialOptions } from './material.js';
export { material, withDiffuse } from './material.js';
export type { Texture, WrapMode } from './texture.js';
export { ImageTexture, proceduralTexture, solidTexture, checkerTexture, speckleTexture } from './texture.js';
export { encodePPM, decodePPM } from './ppm.js';

// Geometry
export type { Hit, FaceTextures, FaceName } from './cube.js';
export { Cube, FACE_EPSILON } from './cube.js';

// Camera
export type { CameraBasis, CameraOptions } from './camera.js';
export { Camera } from './camera.js';

// Lighting
export type { Light, SurfaceProbe } from './light.js';
export { reflect, castShadow, calculateLighting, fresnel, SHADOW_BIAS } from './light.js';

// Frame
export { Framebuffer } from './framebuffer.js';
export type { RenderOptions, ResolvedRenderOptions, RenderStats } from './render.js';
export {
  render, renderRows, castRay, nearestHit, primaryRay, resolveRenderOptions,
  DAY_SKY, NIGHT_SKY,
} from './render.js';

// Scene building
export type { RenderContext, SkyboxFaces } from './scene.js';
export { createVoxelizedCube, createSkybox } from './scene.js';
export type { Biome, BiomeOptions, BiomeTexture, BiomeMaterial, LightingState } from './biome.js';
export { createBiome, defaultCamera, dayNightCycle, glowstoneLight } from './biome.js';
