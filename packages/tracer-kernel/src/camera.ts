/**
 * Orbiting look-at camera.
 *
 * Camera space: x = right, y = up, z = backward (rays look down -z).
 * The world-space basis is recomputed on every orbit/zoom, so
 * baseChange() never sees a stale basis. A move that would leave the
 * basis degenerate throws and leaves the camera where it was.
 */

import type { Vec3 } from './vec3.js';
import { add, sub, scale, cross, length, normalize } from './vec3.js';

export interface CameraBasis {
  forward: Vec3;
  right: Vec3;
  up: Vec3;
}

export interface CameraOptions {
  /** Closest the eye may get to the target. Default 0.5. */
  minDistance?: number;
}

/** Pitch stays this far away from the poles. */
const POLE_MARGIN = 0.1;
const MAX_PITCH = Math.PI / 2 - POLE_MARGIN;
const DEGENERATE_EPS = 1e-9;

export class Camera {
  private _eye: Vec3;
  private _basis: CameraBasis;
  readonly minDistance: number;

  constructor(
    eye: Vec3,
    readonly target: Vec3,
    readonly up: Vec3,
    options: CameraOptions = {},
  ) {
    this.minDistance = options.minDistance ?? 0.5;
    if (!(this.minDistance > 0)) {
      throw new Error(`minDistance must be positive, got ${this.minDistance}`);
    }
    this._eye = [eye[0], eye[1], eye[2]];
    this._basis = computeBasis(this._eye, target, up);
  }

  get eye(): Vec3 { return this._eye; }
  get basis(): CameraBasis { return this._basis; }

  /** Distance from eye to target. */
  get distance(): number {
    return length(sub(this._eye, this.target));
  }

  /**
   * Rotate the eye around the target (radians). Distance is preserved;
   * pitch is clamped short of the poles.
   */
  orbit(deltaYaw: number, deltaPitch: number): void {
    const offset = sub(this._eye, this.target);
    const r = length(offset);
    const yaw = Math.atan2(offset[2], offset[0]) + deltaYaw;
    const pitch = Math.asin(clamp(offset[1] / r, -1, 1)) + deltaPitch;
    const p = clamp(pitch, -MAX_PITCH, MAX_PITCH);

    this.moveTo(add(this.target, [
      r * Math.cos(yaw) * Math.cos(p),
      r * Math.sin(p),
      r * Math.sin(yaw) * Math.cos(p),
    ]));
  }

  /** Move the eye toward the target by delta (negative backs away). */
  zoom(delta: number): void {
    const offset = sub(this.target, this._eye);
    const d = length(offset);
    const next = Math.max(this.minDistance, d - delta);
    this.moveTo(sub(this.target, scale(offset, next / d)));
  }

  /** Eye and basis change together or not at all. */
  private moveTo(eye: Vec3): void {
    const basis = computeBasis(eye, this.target, this.up);
    this._eye = eye;
    this._basis = basis;
  }

  /** Camera-space direction → world-space direction. */
  baseChange(dir: Vec3): Vec3 {
    const { forward, right, up } = this._basis;
    return [
      dir[0] * right[0] + dir[1] * up[0] - dir[2] * forward[0],
      dir[0] * right[1] + dir[1] * up[1] - dir[2] * forward[1],
      dir[0] * right[2] + dir[1] * up[2] - dir[2] * forward[2],
    ];
  }
}

function computeBasis(eye: Vec3, target: Vec3, up: Vec3): CameraBasis {
  const view = sub(target, eye);
  if (length(view) < DEGENERATE_EPS) {
    throw new Error(`Camera eye and target coincide at [${eye.join(', ')}]`);
  }
  const forward = normalize(view);
  const side = cross(forward, up);
  if (length(side) < DEGENERATE_EPS * Math.max(1, length(up))) {
    throw new Error(
      `Camera up [${up.join(', ')}] is parallel to the view direction [${forward.join(', ')}]`
    );
  }
  const right = normalize(side);
  return { forward, right, up: cross(right, forward) };
}

function clamp(x: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, x));
}

