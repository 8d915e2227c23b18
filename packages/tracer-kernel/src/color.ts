/**
 * RGB color with float channels in the 0..255 range.
 *
 * Arithmetic never clamps: lighting may push a channel past 255 and the
 * overshoot only disappears when the color is packed with toHex().
 */

export class Color {
  constructor(
    readonly r: number,
    readonly g: number,
    readonly b: number,
  ) {}

  static black(): Color { return new Color(0, 0, 0); }
  static white(): Color { return new Color(255, 255, 255); }

  /** Unpack a 0xRRGGBB integer. */
  static fromHex(hex: number): Color {
    return new Color((hex >> 16) & 0xff, (hex >> 8) & 0xff, hex & 0xff);
  }

  add(other: Color): Color {
    return new Color(this.r + other.r, this.g + other.g, this.b + other.b);
  }

  /** Per-channel intensity scaling. */
  scale(factor: number): Color {
    return new Color(this.r * factor, this.g * factor, this.b * factor);
  }

  /** Move toward `other` by t (0 = this, 1 = other). */
  lerp(other: Color, t: number): Color {
    return new Color(
      this.r + (other.r - this.r) * t,
      this.g + (other.g - this.g) * t,
      this.b + (other.b - this.b) * t,
    );
  }

  equals(other: Color): boolean {
    return this.r === other.r && this.g === other.g && this.b === other.b;
  }

  /** Pack as 0xRRGGBB, saturating each channel to [0, 255]. */
  toHex(): number {
    return (channel(this.r) << 16) | (channel(this.g) << 8) | channel(this.b);
  }

  toString(): string {
    return `#${this.toHex().toString(16).padStart(6, '0')}`;
  }
}

function channel(v: number): number {
  if (!(v > 0)) return 0; // also catches NaN
  return v >= 255 ? 255 : Math.round(v);
}
