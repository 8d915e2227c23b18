/**
 * Framebuffer: fixed-size grid of packed 0xRRGGBB pixels, row-major.
 * Writes outside the grid are dropped.
 */

export class Framebuffer {
  readonly buffer: Uint32Array;
  private backgroundColor = 0x000000;
  private currentColor = 0xffffff;

  constructor(readonly width: number, readonly height: number) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new Error(`Framebuffer size must be positive integers, got ${width}x${height}`);
    }
    this.buffer = new Uint32Array(width * height);
  }

  /** Fill every pixel. Defaults to the background color. */
  clear(color = this.backgroundColor): void {
    this.buffer.fill(color);
  }

  drawPixel(x: number, y: number, color: number): void {
    if (this.inBounds(x, y)) {
      this.buffer[y * this.width + x] = color;
    }
  }

  /** Plot with the current color. */
  point(x: number, y: number): void {
    this.drawPixel(x, y, this.currentColor);
  }

  getPixel(x: number, y: number): number | undefined {
    return this.inBounds(x, y) ? this.buffer[y * this.width + x] : undefined;
  }

  setBackgroundColor(color: number): void {
    this.backgroundColor = color;
  }

  setCurrentColor(color: number): void {
    this.currentColor = color;
  }

  private inBounds(x: number, y: number): boolean {
    return Number.isInteger(x) && Number.isInteger(y)
      && x >= 0 && y >= 0 && x < this.width && y < this.height;
  }
}
