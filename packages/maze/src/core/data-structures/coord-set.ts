/**
 * Bit set of grid coordinates: one bit per cell.
 *
 * The visited set of generators and searches. Coordinates must be in
 * bounds; callers check before adding.
 *
 * @example
 * ```typescript
 * const visited = new CoordSet(21, 21);
 * visited.add(1, 1);
 * visited.has(1, 1); // true
 * ```
 */
export class CoordSet {
  private readonly bits: Uint32Array;
  private readonly width: number;
  private count = 0;

  constructor(width: number, height: number) {
    this.width = width;
    this.bits = new Uint32Array(Math.ceil((width * height) / 32));
  }

  get size(): number {
    return this.count;
  }

  has(x: number, y: number): boolean {
    const key = y * this.width + x;
    const value = this.bits[key >>> 5];
    return value !== undefined && (value & (1 << (key & 31))) !== 0;
  }

  add(x: number, y: number): void {
    const key = y * this.width + x;
    const index = key >>> 5;
    const bit = 1 << (key & 31);
    const current = this.bits[index];
    if (current !== undefined && (current & bit) === 0) {
      this.bits[index] = current | bit;
      this.count++;
    }
  }

  delete(x: number, y: number): void {
    const key = y * this.width + x;
    const index = key >>> 5;
    const bit = 1 << (key & 31);
    const current = this.bits[index];
    if (current !== undefined && (current & bit) !== 0) {
      this.bits[index] = current & ~bit;
      this.count--;
    }
  }

  clear(): void {
    this.bits.fill(0);
    this.count = 0;
  }
}
