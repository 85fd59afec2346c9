/**
 * @veil/privacy - Seeded noise source
 *
 * HMAC-SHA256 counter stream: block i = HMAC(seed, i). Each uniform draw
 * consumes 48 bits, so a fixed seed always yields the same sequence.
 */

import { createHmac } from 'node:crypto';

const TWO_POW_48 = 2 ** 48;

export class SeededRandom {
  private counter = 0;
  private block: Buffer = Buffer.alloc(0);
  private offset = 0;

  constructor(private readonly seed: string) {}

  /** Uniform draw in the open interval (0, 1). */
  next(): number {
    if (this.offset + 6 > this.block.length) {
      this.block = createHmac('sha256', this.seed).update(String(this.counter++)).digest();
      this.offset = 0;
    }
    const bits = this.block.readUIntBE(this.offset, 6);
    this.offset += 6;
    return (bits + 0.5) / TWO_POW_48;
  }

  /** Laplace(0, scale) by inverse CDF. */
  laplace(scale: number): number {
    const u = this.next() - 0.5;
    return -scale * Math.sign(u) * Math.log(1 - 2 * Math.abs(u));
  }

  /** Normal(0, sigma) by Box-Muller. */
  gaussian(sigma: number): number {
    const u1 = this.next();
    const u2 = this.next();
    return sigma * Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  }
}
