// factory/rng.ts — Seedable random source (mulberry32)

export interface RandomSource {
  /** uniform in [0, 1) */
  next(): number;
  /** uniform integer in [min, max], both inclusive */
  nextInt(min: number, max: number): number;
}

export class SeededRng implements RandomSource {
  private state: number;

  constructor(readonly seed: number) {
    this.state = seed >>> 0;
  }

  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let x = this.state;
    x = Math.imul(x ^ (x >>> 15), x | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  }

  nextInt(min: number, max: number): number {
    return min + Math.floor(this.next() * (max - min + 1));
  }
}
