function mulberry32(seed: number) {
  let t = seed >>> 0;
  return () => {
    t += 0x6D2B79F5;
    let x = t;
    x = Math.imul(x ^ (x >>> 15), x | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Deterministic generator for engine-side randomness (artifact spawns).
 * The cursor advances once per draw so a match is reproducible from its seed.
 */
export class SeededRng {
  private cursor = 0;

  constructor(private readonly seed: number) {}

  next(): number {
    const rng = mulberry32((this.seed + this.cursor) >>> 0);
    this.cursor += 1;
    return rng();
  }

  /** Integer in [0, maxExclusive). */
  int(maxExclusive: number): number {
    return Math.floor(this.next() * maxExclusive);
  }

  pick<T>(items: readonly T[]): T {
    if (items.length === 0) throw new Error("cannot pick from an empty list");
    return items[this.int(items.length)];
  }
}
