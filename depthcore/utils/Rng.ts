//depthcore/utils/Rng.ts

/**
 * Seeded pseudo-random stream. One instance per generation run; never share
 * an instance between requests.
 */
export class Rng {
  private _state: number;
  private _spareNormal: number | null = null;

  constructor(seed: string | number) {
    if (typeof seed === "number") {
      this._state = (seed >>> 0) || 1;
    } else {
      this._state = Rng.hashString(seed);
    }
  }

  private static hashString(str: string): number {
    let h = 1779033703 ^ str.length;
    for (let i = 0; i < str.length; i++) {
      h = Math.imul(h ^ str.charCodeAt(i), 3432918353);
      h = (h << 13) | (h >>> 19);
    }
    return (h >>> 0) || 1;
  }

  // mulberry32-style, uniform in [0, 1)
  next(): number {
    let t = (this._state += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), 61 | t);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  range(min: number, max: number): number {
    return min + (max - min) * this.next();
  }

  /**
   * Standard normal draw (Box–Muller). Each pair of uniforms yields two
   * variates; the second is handed out by the following call.
   */
  normal(): number {
    if (this._spareNormal !== null) {
      const spare = this._spareNormal;
      this._spareNormal = null;
      return spare;
    }

    // 1 - next() keeps the log argument in (0, 1]
    const u1 = 1 - this.next();
    const u2 = this.next();
    const radius = Math.sqrt(-2 * Math.log(u1));
    const theta = 2 * Math.PI * u2;

    this._spareNormal = radius * Math.sin(theta);
    return radius * Math.cos(theta);
  }

  /** Fills an array with `count` uniform draws, in order. */
  uniforms(count: number, min = 0, max = 1): number[] {
    const out = new Array<number>(count);
    for (let i = 0; i < count; i++) out[i] = this.range(min, max);
    return out;
  }
}
