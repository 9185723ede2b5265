import type p5 from 'p5';

/**
 * 乱数とコヒーレントノイズの供給元
 * アプリではp5.jsのrandom()/noise()、テストではSeededRandomを使う
 */
export interface RandomSource {
  /** [0, 1) の一様乱数 */
  random(): number;
  /** (x, t) について連続な [0, 1] のノイズ */
  noise(x: number, t: number): number;
}

/**
 * [lo, hi) の一様乱数
 */
export function randomRange(source: RandomSource, lo: number, hi: number): number {
  return lo + source.random() * (hi - lo);
}

/**
 * [lo, hiExclusive) の整数乱数
 */
export function randomInt(source: RandomSource, lo: number, hiExclusive: number): number {
  return Math.min(hiExclusive - 1, Math.floor(randomRange(source, lo, hiExclusive)));
}

export function randomSign(source: RandomSource): -1 | 1 {
  return source.random() < 0.5 ? -1 : 1;
}

export function pickOne<T>(source: RandomSource, items: readonly T[]): T {
  if (items.length === 0) {
    throw new Error('空の配列から要素を選ぶことはできません');
  }
  return items[randomInt(source, 0, items.length)];
}

/**
 * [-1, 1] に写したノイズ
 */
export function signedNoise(source: RandomSource, x: number, t: number): number {
  return source.noise(x, t) * 2 - 1;
}

/**
 * シード付きの乱数源
 * 一様乱数はmulberry32、ノイズは格子点の値をスムーズステップで補間したバリューノイズ
 */
export class SeededRandom implements RandomSource {
  private state: number;
  private readonly noiseSeed: number;

  constructor(seed: number = 1) {
    this.state = seed | 0;
    this.noiseSeed = Math.imul(seed | 0, 0x9e3779b1) ^ 0x5bd1e995;
  }

  public random(): number {
    this.state = (this.state + 0x6d2b79f5) | 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  public noise(x: number, t: number): number {
    const x0 = Math.floor(x);
    const t0 = Math.floor(t);
    const sx = this.smoothstep(x - x0);
    const st = this.smoothstep(t - t0);

    const a = this.lerp(this.lattice(x0, t0), this.lattice(x0 + 1, t0), sx);
    const b = this.lerp(this.lattice(x0, t0 + 1), this.lattice(x0 + 1, t0 + 1), sx);
    return this.lerp(a, b, st);
  }

  /**
   * 格子点のハッシュ値（0-1）
   */
  private lattice(ix: number, it: number): number {
    let h = Math.imul(ix, 374761393) ^ Math.imul(it, 668265263) ^ this.noiseSeed;
    h = Math.imul(h ^ (h >>> 13), 1274126177);
    h ^= h >>> 16;
    return (h >>> 0) / 4294967295;
  }

  private smoothstep(f: number): number {
    return f * f * (3 - 2 * f);
  }

  private lerp(a: number, b: number, amt: number): number {
    return a + (b - a) * amt;
  }
}

/**
 * p5インスタンスを乱数源として使う
 * @param p p5インスタンス
 * @param seed 指定した場合はrandomSeed/noiseSeedを設定する
 */
export function createP5RandomSource(
  p: Pick<p5, 'random' | 'noise' | 'randomSeed' | 'noiseSeed'>,
  seed?: number
): RandomSource {
  if (seed !== undefined) {
    p.randomSeed(seed);
    p.noiseSeed(seed);
  }

  return {
    random: () => p.random(),
    noise: (x: number, t: number) => p.noise(x, t)
  };
}
