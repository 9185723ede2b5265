import type { Color } from './types';
import { COLOR_SCHEME } from './config';
import { pickOne, randomInt, randomRange, type RandomSource } from './Randomness';
import paletteData from './data/palettes.json';

type Range = readonly [number, number];

/**
 * 花の配色（HSBの範囲）
 */
export interface FlowerPalette {
  name: string;
  petalHues: readonly Range[];
  petalSaturation: Range;
  petalBrightness: Range;
  centerHue: Range;
  stemHue: Range;
}

/**
 * 1本の花の色
 */
export interface FlowerColors {
  petal: Color;
  center: Color;
  stem: Color;
}

function toRange(values: number[]): Range {
  if (values.length !== 2) {
    throw new Error(`パレットの範囲は[min, max]で指定してください: ${JSON.stringify(values)}`);
  }
  return [values[0], values[1]];
}

export const PALETTES: readonly FlowerPalette[] = paletteData.map((entry) => ({
  name: entry.name,
  petalHues: entry.petalHues.map(toRange),
  petalSaturation: toRange(entry.petalSaturation),
  petalBrightness: toRange(entry.petalBrightness),
  centerHue: toRange(entry.centerHue),
  stemHue: toRange(entry.stemHue)
}));

/**
 * HSB色空間からRGB色空間への変換
 * @param h 色相（0-360）
 * @param s 彩度（0-100）
 * @param b 明度（0-100）
 * @returns RGB値（0-255）
 */
export function hsbToRgb(h: number, s: number, b: number): { r: number; g: number; b: number } {
  h = (((h % 360) + 360) % 360) / 360;
  s = s / 100;
  b = b / 100;

  const i = Math.floor(h * 6);
  const f = h * 6 - i;
  const p = b * (1 - s);
  const q = b * (1 - f * s);
  const t = b * (1 - (1 - f) * s);

  let r: number, g: number, bl: number;
  switch (i % 6) {
    case 0: r = b; g = t; bl = p; break;
    case 1: r = q; g = b; bl = p; break;
    case 2: r = p; g = b; bl = t; break;
    case 3: r = p; g = q; bl = b; break;
    case 4: r = t; g = p; bl = b; break;
    case 5: r = b; g = p; bl = q; break;
    default: r = g = bl = 0;
  }

  return {
    r: Math.round(r * 255),
    g: Math.round(g * 255),
    b: Math.round(bl * 255)
  };
}

function randomColor(random: RandomSource, hue: Range, saturation: Range, brightness: Range): Color {
  const rgb = hsbToRgb(
    randomRange(random, hue[0], hue[1]),
    randomRange(random, saturation[0], saturation[1]),
    randomRange(random, brightness[0], brightness[1])
  );
  return { ...rgb, a: 255 };
}

/**
 * パレットから1本分の色を選ぶ
 */
export function generateColors(palette: FlowerPalette, random: RandomSource): FlowerColors {
  return {
    petal: randomColor(random, pickOne(random, palette.petalHues), palette.petalSaturation, palette.petalBrightness),
    center: randomColor(random, palette.centerHue, [70, 95], [80, 100]),
    stem: randomColor(random, palette.stemHue, [40, 80], [25, 65])
  };
}

/**
 * カラースキームの選択
 * 0: 一定時間ごとにパレットを切り替える / 1-8: 固定 / 9: 花ごとにランダム
 */
export class ColorScheme {
  private mode: number;
  private cycleIndex: number = 0;
  private cycleTimer: number = 0;

  constructor(mode: number = COLOR_SCHEME.CYCLING) {
    this.mode = ColorScheme.validate(mode);
  }

  private static validate(mode: number): number {
    if (!Number.isInteger(mode) || mode < 0 || mode > PALETTES.length + 1) {
      throw new Error(`カラースキームは0〜${PALETTES.length + 1}で指定してください: ${mode}`);
    }
    return mode;
  }

  public getMode(): number {
    return this.mode;
  }

  public setMode(mode: number): void {
    this.mode = ColorScheme.validate(mode);
  }

  /**
   * 巡回モードのタイマーを進める
   * @param deltaTime 経過時間（秒）
   */
  public update(deltaTime: number): void {
    this.cycleTimer += deltaTime;
    while (this.cycleTimer >= COLOR_SCHEME.CYCLE_SECONDS) {
      this.cycleTimer -= COLOR_SCHEME.CYCLE_SECONDS;
      this.cycleIndex = (this.cycleIndex + 1) % PALETTES.length;
    }
  }

  /**
   * 現在表示に使っているパレット名（ランダムモードでは'Random'）
   */
  public describe(): string {
    if (this.mode === COLOR_SCHEME.RANDOM_PER_SPAWN) {
      return 'Random';
    }
    if (this.mode === COLOR_SCHEME.CYCLING) {
      return `Cycle: ${PALETTES[this.cycleIndex].name}`;
    }
    return PALETTES[this.mode - 1].name;
  }

  /**
   * 新しく生まれる花に使うパレット
   */
  public paletteForSpawn(random: RandomSource): FlowerPalette {
    if (this.mode === COLOR_SCHEME.CYCLING) {
      return PALETTES[this.cycleIndex];
    }
    if (this.mode === COLOR_SCHEME.RANDOM_PER_SPAWN) {
      return PALETTES[randomInt(random, 0, PALETTES.length)];
    }
    return PALETTES[this.mode - 1];
  }
}
