import type { HeadVariant, NoiseWobble, PetalPlacement } from './types';
import { GEOMETRY } from './config';
import { RoseCurve } from './RoseCurve';
import { clamp } from './PetalGeometry';
import { signedNoise, type RandomSource } from './Randomness';

const roseCurve = new RoseCurve();

/**
 * Gielisのスーパーフォーミュラによる極半径
 * 極端なスパイクを避けるため [0.2, 1.5] に制限する
 */
export function superformulaRadius(
  thetaRad: number,
  params: { m: number; n1: number; n2: number; n3: number; a: number; b: number }
): number {
  const angle = (params.m * thetaRad) / 4;
  const term1 = Math.pow(Math.abs(Math.cos(angle) / params.a), params.n2);
  const term2 = Math.pow(Math.abs(Math.sin(angle) / params.b), params.n3);
  const r = Math.pow(term1 + term2, -1 / params.n1);

  if (Number.isNaN(r)) {
    return 1;
  }
  return clamp(r, GEOMETRY.SUPERFORMULA_MIN, GEOMETRY.SUPERFORMULA_MAX);
}

/**
 * 花びら1枚の配置を計算する
 * @param variant 花冠のトポロジー
 * @param index 花びらの番号
 * @param total 配置に使う総枚数
 */
export function placePetal(variant: HeadVariant, index: number, total: number): PetalPlacement {
  const count = Math.max(1, total);
  const angleStep = 360 / count;

  switch (variant.kind) {
    case 'radial':
      return { angleDeg: index * angleStep, radialOffset: 0, lengthScale: 1, widthScale: 1 };

    case 'phyllotaxis':
      // 黄金角のらせん（ヒマワリ型の充填）
      return {
        angleDeg: (index * GEOMETRY.GOLDEN_ANGLE) % 360,
        radialOffset: variant.spiralSpacing * Math.sqrt(index),
        lengthScale: 1,
        widthScale: 1
      };

    case 'roseCurve': {
      const angleDeg = index * angleStep;
      return {
        angleDeg,
        radialOffset: 0,
        lengthScale: roseCurve.lengthScale(angleDeg, variant.k, variant.baseScale),
        widthScale: 1
      };
    }

    case 'superformula': {
      const angleDeg = index * angleStep;
      return {
        angleDeg,
        radialOffset: 0,
        lengthScale: superformulaRadius((angleDeg * Math.PI) / 180, variant),
        widthScale: 1
      };
    }

    case 'layeredWhorls': {
      // 外側の層が小さい番号。内側の層ほど短く幅広になる
      const perLayer = Math.max(1, Math.floor(variant.petalsPerLayer));
      const layer = Math.min(Math.floor(index / perLayer), Math.max(0, variant.layerCount - 1));
      const slot = index - layer * perLayer;
      const layerStep = 360 / perLayer;
      const phase = layer % 2 === 1 ? variant.phaseShift * layerStep : 0;
      return {
        angleDeg: slot * layerStep + phase,
        radialOffset: 0,
        lengthScale: Math.pow(variant.lengthFalloff, layer),
        widthScale: 1 + variant.widthGrowth * layer
      };
    }

    default: {
      const unknown: never = variant;
      throw new Error(`未知の花冠トポロジーです: ${JSON.stringify(unknown)}`);
    }
  }
}

/**
 * トポロジーが必要とする花びらの総枚数
 * 重なった輪生では層の数×1層の枚数になる
 */
export function layoutPetalCount(variant: HeadVariant, requested: number): number {
  if (variant.kind === 'layeredWhorls') {
    return Math.max(1, Math.floor(variant.layerCount)) * Math.max(1, Math.floor(variant.petalsPerLayer));
  }
  return requested;
}

/**
 * ノイズによる揺らぎを配置に加える
 * @returns 揺らぎを加えた配置と、花びら全体の倍率
 */
export function applyWobble(
  placement: PetalPlacement,
  wobble: NoiseWobble,
  index: number,
  time: number,
  random: RandomSource
): { placement: PetalPlacement; uniformScale: number } {
  if (!wobble.enabled) {
    return { placement, uniformScale: 1 };
  }

  const x = wobble.seed + index * GEOMETRY.WOBBLE_INDEX_STRIDE;
  const t = time * wobble.timeSpeed;

  return {
    placement: {
      ...placement,
      lengthScale: placement.lengthScale * (1 + signedNoise(random, x, t) * wobble.lengthAmount),
      angleDeg: placement.angleDeg + signedNoise(random, x + 100, t) * wobble.angleAmount
    },
    uniformScale: 1 + signedNoise(random, x + 200, t) * wobble.scaleAmount
  };
}
