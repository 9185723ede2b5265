import type { Color, DrawCommand, FallingPetal, FallingPetalConfig, PetalShape, Point } from './types';
import { FALLING_PETAL_DEFAULTS } from './config';
import { buildPetalOutline, directionFromAngle, transformOutline } from './PetalGeometry';
import { randomRange, randomSign, SeededRandom, type RandomSource } from './Randomness';

/**
 * FallingPetalSystemクラス
 * 花から外れた花びらを、重力・回転・左右の揺れで落下させる
 */
export class FallingPetalSystem {
  private petals: FallingPetal[] = [];
  private config: FallingPetalConfig;
  private random: RandomSource;
  private viewportHeight: number = Number.POSITIVE_INFINITY;

  constructor(config: Partial<FallingPetalConfig> = {}, random: RandomSource = new SeededRandom()) {
    this.config = { ...FALLING_PETAL_DEFAULTS, ...config };
    this.random = random;
  }

  public getConfig(): Readonly<FallingPetalConfig> {
    return this.config;
  }

  /**
   * 画面の高さ（これより下に落ちた花びらは消える）
   */
  public setViewportHeight(height: number): void {
    this.viewportHeight = height;
  }

  /**
   * ±jitterのばらつき
   */
  private jittered(value: number): number {
    const j = this.config.jitter;
    return value * randomRange(this.random, 1 - j, 1 + j);
  }

  /**
   * 花びらを1枚生成する
   * @param headPosition 花冠上の取り付け位置（画面座標）
   * @param detachAngle 外れる方向（度）
   * @param shape 花びらの形状
   * @param color 花びらの色
   */
  public spawn(headPosition: Point, detachAngle: number, shape: PetalShape, color: Color): FallingPetal {
    const direction = directionFromAngle(detachAngle);
    const offset = 0.4 * shape.length;
    const pop = this.config.initialUpPop;

    const petal: FallingPetal = {
      baseX: headPosition.x + direction.x * offset,
      baseY: headPosition.y + direction.y * offset,
      // 外向きの成分＋上向きに弾ける初速
      vx: direction.x * 0.4 * pop,
      vy: direction.y * 0.4 * pop - pop,
      rotation: detachAngle,
      rotationSpeed: this.jittered(this.config.tumbleSpeed) * randomSign(this.random),
      age: 0,
      alpha: 1,
      wanderPhase: randomRange(this.random, 0, Math.PI * 2),
      wanderAmplitude: this.jittered(this.config.wanderAmplitude),
      wanderFrequency: this.jittered(this.config.wanderFrequency),
      shape: { ...shape, count: 1 },
      color: { ...color },
      outline: buildPetalOutline({ ...shape, count: 1 }),
      alive: true
    };

    this.petals.push(petal);
    return petal;
  }

  /**
   * 全ての花びらを更新し、消えた花びらを取り除く
   * @param deltaTime 前フレームからの経過時間（秒）
   */
  public update(deltaTime: number): void {
    const { gravity, fadeDelay, fadeSpeed, maxLifetime, offscreenMargin } = this.config;

    for (const petal of this.petals) {
      if (!petal.alive) {
        continue;
      }

      petal.age += deltaTime;

      // 重力を適用して位置を更新
      petal.vy += gravity * deltaTime;
      petal.baseX += petal.vx * deltaTime;
      petal.baseY += petal.vy * deltaTime;
      petal.rotation += petal.rotationSpeed * deltaTime;

      if (petal.age > fadeDelay) {
        petal.alpha = Math.max(0, petal.alpha - fadeSpeed * deltaTime);
      }

      if (
        petal.age > maxLifetime
        || petal.baseY > this.viewportHeight + offscreenMargin
        || petal.alpha <= 0
      ) {
        petal.alive = false;
      }
    }

    this.petals = this.petals.filter((petal) => petal.alive);
  }

  /**
   * 揺れを含めた描画位置
   */
  public drawPosition(petal: FallingPetal): Point {
    const wander = petal.wanderAmplitude * Math.sin(petal.age * petal.wanderFrequency * Math.PI * 2 + petal.wanderPhase);
    return { x: petal.baseX + wander, y: petal.baseY };
  }

  public draw(): DrawCommand[] {
    const commands: DrawCommand[] = [];
    for (const petal of this.petals) {
      if (!petal.alive || petal.outline.length === 0) {
        continue;
      }
      commands.push({
        type: 'polygon',
        points: transformOutline(petal.outline, this.drawPosition(petal), petal.rotation),
        fill: { ...petal.color, a: Math.round(petal.color.a * petal.alpha) }
      });
    }
    return commands;
  }

  public getPetals(): readonly FallingPetal[] {
    return this.petals;
  }

  public clear(): void {
    this.petals = [];
  }
}
