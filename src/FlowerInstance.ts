import type {
  CenterVariant,
  Color,
  DetachedPetal,
  DrawCommand,
  HeadVariant,
  InflorescenceParams,
  LifeState,
  NoiseWobble,
  Point,
  StemParams,
  TendrilParams,
  Viewport
} from './types';
import { LifeStage } from './types';
import { HEAD_VARIANT_WEIGHTS, IDENTITY_RANGES, LIFECYCLE } from './config';
import { Flower } from './Flower';
import { layoutPetalCount } from './HeadTopology';
import { evaluateFastDeath, evaluateLifecycle, type LifecycleFrame } from './StateMachine';
import { generateColors, type FlowerPalette } from './ColorScheme';
import { clamp } from './PetalGeometry';
import { pickOne, randomInt, randomRange, randomSign, type RandomSource } from './Randomness';

/**
 * 生成時に決まり、次の生まれ変わりまで変わらない個性
 */
export interface FlowerIdentity {
  normPos: Point;             // 0-1 の正規化座標（茎の根元）
  depthScale: number;         // 奥行きによる大きさ（下ほど手前で大きい）
  head: HeadVariant;
  center: CenterVariant;
  basePetalCount: number;
  baseLength: number;
  baseWidth: number;
  basePointiness: number;
  baseBulge: number;
  baseEdgeCurvature: number;
  baseCenterRadius: number;
  baseStemHeight: number;
  baseStemCurvature: number;
  stemThickness: number;
  stemTaper: number;
  stemSegments: number;
  stemNodeWidth: number;
  tendrils: TendrilParams[];
  petalColor: Color;
  centerColor: Color;
  stemColor: Color;
  wobble: NoiseWobble;
  pitchDirection: -1 | 1;     // 音高で尖り具合をどちらに変えるか
  reactivityBias: number;     // 音への反応の個体差
  lifeSpeedMult: number;      // ライフサイクル速度の個体差
  rotationSpeed: number;      // 度/秒
  rotationDirection: -1 | 1;
  initialRotation: number;
}

/**
 * applyLifecycleへの入力
 */
export interface LifecycleInputs {
  volume: number;     // スムージング済みの音量（0-1）
  pitchNorm: number;  // 正規化した音高（-1〜1）
  time: number;       // 経過時間（秒）
  viewport: Viewport;
}

type RangeTuple = readonly [number, number];

function inRange(random: RandomSource, range: RangeTuple): number {
  return randomRange(random, range[0], range[1]);
}

function lerp(a: number, b: number, t: number): number {
  return a + (b - a) * t;
}

function randomHeadVariant(random: RandomSource): HeadVariant {
  const roll = random.random();
  let acc = HEAD_VARIANT_WEIGHTS.radial;
  if (roll < acc) {
    return { kind: 'radial' };
  }
  acc += HEAD_VARIANT_WEIGHTS.phyllotaxis;
  if (roll < acc) {
    return { kind: 'phyllotaxis', spiralSpacing: inRange(random, IDENTITY_RANGES.SPIRAL_SPACING) };
  }
  acc += HEAD_VARIANT_WEIGHTS.roseCurve;
  if (roll < acc) {
    return {
      kind: 'roseCurve',
      k: pickOne(random, IDENTITY_RANGES.ROSE_K),
      baseScale: inRange(random, IDENTITY_RANGES.ROSE_BASE_SCALE)
    };
  }
  acc += HEAD_VARIANT_WEIGHTS.superformula;
  if (roll < acc) {
    return {
      kind: 'superformula',
      m: randomInt(random, IDENTITY_RANGES.SUPERFORMULA_M[0], IDENTITY_RANGES.SUPERFORMULA_M[1]),
      n1: inRange(random, IDENTITY_RANGES.SUPERFORMULA_N),
      n2: inRange(random, IDENTITY_RANGES.SUPERFORMULA_N),
      n3: inRange(random, IDENTITY_RANGES.SUPERFORMULA_N),
      a: 1,
      b: 1
    };
  }
  return {
    kind: 'layeredWhorls',
    layerCount: randomInt(random, IDENTITY_RANGES.WHORL_LAYERS[0], IDENTITY_RANGES.WHORL_LAYERS[1]),
    petalsPerLayer: randomInt(random, IDENTITY_RANGES.WHORL_PETALS[0], IDENTITY_RANGES.WHORL_PETALS[1]),
    lengthFalloff: inRange(random, IDENTITY_RANGES.WHORL_FALLOFF),
    widthGrowth: inRange(random, IDENTITY_RANGES.WHORL_WIDTH_GROWTH),
    phaseShift: 0.5
  };
}

/**
 * 中心の装飾を選ぶ（らせん→花粉、放射→雄しべ、それ以外はランダム）
 */
function centerFor(head: HeadVariant, random: RandomSource): CenterVariant {
  const detail = randomInt(random, IDENTITY_RANGES.CENTER_DETAIL[0], IDENTITY_RANGES.CENTER_DETAIL[1]);
  if (head.kind === 'phyllotaxis') {
    return { kind: 'pollenGrid', detail };
  }
  if (head.kind === 'radial') {
    return { kind: 'stamens', detail };
  }
  const options: CenterVariant[] = [
    { kind: 'simpleDisc' },
    { kind: 'stamens', detail },
    { kind: 'pollenGrid', detail },
    { kind: 'geometricStar', detail }
  ];
  return pickOne(random, options);
}

function petalCountFor(head: HeadVariant, random: RandomSource): number {
  switch (head.kind) {
    case 'phyllotaxis':
      return randomInt(random, IDENTITY_RANGES.PHYLLOTAXIS_COUNT[0], IDENTITY_RANGES.PHYLLOTAXIS_COUNT[1]);
    case 'roseCurve':
      return randomInt(random, IDENTITY_RANGES.ROSE_COUNT[0], IDENTITY_RANGES.ROSE_COUNT[1]);
    case 'superformula':
      return randomInt(random, IDENTITY_RANGES.SUPERFORMULA_COUNT[0], IDENTITY_RANGES.SUPERFORMULA_COUNT[1]);
    case 'layeredWhorls':
      return layoutPetalCount(head, 0);
    case 'radial':
      return randomInt(random, IDENTITY_RANGES.PETAL_COUNT[0], IDENTITY_RANGES.PETAL_COUNT[1]);
  }
}

/**
 * ランダムな個性を生成する
 */
export function createIdentity(random: RandomSource, palette: FlowerPalette): FlowerIdentity {
  const normPos = {
    x: inRange(random, IDENTITY_RANGES.POSITION_X),
    y: inRange(random, IDENTITY_RANGES.POSITION_Y)
  };

  // 画面下ほど手前（大きい）、上ほど奥（小さい）
  const [yMin, yMax] = IDENTITY_RANGES.POSITION_Y;
  const depthT = (normPos.y - yMin) / (yMax - yMin);
  const depthScale = lerp(IDENTITY_RANGES.DEPTH_SCALE[0], IDENTITY_RANGES.DEPTH_SCALE[1], depthT);

  const head = randomHeadVariant(random);
  const colors = generateColors(palette, random);

  const tendrilCount = randomInt(random, 0, IDENTITY_RANGES.TENDRIL_MAX + 1);
  const tendrils: TendrilParams[] = [];
  for (let i = 0; i < tendrilCount; i++) {
    tendrils.push({
      stemT: inRange(random, IDENTITY_RANGES.TENDRIL_T),
      length: inRange(random, IDENTITY_RANGES.TENDRIL_LENGTH),
      curlAmount: inRange(random, IDENTITY_RANGES.TENDRIL_CURL),
      direction: randomSign(random),
      startAngle: inRange(random, IDENTITY_RANGES.TENDRIL_ANGLE),
      thickness: inRange(random, IDENTITY_RANGES.TENDRIL_THICKNESS)
    });
  }

  return {
    normPos,
    depthScale,
    head,
    center: centerFor(head, random),
    basePetalCount: petalCountFor(head, random),
    baseLength: inRange(random, IDENTITY_RANGES.PETAL_LENGTH),
    baseWidth: inRange(random, IDENTITY_RANGES.PETAL_WIDTH),
    basePointiness: inRange(random, IDENTITY_RANGES.POINTINESS),
    baseBulge: inRange(random, IDENTITY_RANGES.BULGE),
    baseEdgeCurvature: inRange(random, IDENTITY_RANGES.EDGE_CURVATURE),
    baseCenterRadius: inRange(random, IDENTITY_RANGES.CENTER_RADIUS),
    baseStemHeight: inRange(random, IDENTITY_RANGES.STEM_HEIGHT),
    baseStemCurvature: inRange(random, IDENTITY_RANGES.STEM_CURVATURE),
    stemThickness: lerp(IDENTITY_RANGES.STEM_THICKNESS[0], IDENTITY_RANGES.STEM_THICKNESS[1], depthScale),
    stemTaper: inRange(random, IDENTITY_RANGES.STEM_TAPER),
    stemSegments: randomInt(random, IDENTITY_RANGES.STEM_SEGMENTS[0], IDENTITY_RANGES.STEM_SEGMENTS[1]),
    stemNodeWidth: inRange(random, IDENTITY_RANGES.STEM_NODE_WIDTH),
    tendrils,
    petalColor: colors.petal,
    centerColor: colors.center,
    stemColor: colors.stem,
    wobble: {
      enabled: random.random() < IDENTITY_RANGES.WOBBLE_CHANCE,
      seed: randomRange(random, 0, 1000),
      lengthAmount: inRange(random, IDENTITY_RANGES.WOBBLE_LENGTH),
      angleAmount: inRange(random, IDENTITY_RANGES.WOBBLE_ANGLE),
      scaleAmount: inRange(random, IDENTITY_RANGES.WOBBLE_SCALE),
      timeSpeed: inRange(random, IDENTITY_RANGES.WOBBLE_TIME_SPEED)
    },
    pitchDirection: randomSign(random),
    reactivityBias: inRange(random, IDENTITY_RANGES.REACTIVITY_BIAS),
    lifeSpeedMult: inRange(random, IDENTITY_RANGES.LIFE_SPEED),
    rotationSpeed: inRange(random, IDENTITY_RANGES.ROTATION_SPEED),
    rotationDirection: randomSign(random),
    initialRotation: randomRange(random, 0, 360)
  };
}

/**
 * 花畑の中の1本の花
 * 個性（identity）と、成長→開花→枯死のライフサイクル状態を持つ
 */
export class FlowerInstance {
  private identity: FlowerIdentity;
  private flower: Flower;
  private random: RandomSource;

  private lifePhase: number = 0;
  private lifeState: LifeState = 'active';
  private currentAlpha: number = 0;
  private lastVisiblePetalCount: number;
  private fastDeath: boolean = false;
  private fastDeathTimer: number = 0;
  private rotation: number;
  private lastFrame: LifecycleFrame | null = null;

  constructor(random: RandomSource, palette: FlowerPalette, identity?: FlowerIdentity) {
    this.random = random;
    this.identity = identity ?? createIdentity(random, palette);
    this.rotation = this.identity.initialRotation;
    this.lastVisiblePetalCount = this.identity.basePetalCount;
    this.flower = new Flower(this.headParams(0, 0.1, this.identity.basePointiness), this.stemParams(0.1, 0), random);
  }

  /**
   * 新しい個性で生まれ変わる（lifePhaseは0に戻る）
   */
  public respawn(palette: FlowerPalette): void {
    this.identity = createIdentity(this.random, palette);
    this.lifePhase = 0;
    this.lifeState = 'active';
    this.currentAlpha = 0;
    this.fastDeath = false;
    this.fastDeathTimer = 0;
    this.rotation = this.identity.initialRotation;
    this.lastVisiblePetalCount = this.identity.basePetalCount;
    this.lastFrame = null;
    this.flower = new Flower(this.headParams(0, 0.1, this.identity.basePointiness), this.stemParams(0.1, 0), this.random);
  }

  public getIdentity(): Readonly<FlowerIdentity> {
    return this.identity;
  }

  public getFlower(): Flower {
    return this.flower;
  }

  public getLifePhase(): number {
    return this.lifePhase;
  }

  /**
   * lifePhaseを直接設定する（初期化時に開花のタイミングをばらけさせるため）
   */
  public setLifePhase(phase: number): void {
    if (!(phase >= 0 && phase <= 1)) {
      throw new Error(`lifePhaseは0〜1で指定してください: ${phase}`);
    }
    this.lifePhase = phase;
  }

  public getLifeState(): LifeState {
    return this.lifeState;
  }

  public isPendingRemoval(): boolean {
    return this.lifeState === 'pendingRemoval';
  }

  public isFastDying(): boolean {
    return this.fastDeath;
  }

  public getAlpha(): number {
    return this.currentAlpha;
  }

  public getVisiblePetalCount(): number {
    return this.lastVisiblePetalCount;
  }

  public getStage(): LifeStage | null {
    return this.lastFrame ? this.lastFrame.stage : null;
  }

  /**
   * ライフサイクルを進める
   * @param deltaTime 経過時間（秒）
   * @param speed 花畑全体のライフサイクル速度（1秒あたりのlifePhase増分）
   */
  public advance(deltaTime: number, speed: number): void {
    if (this.lifeState !== 'active') {
      return;
    }
    this.lifePhase += speed * this.identity.lifeSpeedMult * deltaTime;
    this.rotation = (this.rotation + this.identity.rotationSpeed * this.identity.rotationDirection * deltaTime) % 360;
    if (this.fastDeath) {
      this.fastDeathTimer += deltaTime;
    }
  }

  /**
   * 1周期を終えたか
   */
  public hasCompletedCycle(): boolean {
    return this.lifeState === 'active' && !this.fastDeath && this.lifePhase >= 1;
  }

  /**
   * 早送りの枯死の対象にできるか（開花中〜散り始めで、まだ枯死していない個体）
   */
  public isEligibleForFastDeath(): boolean {
    return this.lifeState === 'active'
      && !this.fastDeath
      && this.lifePhase > LIFECYCLE.GROW_END
      && this.lifePhase < LIFECYCLE.SHED_END;
  }

  public startFastDeath(): void {
    if (this.fastDeath) {
      return;
    }
    this.fastDeath = true;
    this.fastDeathTimer = 0;
  }

  /**
   * 削除予定にする（実際の削除は花畑の更新の最後に行う）
   */
  public markForRemoval(): void {
    this.lifeState = 'pendingRemoval';
    this.currentAlpha = 0;
  }

  /**
   * 現在のlifePhaseに見える花びらの枚数を合わせる（散る花びらを生成しない）
   */
  public syncVisiblePetals(): void {
    const frame = evaluateLifecycle(Math.min(this.lifePhase, 1), this.identity.basePetalCount);
    this.lastVisiblePetalCount = frame.visiblePetals;
  }

  /**
   * lifePhaseと音声から花の形を更新する
   * @returns 今回外れた花びら（番号の大きいものから）
   */
  public applyLifecycle(inputs: LifecycleInputs): DetachedPetal[] {
    if (this.lifeState !== 'active') {
      return [];
    }

    let frame: LifecycleFrame;
    if (this.fastDeath) {
      const fastFrame = evaluateFastDeath(this.fastDeathTimer);
      frame = fastFrame;
      if (fastFrame.progress >= 1) {
        this.markForRemoval();
      }
    } else {
      frame = evaluateLifecycle(this.lifePhase, this.identity.basePetalCount);
    }
    this.lastFrame = frame;

    // 1周期の中で花びらが増えることはない
    const visiblePetals = Math.min(frame.visiblePetals, this.lastVisiblePetalCount);

    const reactivity = frame.reactivity;
    const volumePulse = 1 + inputs.volume * LIFECYCLE.VOLUME_PULSE * reactivity * this.identity.reactivityBias;
    const pointiness = clamp(
      this.identity.basePointiness + this.identity.pitchDirection * inputs.pitchNorm * LIFECYCLE.PITCH_POINTINESS * reactivity,
      0,
      1
    );

    if (this.lifeState === 'active') {
      this.currentAlpha = clamp(frame.alpha, 0, 1);
    }

    const headLength = this.identity.baseLength * this.identity.depthScale * frame.scale * volumePulse;
    this.flower.getInflorescence().setParams(this.headParams(visiblePetals, headLength, pointiness, frame.scale));
    this.flower.getStem().setParams(this.stemParams(frame.stemScale, frame.stemCurveMod));

    const detached: DetachedPetal[] = [];
    if (visiblePetals < this.lastVisiblePetalCount) {
      const head = this.headPosition(inputs.viewport);
      const inflorescence = this.flower.getInflorescence();
      for (let index = this.lastVisiblePetalCount - 1; index >= visiblePetals; index--) {
        const anchor = inflorescence.petalAnchor(index, inputs.time);
        if (!(anchor.shape.length > 0)) {
          continue;
        }
        detached.push({
          position: { x: head.x + anchor.offset.x, y: head.y + anchor.offset.y },
          angleDeg: anchor.angleDeg,
          shape: anchor.shape,
          color: { ...this.identity.petalColor }
        });
      }
    }
    this.lastVisiblePetalCount = visiblePetals;

    return detached;
  }

  /**
   * 茎の根元（画面座標）
   */
  public groundPosition(viewport: Viewport): Point {
    return {
      x: this.identity.normPos.x * viewport.width,
      y: this.identity.normPos.y * viewport.height
    };
  }

  /**
   * 花冠の原点（画面座標）
   */
  public headPosition(viewport: Viewport): Point {
    return this.flower.headPosition(this.groundPosition(viewport));
  }

  /**
   * 現在の透明度を色に書き戻してから描画コマンドにする
   */
  public draw(viewport: Viewport, time: number): DrawCommand[] {
    const alpha = Math.round(this.currentAlpha * 255);

    const head = this.flower.getInflorescence();
    const headParams = head.getParams();
    head.setParams({
      ...headParams,
      petalColor: { ...headParams.petalColor, a: alpha },
      centerColor: { ...headParams.centerColor, a: alpha }
    });

    const stem = this.flower.getStem();
    const stemParams = stem.getParams();
    stem.setParams({ ...stemParams, color: { ...stemParams.color, a: alpha } });

    return this.flower.draw(this.groundPosition(viewport), time);
  }

  private headParams(count: number, length: number, pointiness: number, scale: number = 0): InflorescenceParams {
    const identity = this.identity;
    return {
      petal: {
        count,
        length,
        widthRatio: identity.baseWidth,
        tipPointiness: pointiness,
        bulgePosition: identity.baseBulge,
        edgeCurvature: identity.baseEdgeCurvature
      },
      layoutCount: identity.basePetalCount,
      head: identity.head,
      center: identity.center,
      centerRadius: identity.baseCenterRadius * identity.depthScale * Math.max(scale, 0.1),
      rotation: this.rotation,
      petalColor: { ...identity.petalColor },
      centerColor: { ...identity.centerColor },
      wobble: identity.wobble
    };
  }

  private stemParams(stemScale: number, curveMod: number): StemParams {
    const identity = this.identity;
    const heightScale = identity.depthScale * stemScale;
    return {
      height: identity.baseStemHeight * heightScale,
      thickness: identity.stemThickness,
      taperRatio: identity.stemTaper,
      curvature: clamp(identity.baseStemCurvature + curveMod, -2, 2),
      segments: identity.stemSegments,
      nodeWidth: identity.stemNodeWidth,
      color: { ...identity.stemColor },
      tendrils: identity.tendrils.map((tendril) => ({ ...tendril, length: tendril.length * heightScale }))
    };
  }
}
