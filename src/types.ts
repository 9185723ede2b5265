/**
 * 花のライフサイクル段階を表す列挙型
 */
export enum LifeStage {
  GROWING = 'GROWING',       // 成長
  BLOOMING = 'BLOOMING',     // 開花
  SHEDDING = 'SHEDDING',     // 花びらが散る
  WILTING = 'WILTING',       // 萎れる
  DYING = 'DYING',           // 消えていく
  FAST_DEATH = 'FAST_DEATH'  // 個体数削減のための早送りの枯死
}

/**
 * 個体の生存状態（数値の番兵値の代わり）
 */
export type LifeState = 'active' | 'pendingRemoval';

/**
 * 2D座標を表すインターフェース
 */
export interface Point {
  x: number;
  y: number;
}

/**
 * RGBA色（各成分0-255）
 */
export interface Color {
  r: number;
  g: number;
  b: number;
  a: number;
}

/**
 * 花びら1枚の形状パラメータ
 */
export interface PetalShape {
  count: number;          // 枚数（0以上の整数）
  length: number;         // 中心から先端までの長さ
  widthRatio: number;     // 最大半幅の長さに対する比率（0-1）
  tipPointiness: number;  // 0=丸い先端、1=尖った先端
  bulgePosition: number;  // 最も幅の広い位置（0=根元、1=先端）
  edgeCurvature: number;  // >0 で膨らむ、<0 でくびれる（-1〜1）
}

/**
 * 花冠のトポロジー（花びらの配置方法）
 */
export type HeadVariant =
  | { kind: 'radial' }
  | { kind: 'phyllotaxis'; spiralSpacing: number }
  | { kind: 'roseCurve'; k: number; baseScale: number }
  | { kind: 'superformula'; m: number; n1: number; n2: number; n3: number; a: number; b: number }
  | {
      kind: 'layeredWhorls';
      layerCount: number;
      petalsPerLayer: number;
      lengthFalloff: number;
      widthGrowth: number;
      phaseShift: number;
    };

/**
 * 花の中心の装飾
 */
export type CenterVariant =
  | { kind: 'simpleDisc' }
  | { kind: 'stamens'; detail: number }
  | { kind: 'pollenGrid'; detail: number }
  | { kind: 'geometricStar'; detail: number };

/**
 * 1枚の花びらの配置結果
 */
export interface PetalPlacement {
  angleDeg: number;      // 花冠内での角度（度）
  radialOffset: number;  // 中心からのずれ（花びら長さに対する比率）
  lengthScale: number;   // 長さ倍率
  widthScale: number;    // 幅倍率
}

/**
 * ノイズによる花びらの揺らぎ
 */
export interface NoiseWobble {
  enabled: boolean;
  seed: number;
  lengthAmount: number;
  angleAmount: number;   // 度
  scaleAmount: number;
  timeSpeed: number;
}

/**
 * 花冠（花びら＋中心）のパラメータ
 */
export interface InflorescenceParams {
  petal: PetalShape;
  layoutCount: number;    // 配置計算に使う総枚数（散っても位置がずれないように固定）
  head: HeadVariant;
  center: CenterVariant;
  centerRadius: number;
  rotation: number;       // 度
  petalColor: Color;
  centerColor: Color;
  wobble: NoiseWobble;
}

/**
 * 茎から伸びる巻きひげ
 */
export interface TendrilParams {
  stemT: number;        // 茎上の位置（0=根元、1=先端）
  length: number;
  curlAmount: number;
  direction: -1 | 1;
  startAngle: number;   // ラジアン
  thickness: number;
}

/**
 * 茎のパラメータ
 */
export interface StemParams {
  height: number;
  thickness: number;
  taperRatio: number;   // 先端の太さ比率（0-1]
  curvature: number;    // -2〜2、左右への曲がり
  segments: number;     // 節の数（1以上）
  nodeWidth: number;    // 節の膨らみ（1以上）
  color: Color;
  tendrils: TendrilParams[];
}

/**
 * 1フレーム分の音声シグナル（外部の解析器から渡される）
 */
export interface AudioSignals {
  volume: number;            // 線形のRMS振幅（0以上）
  pitch: number;             // Hz（0は未検出）
  pitchConfidence: number;   // 0-1
  spectralFullness: number;  // 0-1
}

/**
 * 画面サイズ
 */
export interface Viewport {
  width: number;
  height: number;
}

/**
 * 描画コマンド（描画側に渡す）
 */
export type DrawCommand =
  | { type: 'polygon'; points: Point[]; fill: Color }
  | { type: 'line'; from: Point; to: Point; color: Color; width: number };

/**
 * 花から外れた花びら（FallingPetalSystemへの受け渡し用）
 */
export interface DetachedPetal {
  position: Point;     // 画面座標での花冠上の取り付け位置
  angleDeg: number;    // 外れる方向（度）
  shape: PetalShape;
  color: Color;
}

/**
 * 落下中の花びら
 */
export interface FallingPetal {
  baseX: number;             // 揺れの中心X
  baseY: number;
  vx: number;
  vy: number;
  rotation: number;          // 度
  rotationSpeed: number;     // 度/秒
  age: number;               // 秒
  alpha: number;             // 0-1
  wanderPhase: number;
  wanderAmplitude: number;
  wanderFrequency: number;   // Hz
  shape: PetalShape;
  color: Color;
  outline: Point[];          // 生成時に一度だけ構築
  alive: boolean;
}

/**
 * FallingPetalSystemの設定
 */
export interface FallingPetalConfig {
  gravity: number;           // px/s²
  initialUpPop: number;      // px/s
  maxLifetime: number;       // 秒
  fadeDelay: number;         // 秒
  fadeSpeed: number;         // 1秒あたりの透明度減少量
  tumbleSpeed: number;       // 度/秒
  wanderAmplitude: number;   // px
  wanderFrequency: number;   // Hz
  jitter: number;            // ばらつき（0.3 = ±30%）
  offscreenMargin: number;   // px
}

/**
 * 1ティック分の個体数の変化（デバッグ表示・テスト用）
 */
export interface TickStats {
  spawned: number;
  respawned: number;
  markedForFastDeath: number;
  removed: number;
  detachedPetals: number;
}

/**
 * 音声解析器のインターフェース
 */
export interface SignalSource {
  getSignals(): AudioSignals;
  isActive(): boolean;
}
