import type { FallingPetalConfig } from './types';

/**
 * ライフサイクルの段階境界（lifePhase 0-1 に対する値）
 */
export const LIFECYCLE = {
  GROW_END: 0.15,
  BLOOM_END: 0.60,
  SHED_END: 0.80,
  WILT_END: 0.95,

  SHED_MIN_SCALE: 0.7,        // 花びらが散り終わった時の花冠スケール
  WILT_STEM_SHRINK: 0.6,      // 萎れで茎が縮む割合（1→0.4）
  WILT_MIN_ALPHA: 0.4,
  DYING_HEAD_SCALE: 0.01,
  DROOP: 1.5,                 // 萎れによる茎の曲がり

  FAST_DEATH_RATE: 1.5,       // fd = timer * rate
  FAST_DEATH_STEM: 0.3,
  FAST_DEATH_DROOP: 3.0,

  VOLUME_PULSE: 0.9,
  PITCH_POINTINESS: 0.35,
  BASE_CYCLE_SECONDS: 18,
  MIN_SPEED_FACTOR: 0.05,
} as const;

/**
 * 音声シグナルのスムージング係数（1ティックあたりのEMA係数）
 */
export const AUDIO_SMOOTHING = {
  VOLUME_ALPHA: 0.08,
  VOLUME_GAIN: 5,
  FULLNESS_ALPHA: 0.10,
  PITCH_ALPHA: 0.12,
  PITCH_MIN_HZ: 50,
  PITCH_MIN_CONFIDENCE: 0.1,
  PITCH_CENTER_HZ: 261,
  PITCH_MAX_HZ: 2500,
  ACTIVITY_ALPHA: 0.03,
} as const;

/**
 * ビート検出の閾値
 */
export const BEAT_DETECTION = {
  SLOW_ALPHA: 0.02,
  COOLDOWN: 0.25,          // 秒
  MIN_VOLUME: 0.05,
  RATIO: 1.4,
  HISTORY_SECONDS: 5,
  DENSITY_FULL_COUNT: 20,  // 5秒間にこの回数で密度1.0
} as const;

/**
 * 個体数制御
 */
export const POPULATION = {
  DEFAULT_BASE_COUNT: 120,
  MIN_TARGET: 30,
  MAX_TARGET: 1500,
  MAX_SPAWN_PER_TICK: 10,
  MAX_FAST_DEATH_PER_TICK: 5,
  FAST_DEATH_ATTEMPTS: 5,
  REACTIVE_SPEED_GAIN: 1.5,
  RETURN_SPEED_GAIN: 2,
  RETURN_SPEED_MAX: 8,
} as const;

/**
 * ジオメトリ生成の分割数など
 */
export const GEOMETRY = {
  PETAL_CURVE_SEGMENTS: 12,
  PETAL_TIP_INSET: 0.08,        // 先端手前の制御点（長さに対する比率）
  STEM_SAMPLES_PER_SEGMENT: 8,
  STEM_MIN_SAMPLES: 20,
  STEM_NODE_RADIUS: 0.06,
  TENDRIL_STEPS: 15,
  TENDRIL_MIN_STEP_RATIO: 0.6,
  WOBBLE_INDEX_STRIDE: 7.3,
  GOLDEN_ANGLE: 137.508,
  SUPERFORMULA_MIN: 0.2,
  SUPERFORMULA_MAX: 1.5,
  CIRCLE_SEGMENTS: 24,
  MIN_DRAW_ALPHA: 0.01,
} as const;

/**
 * 落下する花びらの既定値
 */
export const FALLING_PETAL_DEFAULTS: FallingPetalConfig = {
  gravity: 60,
  initialUpPop: 30,
  maxLifetime: 6,
  fadeDelay: 2,
  fadeSpeed: 0.4,
  tumbleSpeed: 100,
  wanderAmplitude: 12,
  wanderFrequency: 0.6,
  jitter: 0.3,
  offscreenMargin: 50,
};

/**
 * 新しい個体を生成する時のランダム範囲（[min, max]）
 */
export const IDENTITY_RANGES = {
  POSITION_X: [0.02, 0.98],
  POSITION_Y: [0.05, 0.98],
  DEPTH_SCALE: [0.3, 1.2],

  PETAL_COUNT: [4, 9],           // 上限は含まない
  PETAL_LENGTH: [35, 75],
  PETAL_WIDTH: [0.2, 0.55],
  POINTINESS: [0.2, 0.8],
  BULGE: [0.3, 0.7],
  EDGE_CURVATURE: [-0.15, 0.4],
  CENTER_RADIUS: [4, 12],
  CENTER_DETAIL: [4, 13],        // 上限は含まない

  PHYLLOTAXIS_COUNT: [12, 25],
  SPIRAL_SPACING: [0.04, 0.09],
  ROSE_K: [2, 3, 4, 5, 2.5],
  ROSE_BASE_SCALE: [0.3, 0.7],
  ROSE_COUNT: [5, 11],
  SUPERFORMULA_M: [3, 9],
  SUPERFORMULA_N: [0.5, 3],
  SUPERFORMULA_COUNT: [6, 13],
  WHORL_LAYERS: [2, 4],
  WHORL_PETALS: [5, 9],
  WHORL_FALLOFF: [0.6, 0.85],
  WHORL_WIDTH_GROWTH: [0.05, 0.25],

  STEM_HEIGHT: [60, 140],
  STEM_CURVATURE: [-0.4, 0.4],
  STEM_THICKNESS: [1.5, 4],      // 奥行きで補間
  STEM_TAPER: [0.4, 0.8],
  STEM_SEGMENTS: [2, 6],
  STEM_NODE_WIDTH: [1, 1.6],
  TENDRIL_MAX: 2,
  TENDRIL_T: [0.3, 0.8],
  TENDRIL_LENGTH: [10, 25],
  TENDRIL_CURL: [1, 3],
  TENDRIL_ANGLE: [0.2, 1.0],
  TENDRIL_THICKNESS: [0.6, 1.2],

  LIFE_SPEED: [0.7, 1.3],
  REACTIVITY_BIAS: [0.6, 1.4],
  ROTATION_SPEED: [0, 15],       // 度/秒

  WOBBLE_CHANCE: 0.5,
  WOBBLE_LENGTH: [0.05, 0.2],
  WOBBLE_ANGLE: [3, 10],
  WOBBLE_SCALE: [0.02, 0.08],
  WOBBLE_TIME_SPEED: [0.3, 1.0],
} as const;

/**
 * 花冠トポロジーの出現比率
 */
export const HEAD_VARIANT_WEIGHTS = {
  radial: 0.3,
  phyllotaxis: 0.15,
  roseCurve: 0.2,
  superformula: 0.15,
  layeredWhorls: 0.2,
} as const;

/**
 * カラースキームの切り替え
 */
export const COLOR_SCHEME = {
  CYCLING: 0,
  RANDOM_PER_SPAWN: 9,
  CYCLE_SECONDS: 20,
} as const;
