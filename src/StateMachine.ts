import { LifeStage } from './types';
import { LIFECYCLE } from './config';

/**
 * ライフサイクルの1フレーム分の出力
 */
export interface LifecycleFrame {
  stage: LifeStage;
  scale: number;          // 花冠のスケール
  stemScale: number;      // 茎の高さのスケール
  stemCurveMod: number;   // 萎れによる追加の曲がり
  alpha: number;
  reactivity: number;     // 音への反応の強さ（0-1）
  visiblePetals: number;
}

/**
 * lifePhaseに対応する段階
 * @param phase 0-1
 */
export function stageForPhase(phase: number): LifeStage {
  if (phase < LIFECYCLE.GROW_END) return LifeStage.GROWING;
  if (phase < LIFECYCLE.BLOOM_END) return LifeStage.BLOOMING;
  if (phase < LIFECYCLE.SHED_END) return LifeStage.SHEDDING;
  if (phase < LIFECYCLE.WILT_END) return LifeStage.WILTING;
  return LifeStage.DYING;
}

/**
 * 段階内の進行度（0-1）
 */
function progressWithin(phase: number, start: number, end: number): number {
  return (phase - start) / (end - start);
}

/**
 * lifePhaseから花の見た目を計算する
 *
 * 成長(0-0.15) → 開花(0.15-0.60) → 花びらが散る(0.60-0.80) → 萎れる(0.80-0.95) → 消える(0.95-1.0)
 *
 * @param phase 0-1
 * @param basePetalCount 元の花びらの枚数
 */
export function evaluateLifecycle(phase: number, basePetalCount: number): LifecycleFrame {
  if (!(phase >= 0 && phase <= 1)) {
    throw new Error(`lifePhaseが範囲外です: ${phase}`);
  }

  const stage = stageForPhase(phase);

  switch (stage) {
    case LifeStage.GROWING: {
      const t = progressWithin(phase, 0, LIFECYCLE.GROW_END);
      return {
        stage,
        scale: t * t, // ease-in
        stemScale: t,
        stemCurveMod: 0,
        alpha: t,
        reactivity: 0,
        visiblePetals: basePetalCount
      };
    }

    case LifeStage.BLOOMING:
      return {
        stage,
        scale: 1,
        stemScale: 1,
        stemCurveMod: 0,
        alpha: 1,
        reactivity: 1,
        visiblePetals: basePetalCount
      };

    case LifeStage.SHEDDING: {
      const t = progressWithin(phase, LIFECYCLE.BLOOM_END, LIFECYCLE.SHED_END);
      return {
        stage,
        scale: 1 - t * (1 - LIFECYCLE.SHED_MIN_SCALE),
        stemScale: 1,
        stemCurveMod: 0,
        alpha: 1,
        reactivity: 1 - t,
        visiblePetals: Math.max(0, Math.round(basePetalCount * (1 - t)))
      };
    }

    case LifeStage.WILTING: {
      const t = progressWithin(phase, LIFECYCLE.SHED_END, LIFECYCLE.WILT_END);
      return {
        stage,
        scale: (1 - t) * LIFECYCLE.SHED_MIN_SCALE,
        stemScale: 1 - t * LIFECYCLE.WILT_STEM_SHRINK,
        stemCurveMod: t * LIFECYCLE.DROOP,
        alpha: 1 - t * (1 - LIFECYCLE.WILT_MIN_ALPHA),
        reactivity: 0,
        visiblePetals: 0
      };
    }

    case LifeStage.DYING:
    default: {
      const t = Math.min(1, progressWithin(phase, LIFECYCLE.WILT_END, 1));
      return {
        stage: LifeStage.DYING,
        scale: LIFECYCLE.DYING_HEAD_SCALE,
        stemScale: (1 - LIFECYCLE.WILT_STEM_SHRINK) * (1 - t),
        stemCurveMod: LIFECYCLE.DROOP,
        alpha: (1 - t) * LIFECYCLE.WILT_MIN_ALPHA,
        reactivity: 0,
        visiblePetals: 0
      };
    }
  }
}

/**
 * 早送りの枯死（個体数を減らす時に使う）
 * @param fastDeathTimer 枯死開始からの経過時間（秒）
 * @returns fd >= 1 で完全に消えた状態
 */
export function evaluateFastDeath(fastDeathTimer: number): LifecycleFrame & { progress: number } {
  const fd = Math.min(Math.max(0, fastDeathTimer) * LIFECYCLE.FAST_DEATH_RATE, 1);
  return {
    stage: LifeStage.FAST_DEATH,
    progress: fd,
    scale: 1 - fd,
    stemScale: 1 - fd * (1 - LIFECYCLE.FAST_DEATH_STEM),
    stemCurveMod: fd * LIFECYCLE.FAST_DEATH_DROOP,
    alpha: fd >= 1 ? 0 : 1 - fd * fd,
    reactivity: 0,
    visiblePetals: 0
  };
}
