import { LIFECYCLE, POPULATION } from './config';

/**
 * lifecycleSpeedの入力
 */
export interface SpeedInputs {
  fullness: number;        // スムージング済みのスペクトルの充実度（0-1）
  activityLevel: number;   // 盛り上がり度（0-1）
  reactive: boolean;       // リアクティブモードか
  population: number;      // 現在の個体数
  baseCount: number;       // 通常モードの個体数
}

/**
 * GrowthControllerクラス
 * 音声の盛り上がりに応じて、ライフサイクルの速度と目標個体数を計算
 */
export class GrowthController {
  /**
   * ライフサイクルの速度（1秒あたりのlifePhase増分）
   * スペクトルが満ちているほど速く（最速で約18秒で1周）、静かでも止まらない
   */
  public lifecycleSpeed(inputs: SpeedInputs): number {
    const fullness = Math.max(0, Math.min(1, inputs.fullness));
    const baseSpeed = 1 / LIFECYCLE.BASE_CYCLE_SECONDS;
    const speed = baseSpeed * (LIFECYCLE.MIN_SPEED_FACTOR + fullness * (1 - LIFECYCLE.MIN_SPEED_FACTOR));

    if (inputs.reactive) {
      return speed * (1 + POPULATION.REACTIVE_SPEED_GAIN * Math.max(0, Math.min(1, inputs.activityLevel)));
    }

    // 通常モードに戻った直後は、増えすぎた分に比例して早く入れ替える
    const overshoot = inputs.baseCount > 0 ? (inputs.population - inputs.baseCount) / inputs.baseCount : 0;
    if (overshoot > 0) {
      return speed * Math.min(1 + POPULATION.RETURN_SPEED_GAIN * overshoot, POPULATION.RETURN_SPEED_MAX);
    }
    return speed;
  }

  /**
   * リアクティブモードの目標個体数
   * @param activityLevel 盛り上がり度（0-1）
   */
  public populationTarget(activityLevel: number): number {
    const t = Math.max(0, Math.min(1, Number.isFinite(activityLevel) ? activityLevel : 0));
    return Math.round(POPULATION.MIN_TARGET + (POPULATION.MAX_TARGET - POPULATION.MIN_TARGET) * t);
  }
}
