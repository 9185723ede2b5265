import type { AudioSignals } from './types';
import { AUDIO_SMOOTHING, BEAT_DETECTION } from './config';
import { normalizePitch } from './PitchUtils';

/**
 * 1極ローパス（指数移動平均）
 */
export function smooth(previous: number, input: number, alpha: number): number {
  return previous * (1 - alpha) + input * alpha;
}

function finiteOrZero(value: number): number {
  return Number.isFinite(value) && value > 0 ? value : 0;
}

/**
 * AudioActivityEstimatorクラス
 * 音声シグナルをスムージングし、ビート検出と「盛り上がり度」を計算する
 */
export class AudioActivityEstimator {
  private smoothedVolume: number = 0;
  private smoothedPitch: number = 0;
  private smoothedFullness: number = 0;
  private slowVolume: number = 0;
  private beatCooldown: number = 0;
  private beatHistory: number[] = [];
  private elapsedTime: number = 0;
  private activityLevel: number = 0;
  private beatThisTick: boolean = false;

  /**
   * 1ティック分更新する
   * @param deltaTime 経過時間（秒）
   * @param signals 音声シグナル（不正な値は0として扱う）
   */
  public update(deltaTime: number, signals: AudioSignals): void {
    this.elapsedTime += deltaTime;

    const volume = Math.min(1, finiteOrZero(signals.volume) * AUDIO_SMOOTHING.VOLUME_GAIN);
    const fullness = Math.min(1, finiteOrZero(signals.spectralFullness));
    const pitch = finiteOrZero(signals.pitch);
    const confidence = finiteOrZero(signals.pitchConfidence);

    this.smoothedVolume = smooth(this.smoothedVolume, volume, AUDIO_SMOOTHING.VOLUME_ALPHA);
    this.smoothedFullness = smooth(this.smoothedFullness, fullness, AUDIO_SMOOTHING.FULLNESS_ALPHA);

    // 信頼度が低い音高は無視する
    if (confidence > AUDIO_SMOOTHING.PITCH_MIN_CONFIDENCE && pitch > AUDIO_SMOOTHING.PITCH_MIN_HZ) {
      this.smoothedPitch = smooth(this.smoothedPitch, pitch, AUDIO_SMOOTHING.PITCH_ALPHA);
    }

    this.detectBeat(deltaTime);

    const target = 0.5 * this.getBeatDensity() + 0.3 * this.smoothedVolume + 0.2 * this.smoothedFullness;
    this.activityLevel = Math.max(0, Math.min(1, smooth(this.activityLevel, target, AUDIO_SMOOTHING.ACTIVITY_ALPHA)));
  }

  /**
   * 音量が遅いベースラインを一定比率以上上回ったらビートとみなす
   */
  private detectBeat(deltaTime: number): void {
    this.beatThisTick = false;
    this.slowVolume = smooth(this.slowVolume, this.smoothedVolume, BEAT_DETECTION.SLOW_ALPHA);
    this.beatCooldown = Math.max(0, this.beatCooldown - deltaTime);

    const ratio = this.slowVolume > 0 ? this.smoothedVolume / this.slowVolume : 0;
    if (
      this.beatCooldown <= 0
      && this.smoothedVolume > BEAT_DETECTION.MIN_VOLUME
      && ratio > BEAT_DETECTION.RATIO
    ) {
      this.beatCooldown = BEAT_DETECTION.COOLDOWN;
      this.beatHistory.push(this.elapsedTime);
      this.beatThisTick = true;
    }

    // 古いビートを捨てる
    const cutoff = this.elapsedTime - BEAT_DETECTION.HISTORY_SECONDS;
    while (this.beatHistory.length > 0 && this.beatHistory[0] < cutoff) {
      this.beatHistory.shift();
    }
  }

  public getSmoothedVolume(): number {
    return this.smoothedVolume;
  }

  public getSmoothedPitch(): number {
    return this.smoothedPitch;
  }

  public getSmoothedFullness(): number {
    return this.smoothedFullness;
  }

  public getSlowVolume(): number {
    return this.slowVolume;
  }

  /**
   * 正規化した音高（-1〜1）
   */
  public getPitchNorm(): number {
    return normalizePitch(this.smoothedPitch);
  }

  public getBeatDensity(): number {
    return Math.min(this.beatHistory.length / BEAT_DETECTION.DENSITY_FULL_COUNT, 1);
  }

  public getBeatCount(): number {
    return this.beatHistory.length;
  }

  public isBeat(): boolean {
    return this.beatThisTick;
  }

  public getActivityLevel(): number {
    return this.activityLevel;
  }

  public getElapsedTime(): number {
    return this.elapsedTime;
  }

  /**
   * 生成直後の状態に戻す
   */
  public reset(): void {
    this.smoothedVolume = 0;
    this.smoothedPitch = 0;
    this.smoothedFullness = 0;
    this.slowVolume = 0;
    this.beatCooldown = 0;
    this.beatHistory = [];
    this.elapsedTime = 0;
    this.activityLevel = 0;
    this.beatThisTick = false;
  }
}
