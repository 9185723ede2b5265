import type { AudioSignals, SignalSource } from './types';

const BEATS_PER_SECOND = 2;
const PHRASE_SECONDS = 24;

/**
 * DemoSignalSource - マイクなしで動かすための合成シグナル
 * 120BPMの拍と、24秒周期で盛り上がるフレーズをいくつかの正弦波で作る
 */
export class DemoSignalSource implements SignalSource {
  private clock: () => number;
  private startTime: number;

  /**
   * @param clock 現在時刻（秒）を返す関数
   */
  constructor(clock: () => number = () => performance.now() / 1000) {
    this.clock = clock;
    this.startTime = clock();
  }

  /**
   * 時刻tでのシグナル
   * @param t 開始からの経過秒
   */
  public sample(t: number): AudioSignals {
    const phrase = 0.5 + 0.5 * Math.sin((2 * Math.PI * t) / PHRASE_SECONDS);
    const beatPhase = (t * BEATS_PER_SECOND) % 1;
    const pulse = Math.exp(-beatPhase * 8);

    const volume = 0.015 + 0.005 * Math.sin(t / 1.7) + (0.03 + 0.12 * phrase) * pulse;

    // 変則的に揺れるメロディ（半音単位）
    const semitones = Math.sin(t / 1.0) * 5 + Math.sin(t / 1.7) * 3;
    const pitch = 261 * Math.pow(2, semitones / 12);

    const fullness = Math.max(0, Math.min(1, 0.2 + 0.6 * phrase + 0.1 * Math.sin(t / 1.3)));

    return { volume, pitch, pitchConfidence: 0.8, spectralFullness: fullness };
  }

  public getSignals(): AudioSignals {
    return this.sample(this.clock() - this.startTime);
  }

  public isActive(): boolean {
    return true;
  }
}
