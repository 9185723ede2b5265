import { describe, it, expect, beforeEach } from 'vitest';
import * as fc from 'fast-check';
import type { AudioSignals } from './types';
import { AudioActivityEstimator, smooth } from './AudioActivity';

const DT = 1 / 60;

function signals(volume: number, overrides: Partial<AudioSignals> = {}): AudioSignals {
  return { volume, pitch: 0, pitchConfidence: 0, spectralFullness: 0, ...overrides };
}

describe('AudioActivityEstimator', () => {
  let estimator: AudioActivityEstimator;

  beforeEach(() => {
    estimator = new AudioActivityEstimator();
  });

  describe('スムージング', () => {
    it('smoothは1極ローパス', () => {
      expect(smooth(0, 1, 0.08)).toBeCloseTo(0.08, 12);
      expect(smooth(1, 1, 0.5)).toBe(1);
    });

    it('音量は5倍して1で頭打ちにしてから平滑化する', () => {
      estimator.update(DT, signals(1));
      expect(estimator.getSmoothedVolume()).toBeCloseTo(0.08, 12);
    });

    it('信頼度の低い音高は無視する', () => {
      estimator.update(DT, signals(0, { pitch: 440, pitchConfidence: 0.05 }));
      expect(estimator.getSmoothedPitch()).toBe(0);

      estimator.update(DT, signals(0, { pitch: 440, pitchConfidence: 0.5 }));
      expect(estimator.getSmoothedPitch()).toBeCloseTo(52.8, 10);
    });

    it('不正な入力は0として扱う', () => {
      estimator.update(DT, signals(Number.NaN, { spectralFullness: -1, pitch: Number.POSITIVE_INFINITY, pitchConfidence: 1 }));
      estimator.update(DT, signals(-3, { spectralFullness: Number.NaN }));
      expect(estimator.getSmoothedVolume()).toBe(0);
      expect(estimator.getSmoothedFullness()).toBe(0);
      expect(estimator.getSmoothedPitch()).toBe(0);
      expect(estimator.getActivityLevel()).toBe(0);
    });
  });

  describe('ビート検出', () => {
    it('音量のステップでクールダウン中に1回だけビートを検出する', () => {
      // 小さな音（0.004×5=0.02）で落ち着かせる。最小音量0.05未満なのでビートにならない
      for (let i = 0; i < 600; i++) {
        estimator.update(DT, signals(0.004));
        expect(estimator.isBeat()).toBe(false);
      }
      expect(estimator.getBeatCount()).toBe(0);

      // 0.02×5=0.1にステップ
      const beatTicks: number[] = [];
      for (let i = 0; i < 22; i++) {
        estimator.update(DT, signals(0.02));
        if (estimator.isBeat()) {
          beatTicks.push(i);
        }
      }

      // 6ティック目で検出、0.25秒のクールダウン明けにもう1回
      expect(beatTicks).toEqual([5, 21]);
      expect(estimator.getBeatCount()).toBe(2);
      expect(estimator.getBeatDensity()).toBeCloseTo(0.1, 12);
    });

    it('5秒より古いビートは忘れる', () => {
      for (let i = 0; i < 600; i++) {
        estimator.update(DT, signals(0.004));
      }
      for (let i = 0; i < 10; i++) {
        estimator.update(DT, signals(0.02));
      }
      expect(estimator.getBeatCount()).toBe(1);

      for (let i = 0; i < 360; i++) {
        estimator.update(DT, signals(0));
      }
      expect(estimator.getBeatCount()).toBe(0);
      expect(estimator.getBeatDensity()).toBe(0);
    });
  });

  describe('盛り上がり度', () => {
    it('Property: どんな入力でも0-1に収まる', () => {
      fc.assert(
        fc.property(
          fc.array(
            fc.record({
              volume: fc.double({ min: 0, max: 2, noNaN: true }),
              pitch: fc.double({ min: 0, max: 4000, noNaN: true }),
              pitchConfidence: fc.double({ min: 0, max: 1, noNaN: true }),
              spectralFullness: fc.double({ min: 0, max: 1, noNaN: true })
            }),
            { minLength: 1, maxLength: 200 }
          ),
          (frames) => {
            const local = new AudioActivityEstimator();
            for (const frame of frames) {
              local.update(DT, frame);
              const level = local.getActivityLevel();
              if (level < 0 || level > 1) {
                return false;
              }
            }
            return true;
          }
        ),
        { numRuns: 50 }
      );
    });

    it('大きく満ちた音が続くと上がっていく', () => {
      let previous = 0;
      for (let i = 0; i < 120; i++) {
        estimator.update(DT, signals(0.3, { spectralFullness: 0.9 }));
        expect(estimator.getActivityLevel()).toBeGreaterThanOrEqual(previous);
        previous = estimator.getActivityLevel();
      }
      expect(previous).toBeGreaterThan(0.1);
    });

    it('resetで生成直後の状態に戻る', () => {
      estimator.update(DT, signals(0.3, { spectralFullness: 0.9, pitch: 300, pitchConfidence: 0.9 }));
      estimator.reset();
      expect(estimator.getSmoothedVolume()).toBe(0);
      expect(estimator.getSmoothedPitch()).toBe(0);
      expect(estimator.getActivityLevel()).toBe(0);
      expect(estimator.getElapsedTime()).toBe(0);
      expect(estimator.getBeatCount()).toBe(0);
    });
  });
});
