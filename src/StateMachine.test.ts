import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { LifeStage } from './types';
import { evaluateFastDeath, evaluateLifecycle, stageForPhase } from './StateMachine';

describe('StateMachine', () => {
  describe('stageForPhase', () => {
    it('境界の値は次の段階に入る', () => {
      expect(stageForPhase(0)).toBe(LifeStage.GROWING);
      expect(stageForPhase(0.15)).toBe(LifeStage.BLOOMING);
      expect(stageForPhase(0.6)).toBe(LifeStage.SHEDDING);
      expect(stageForPhase(0.8)).toBe(LifeStage.WILTING);
      expect(stageForPhase(0.95)).toBe(LifeStage.DYING);
      expect(stageForPhase(1)).toBe(LifeStage.DYING);
    });
  });

  describe('evaluateLifecycle', () => {
    it('成長中はスケールがease-inで大きくなり、音には反応しない', () => {
      const frame = evaluateLifecycle(0.075, 8);
      expect(frame.stage).toBe(LifeStage.GROWING);
      expect(frame.scale).toBeCloseTo(0.25, 10);
      expect(frame.stemScale).toBeCloseTo(0.5, 10);
      expect(frame.alpha).toBeCloseTo(0.5, 10);
      expect(frame.reactivity).toBe(0);
      expect(frame.visiblePetals).toBe(8);
    });

    it('開花中は全て1', () => {
      expect(evaluateLifecycle(0.4, 8)).toEqual({
        stage: LifeStage.BLOOMING,
        scale: 1,
        stemScale: 1,
        stemCurveMod: 0,
        alpha: 1,
        reactivity: 1,
        visiblePetals: 8
      });
    });

    it('散る段階の中間では半分の花びらが残る', () => {
      const frame = evaluateLifecycle(0.7, 8);
      expect(frame.stage).toBe(LifeStage.SHEDDING);
      expect(frame.visiblePetals).toBe(4);
      expect(frame.scale).toBeCloseTo(0.85, 10);
      expect(frame.reactivity).toBeCloseTo(0.5, 10);
    });

    it('phase 0.79では8枚の花びらが全て散っている（0.4は0に丸める）', () => {
      const frame = evaluateLifecycle(0.79, 8);
      expect(frame.stage).toBe(LifeStage.SHEDDING);
      expect(frame.visiblePetals).toBe(0);
    });

    it('萎れる段階では茎が縮んで曲がる', () => {
      const frame = evaluateLifecycle(0.875, 8);
      expect(frame.stage).toBe(LifeStage.WILTING);
      expect(frame.scale).toBeCloseTo(0.35, 10);
      expect(frame.stemScale).toBeCloseTo(0.7, 10);
      expect(frame.stemCurveMod).toBeCloseTo(0.75, 10);
      expect(frame.alpha).toBeCloseTo(0.7, 10);
      expect(frame.visiblePetals).toBe(0);
    });

    it('周期の終わりで完全に消える', () => {
      const frame = evaluateLifecycle(1, 8);
      expect(frame.stage).toBe(LifeStage.DYING);
      expect(frame.alpha).toBeCloseTo(0, 10);
      expect(frame.stemScale).toBeCloseTo(0, 10);
      expect(frame.scale).toBe(0.01);
    });

    it('範囲外のphaseはエラー', () => {
      expect(() => evaluateLifecycle(-0.1, 8)).toThrow('lifePhaseが範囲外です');
      expect(() => evaluateLifecycle(1.1, 8)).toThrow('lifePhaseが範囲外です');
      expect(() => evaluateLifecycle(Number.NaN, 8)).toThrow('lifePhaseが範囲外です');
    });

    it('Property: 散る段階では花びらの枚数が減る一方', () => {
      fc.assert(
        fc.property(
          fc.double({ min: 0.6, max: 0.7999, noNaN: true }),
          fc.double({ min: 0.6, max: 0.7999, noNaN: true }),
          fc.integer({ min: 1, max: 80 }),
          (a, b, petals) => {
            const earlier = Math.min(a, b);
            const later = Math.max(a, b);
            return evaluateLifecycle(later, petals).visiblePetals <= evaluateLifecycle(earlier, petals).visiblePetals;
          }
        )
      );
    });

    it('Property: 透明度は常に0-1', () => {
      fc.assert(
        fc.property(fc.double({ min: 0, max: 1, noNaN: true }), (phase) => {
          const { alpha } = evaluateLifecycle(phase, 10);
          return alpha >= 0 && alpha <= 1;
        })
      );
    });
  });

  describe('evaluateFastDeath', () => {
    it('開始時は元の見た目のまま', () => {
      const frame = evaluateFastDeath(0);
      expect(frame.stage).toBe(LifeStage.FAST_DEATH);
      expect(frame.scale).toBe(1);
      expect(frame.alpha).toBe(1);
      expect(frame.progress).toBe(0);
    });

    it('途中は二乗でフェードし、茎は30%まで縮む方向に進む', () => {
      const frame = evaluateFastDeath(1 / 3);
      expect(frame.progress).toBeCloseTo(0.5, 10);
      expect(frame.scale).toBeCloseTo(0.5, 10);
      expect(frame.alpha).toBeCloseTo(0.75, 10);
      expect(frame.stemScale).toBeCloseTo(0.65, 10);
      expect(frame.stemCurveMod).toBeCloseTo(1.5, 10);
    });

    it('進行度1で透明度0', () => {
      const frame = evaluateFastDeath(1);
      expect(frame.progress).toBe(1);
      expect(frame.alpha).toBe(0);
    });
  });
});
