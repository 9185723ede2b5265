import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { GrowthController, type SpeedInputs } from './GrowthController';

const calm: SpeedInputs = {
  fullness: 1,
  activityLevel: 0,
  reactive: false,
  population: 120,
  baseCount: 120
};

describe('GrowthController', () => {
  const controller = new GrowthController();

  describe('lifecycleSpeed', () => {
    it('スペクトルが満ちていれば約18秒で1周する', () => {
      expect(controller.lifecycleSpeed(calm)).toBeCloseTo(1 / 18, 12);
    });

    it('無音でも止まらない', () => {
      expect(controller.lifecycleSpeed({ ...calm, fullness: 0 })).toBeCloseTo(0.05 / 18, 12);
    });

    it('リアクティブモードでは盛り上がり度で速くなる', () => {
      expect(controller.lifecycleSpeed({ ...calm, reactive: true, activityLevel: 1 })).toBeCloseTo(2.5 / 18, 12);
    });

    it('通常モードで個体数が多すぎる時は入れ替えを早める（最大8倍）', () => {
      expect(controller.lifecycleSpeed({ ...calm, population: 240 })).toBeCloseTo(3 / 18, 12);
      expect(controller.lifecycleSpeed({ ...calm, population: 1200 })).toBeCloseTo(8 / 18, 12);
      // リアクティブモードでは個体数を見ない
      expect(controller.lifecycleSpeed({ ...calm, population: 240, reactive: true })).toBeCloseTo(1 / 18, 12);
    });

    it('Property: 速度は常に正', () => {
      fc.assert(
        fc.property(
          fc.double({ min: 0, max: 1, noNaN: true }),
          fc.double({ min: 0, max: 1, noNaN: true }),
          fc.boolean(),
          fc.integer({ min: 0, max: 1500 }),
          (fullness, activityLevel, reactive, population) => {
            const speed = controller.lifecycleSpeed({ fullness, activityLevel, reactive, population, baseCount: 120 });
            return speed > 0 && speed <= (8 / 18) + 1e-12;
          }
        )
      );
    });
  });

  describe('populationTarget', () => {
    it('盛り上がり度に応じて30〜1500', () => {
      expect(controller.populationTarget(0)).toBe(30);
      expect(controller.populationTarget(0.5)).toBe(765);
      expect(controller.populationTarget(1)).toBe(1500);
    });

    it('範囲外や不正な値は制限される', () => {
      expect(controller.populationTarget(2)).toBe(1500);
      expect(controller.populationTarget(-1)).toBe(30);
      expect(controller.populationTarget(Number.NaN)).toBe(30);
    });
  });
});
