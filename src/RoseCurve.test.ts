import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { RoseCurve } from './RoseCurve';

describe('RoseCurve', () => {
  const roseCurve = new RoseCurve();

  describe('Unit Tests', () => {
    it('半径は|a cos(kθ)|', () => {
      expect(roseCurve.calculateRadius(0, 2, 3)).toBe(2);
      expect(roseCurve.calculateRadius(Math.PI / 6, 1, 3)).toBeCloseTo(0, 10);
      expect(roseCurve.calculateRadius(Math.PI / 3, 1, 3)).toBeCloseTo(1, 10);
    });

    it('座標変換の具体例テスト', () => {
      const cartesian1 = roseCurve.polarToCartesian(100, 0);
      expect(cartesian1.x).toBeCloseTo(100, 5);
      expect(cartesian1.y).toBeCloseTo(0, 5);

      const cartesian2 = roseCurve.polarToCartesian(100, Math.PI / 2, 10, 20);
      expect(cartesian2.x).toBeCloseTo(10, 5);
      expect(cartesian2.y).toBeCloseTo(120, 5);
    });

    it('山の位置の花びらは倍率1', () => {
      expect(roseCurve.lengthScale(0, 5, 0.4)).toBeCloseTo(1, 10);
    });
  });

  describe('Property-Based Tests', () => {
    it('長さ倍率は常に[baseScale, 1]に収まる', () => {
      fc.assert(
        fc.property(
          fc.double({ min: 0, max: 360, noNaN: true }),
          fc.constantFrom(2, 3, 4, 5, 2.5),
          fc.double({ min: 0, max: 1, noNaN: true }),
          (angleDeg, k, baseScale) => {
            const scale = roseCurve.lengthScale(angleDeg, k, baseScale);
            return scale >= baseScale - 1e-12 && scale <= 1 + 1e-12;
          }
        )
      );
    });
  });
});
