import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import type { Point, StemParams, TendrilParams } from './types';
import {
  buildStemOutline,
  buildTendrilPath,
  nodeBulgeFactor,
  stemPointAt,
  stemTangentAt,
  stemTop
} from './StemGeometry';

const straightStem: StemParams = {
  height: 100,
  thickness: 10,
  taperRatio: 0.5,
  curvature: 0,
  segments: 2,
  nodeWidth: 1,
  color: { r: 40, g: 120, b: 60, a: 255 },
  tendrils: []
};

const tendril: TendrilParams = {
  stemT: 0.5,
  length: 30,
  curlAmount: 0,
  direction: 1,
  startAngle: 0,
  thickness: 1
};

function pathLength(points: Point[]): number {
  let total = 0;
  for (let i = 1; i < points.length; i++) {
    total += Math.hypot(points[i].x - points[i - 1].x, points[i].y - points[i - 1].y);
  }
  return total;
}

describe('StemGeometry', () => {
  describe('中心線', () => {
    it('先端は曲がり具合に応じて横にずれる', () => {
      const top = stemTop({ height: 100, curvature: 1 });
      expect(top.x).toBeCloseTo(30, 10);
      expect(top.y).toBe(-100);
    });

    it('t=0で根元、t=1で先端を通る', () => {
      fc.assert(
        fc.property(
          fc.double({ min: 1, max: 500, noNaN: true }),
          fc.double({ min: -2, max: 2, noNaN: true }),
          (height, curvature) => {
            const stem = { height, curvature };
            const base = stemPointAt(stem, 0);
            const top = stemPointAt(stem, 1);
            const expected = stemTop(stem);
            return Math.abs(base.x) < 1e-9
              && Math.abs(base.y) < 1e-9
              && Math.abs(top.x - expected.x) < 1e-9
              && Math.abs(top.y - expected.y) < 1e-9;
          }
        )
      );
    });

    it('まっすぐな茎の接線は真上を向く', () => {
      const tangent = stemTangentAt({ height: 100, curvature: 0 }, 0.3);
      expect(tangent.x).toBeCloseTo(0, 10);
      expect(tangent.y).toBeCloseTo(-1, 10);
    });

    it('高さ0の茎では接線は真上にフォールバックする', () => {
      expect(stemTangentAt({ height: 0, curvature: 1 }, 0.5)).toEqual({ x: 0, y: -1 });
    });
  });

  describe('nodeBulgeFactor', () => {
    it('節の境界で最大、離れると1', () => {
      expect(nodeBulgeFactor(0.5, 2, 2)).toBeCloseTo(2, 10);
      expect(nodeBulgeFactor(0.25, 2, 2)).toBe(1);
      expect(nodeBulgeFactor(0.5, 2, 1)).toBe(1);
    });
  });

  describe('buildStemOutline', () => {
    it('左右の縁を合わせて閉じたリボンになり、先端はtaperRatioだけ細い', () => {
      const outline = buildStemOutline(straightStem);

      // 20サンプル → 左右21点ずつ＋閉じる点
      expect(outline).toHaveLength(43);
      expect(outline[0].x).toBeCloseTo(5, 10);
      expect(outline[0].y).toBeCloseTo(0, 10);
      expect(outline[20].x).toBeCloseTo(2.5, 10);
      expect(outline[20].y).toBeCloseTo(-100, 10);
      expect(outline[21].x).toBeCloseTo(-2.5, 10);
      expect(outline[41].x).toBeCloseTo(-5, 10);
      expect(outline[42]).toEqual(outline[0]);
    });

    it('高さまたは太さが0なら空配列', () => {
      expect(buildStemOutline({ ...straightStem, height: 0 })).toEqual([]);
      expect(buildStemOutline({ ...straightStem, thickness: 0 })).toEqual([]);
    });
  });

  describe('buildTendrilPath', () => {
    it('16点の折れ線で、全長は指定長さの80%になる', () => {
      const path = buildTendrilPath(straightStem, tendril);
      expect(path).toHaveLength(16);
      expect(path[0].x).toBeCloseTo(0, 10);
      expect(path[0].y).toBeCloseTo(-65, 10);
      expect(pathLength(path)).toBeCloseTo(24, 8);
    });

    it('巻きがなければ外向きにまっすぐ伸び、directionで左右が決まる', () => {
      const right = buildTendrilPath(straightStem, tendril);
      expect(right[15].x).toBeCloseTo(24, 8);
      expect(right[15].y).toBeCloseTo(-65, 8);

      const left = buildTendrilPath(straightStem, { ...tendril, direction: -1 });
      expect(left[15].x).toBeCloseTo(-24, 8);
      expect(left[15].y).toBeCloseTo(-65, 8);
    });
  });
});
