import { describe, it, expect, beforeEach } from 'vitest';
import type { Color, PetalShape } from './types';
import { FallingPetalSystem } from './FallingPetalSystem';
import { SeededRandom } from './Randomness';

const shape: PetalShape = {
  count: 5,
  length: 10,
  widthRatio: 0.4,
  tipPointiness: 0.5,
  bulgePosition: 0.4,
  edgeCurvature: 0
};
const color: Color = { r: 240, g: 150, b: 180, a: 200 };

describe('FallingPetalSystem', () => {
  let system: FallingPetalSystem;

  beforeEach(() => {
    system = new FallingPetalSystem({ gravity: 50, initialUpPop: 10, maxLifetime: 4 }, new SeededRandom(3));
  });

  describe('spawn', () => {
    it('外れる方向に長さの40%ずらした位置から、上向きに弾けて出る', () => {
      const petal = system.spawn({ x: 0, y: 0 }, 90, shape, color);

      expect(petal.baseX).toBeCloseTo(4, 10);
      expect(petal.baseY).toBeCloseTo(0, 10);
      expect(petal.vx).toBeCloseTo(4, 10);
      expect(petal.vy).toBeCloseTo(-10, 10);
      expect(petal.alpha).toBe(1);
      expect(petal.shape.count).toBe(1);
      expect(petal.outline).toHaveLength(25);
    });

    it('回転速度と揺れは既定値から±30%の範囲でばらつく', () => {
      for (let i = 0; i < 20; i++) {
        const petal = system.spawn({ x: 0, y: 0 }, i * 18, shape, color);
        expect(Math.abs(petal.rotationSpeed)).toBeGreaterThanOrEqual(100 * 0.7);
        expect(Math.abs(petal.rotationSpeed)).toBeLessThanOrEqual(100 * 1.3);
        expect(petal.wanderAmplitude).toBeGreaterThanOrEqual(12 * 0.7);
        expect(petal.wanderAmplitude).toBeLessThanOrEqual(12 * 1.3);
        expect(petal.wanderFrequency).toBeGreaterThanOrEqual(0.6 * 0.7);
        expect(petal.wanderFrequency).toBeLessThanOrEqual(0.6 * 1.3);
      }
    });

    it('色はコピーして持つ', () => {
      const petal = system.spawn({ x: 0, y: 0 }, 0, shape, color);
      expect(petal.color).toEqual(color);
      expect(petal.color).not.toBe(color);
    });
  });

  describe('update', () => {
    it('重力50、上向き10なら1秒後の速度は40', () => {
      const petal = system.spawn({ x: 0, y: 0 }, 90, shape, color);
      for (let i = 0; i < 10; i++) {
        system.update(0.1);
      }
      expect(petal.vy).toBeCloseTo(40, 10);
      expect(petal.vx).toBeCloseTo(4, 10);
      expect(petal.baseX).toBeCloseTo(8, 10);
      expect(petal.baseY).toBeCloseTo(17.5, 10);
    });

    it('寿命4秒を過ぎると取り除かれる', () => {
      system.spawn({ x: 0, y: 0 }, 90, shape, color);
      for (let i = 0; i < 39; i++) {
        system.update(0.1);
      }
      expect(system.getPetals()).toHaveLength(1);
      // fadeDelayの2秒を過ぎた分だけ薄くなる
      const [petal] = system.getPetals();
      expect(petal.alpha).toBeCloseTo(0.2, 10);

      system.update(0.1);
      system.update(0.1);
      expect(system.getPetals()).toHaveLength(0);
    });

    it('画面の下に落ちたら取り除かれる', () => {
      system.setViewportHeight(100);
      system.spawn({ x: 0, y: 200 }, 0, shape, color);
      system.update(0.1);
      expect(system.getPetals()).toHaveLength(0);
    });

    it('clearで全て消える', () => {
      system.spawn({ x: 0, y: 0 }, 0, shape, color);
      system.spawn({ x: 0, y: 0 }, 45, shape, color);
      system.clear();
      expect(system.getPetals()).toHaveLength(0);
    });
  });

  describe('draw', () => {
    it('揺れを加えた位置に、透明度を掛けた色で描く', () => {
      const petal = system.spawn({ x: 50, y: 50 }, 0, shape, color);
      const commands = system.draw();

      expect(commands).toHaveLength(1);
      const [command] = commands;
      if (command.type !== 'polygon') {
        throw new Error('polygonではありません');
      }
      const position = system.drawPosition(petal);
      expect(position.x).toBeCloseTo(petal.baseX + petal.wanderAmplitude * Math.sin(petal.wanderPhase), 10);
      expect(command.points[0].x).toBeCloseTo(position.x, 10);
      expect(command.points[0].y).toBeCloseTo(position.y, 10);
      expect(command.fill).toEqual({ r: 240, g: 150, b: 180, a: 200 });
    });

    it('長さ0の花びらは描かない', () => {
      system.spawn({ x: 0, y: 0 }, 0, { ...shape, length: 0 }, color);
      expect(system.draw()).toEqual([]);
    });
  });
});
