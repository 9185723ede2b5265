import { describe, it, expect } from 'vitest';
import type { InflorescenceParams, StemParams } from './types';
import { Flower } from './Flower';
import { Stem } from './Stem';
import { SeededRandom } from './Randomness';

const stemParams: StemParams = {
  height: 100,
  thickness: 6,
  taperRatio: 0.5,
  curvature: 0,
  segments: 3,
  nodeWidth: 1.3,
  color: { r: 50, g: 140, b: 70, a: 255 },
  tendrils: [{ stemT: 0.4, length: 20, curlAmount: 1.5, direction: 1, startAngle: 0.3, thickness: 2 }]
};

const headParams: InflorescenceParams = {
  petal: { count: 6, length: 12, widthRatio: 0.35, tipPointiness: 0.5, bulgePosition: 0.4, edgeCurvature: 0 },
  layoutCount: 6,
  head: { kind: 'radial' },
  center: { kind: 'simpleDisc' },
  centerRadius: 4,
  rotation: 0,
  petalColor: { r: 230, g: 90, b: 120, a: 255 },
  centerColor: { r: 250, g: 220, b: 80, a: 255 },
  wobble: { enabled: false, seed: 0, lengthAmount: 0, angleAmount: 0, scaleAmount: 0, timeSpeed: 0 }
};

describe('Stem', () => {
  it('リボンの輪郭1つと巻きひげの線15本を描く', () => {
    const stem = new Stem(stemParams);
    const commands = stem.draw({ x: 0, y: 0 });

    expect(commands).toHaveLength(16);
    expect(commands[0].type).toBe('polygon');

    const firstLine = commands[1];
    const lastLine = commands[15];
    if (firstLine.type !== 'line' || lastLine.type !== 'line') {
      throw new Error('lineではありません');
    }
    // 先端ほど細い
    expect(firstLine.width).toBe(2);
    expect(lastLine.width).toBeCloseTo(2 * (1 - 0.5 * (14 / 15)), 10);
  });

  it('色の変更では輪郭を再生成しない', () => {
    const stem = new Stem(stemParams);
    stem.draw({ x: 0, y: 0 });
    stem.setParams({ ...stemParams, color: { ...stemParams.color, a: 10 } });
    stem.draw({ x: 0, y: 0 });
    expect(stem.getRebuildCount()).toBe(1);

    stem.setParams({ ...stemParams, height: 80 });
    stem.draw({ x: 0, y: 0 });
    expect(stem.getRebuildCount()).toBe(2);
  });

  it('高さ0なら何も描かない', () => {
    const stem = new Stem({ ...stemParams, height: 0 });
    expect(stem.draw({ x: 0, y: 0 })).toEqual([]);
  });
});

describe('Flower', () => {
  it('花冠は茎の先端に付く', () => {
    const flower = new Flower(headParams, stemParams, new SeededRandom(3));
    expect(flower.headPosition({ x: 100, y: 500 })).toEqual({ x: 100, y: 400 });
  });

  it('茎→花びら→中心の順に描く', () => {
    const flower = new Flower(headParams, stemParams, new SeededRandom(3));
    const commands = flower.draw({ x: 100, y: 500 }, 0);

    // 茎16＋花びら6＋中心1
    expect(commands).toHaveLength(23);
    const stemCommand = commands[0];
    const centerCommand = commands[22];
    if (stemCommand.type !== 'polygon' || centerCommand.type !== 'polygon') {
      throw new Error('polygonではありません');
    }
    expect(stemCommand.fill).toEqual(stemParams.color);
    expect(centerCommand.fill).toEqual(headParams.centerColor);
  });
});
