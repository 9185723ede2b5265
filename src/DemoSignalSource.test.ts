import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { DemoSignalSource } from './DemoSignalSource';

describe('DemoSignalSource', () => {
  it('拍の頭で音量が跳ね上がる', () => {
    const source = new DemoSignalSource(() => 0);
    const start = source.sample(0);

    expect(start.volume).toBeCloseTo(0.105, 12);
    expect(start.pitch).toBe(261);
    expect(start.spectralFullness).toBeCloseTo(0.5, 12);
    expect(start.pitchConfidence).toBe(0.8);

    expect(source.sample(1.0).volume).toBeGreaterThan(source.sample(1.25).volume);
  });

  it('getSignalsは生成時からの経過時間で計算する', () => {
    let now = 100;
    const source = new DemoSignalSource(() => now);
    now = 103.5;
    expect(source.getSignals()).toEqual(source.sample(3.5));
    expect(source.isActive()).toBe(true);
  });

  it('Property: シグナルは解析器と同じ範囲に収まる', () => {
    const source = new DemoSignalSource(() => 0);
    fc.assert(
      fc.property(fc.double({ min: 0, max: 3600, noNaN: true }), (t) => {
        const signals = source.sample(t);
        return signals.volume >= 0
          && signals.spectralFullness >= 0
          && signals.spectralFullness <= 1
          && signals.pitch > 50
          && signals.pitch < 2500;
      })
    );
  });
});
