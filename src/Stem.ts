import type { DrawCommand, Point, StemParams } from './types';
import { buildStemOutline, buildTendrilPath, stemTop } from './StemGeometry';

function sameStemShape(a: StemParams, b: StemParams): boolean {
  return a.height === b.height
    && a.thickness === b.thickness
    && a.taperRatio === b.taperRatio
    && a.curvature === b.curvature
    && a.segments === b.segments
    && a.nodeWidth === b.nodeWidth;
}

/**
 * 茎（＋巻きひげ）
 * 輪郭は形状が変わった時だけ再生成する。巻きひげは毎回中心線から計算する
 */
export class Stem {
  private params: StemParams;
  private cachedOutline: Point[] = [];
  private isStale: boolean = true;
  private rebuildCount: number = 0;

  constructor(params: StemParams) {
    this.params = params;
  }

  public getParams(): Readonly<StemParams> {
    return this.params;
  }

  public setParams(params: StemParams): void {
    if (!sameStemShape(this.params, params)) {
      this.isStale = true;
    }
    this.params = params;
  }

  public getOutline(): Point[] {
    if (this.isStale) {
      this.cachedOutline = buildStemOutline(this.params);
      this.isStale = false;
      this.rebuildCount++;
    }
    return this.cachedOutline;
  }

  public getRebuildCount(): number {
    return this.rebuildCount;
  }

  /**
   * 茎の先端（根元からの相対座標）
   */
  public getTopPosition(): Point {
    return stemTop(this.params);
  }

  /**
   * @param ground 根元の位置（画面座標）
   */
  public draw(ground: Point): DrawCommand[] {
    const commands: DrawCommand[] = [];
    const outline = this.getOutline();
    const color = this.params.color;

    if (outline.length > 0) {
      commands.push({
        type: 'polygon',
        points: outline.map((p) => ({ x: ground.x + p.x, y: ground.y + p.y })),
        fill: { ...color }
      });
    }

    if (!(this.params.height > 0)) {
      return commands;
    }

    for (const tendril of this.params.tendrils) {
      if (!(tendril.length > 0)) {
        continue;
      }
      const path = buildTendrilPath(this.params, tendril);
      for (let i = 0; i < path.length - 1; i++) {
        // 先端ほど細く
        const width = tendril.thickness * (1 - 0.5 * (i / (path.length - 1)));
        commands.push({
          type: 'line',
          from: { x: ground.x + path[i].x, y: ground.y + path[i].y },
          to: { x: ground.x + path[i + 1].x, y: ground.y + path[i + 1].y },
          color: { ...color },
          width
        });
      }
    }

    return commands;
  }
}
