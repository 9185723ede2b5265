import type { DrawCommand, InflorescenceParams, PetalPlacement, PetalShape, Point } from './types';
import { buildPetalOutline, directionFromAngle, transformOutline } from './PetalGeometry';
import { applyWobble, placePetal } from './HeadTopology';
import { buildCenterOrnament } from './CenterOrnament';
import type { RandomSource } from './Randomness';

/**
 * 花びら1枚分の取り付け情報（花冠ローカル座標）
 */
export interface PetalAnchor {
  offset: Point;      // 花冠の原点から花びらの根元まで
  angleDeg: number;   // 花びらの向き（回転を含む）
  shape: PetalShape;  // 配置の倍率を反映した形状
}

function samePetalShape(a: PetalShape, b: PetalShape): boolean {
  return a.count === b.count
    && a.length === b.length
    && a.widthRatio === b.widthRatio
    && a.tipPointiness === b.tipPointiness
    && a.bulgePosition === b.bulgePosition
    && a.edgeCurvature === b.edgeCurvature;
}

/**
 * 花冠（花びら＋中心の装飾）
 *
 * 花びらの輪郭はキャッシュし、形状パラメータが変わった後の最初の読み出しでだけ再生成する。
 */
export class Inflorescence {
  private params: InflorescenceParams;
  private cachedOutline: Point[] = [];
  private isStale: boolean = true;
  private rebuildCount: number = 0;
  private random: RandomSource;

  constructor(params: InflorescenceParams, random: RandomSource) {
    this.params = params;
    this.random = random;
  }

  public getParams(): Readonly<InflorescenceParams> {
    return this.params;
  }

  /**
   * パラメータを設定（花びらの形が変わった場合のみキャッシュを無効化）
   */
  public setParams(params: InflorescenceParams): void {
    if (!samePetalShape(this.params.petal, params.petal)) {
      this.isStale = true;
    }
    this.params = params;
  }

  /**
   * 花びら1枚の輪郭（花びらローカル座標）
   */
  public getPetalOutline(): Point[] {
    if (this.isStale) {
      this.cachedOutline = buildPetalOutline(this.params.petal);
      this.isStale = false;
      this.rebuildCount++;
    }
    return this.cachedOutline;
  }

  public getRebuildCount(): number {
    return this.rebuildCount;
  }

  /**
   * 揺らぎを含めた花びらの配置
   */
  public placementFor(index: number, time: number): { placement: PetalPlacement; uniformScale: number } {
    const base = placePetal(this.params.head, index, this.params.layoutCount);
    return applyWobble(base, this.params.wobble, index, time, this.random);
  }

  /**
   * 花びらの取り付け位置（散る花びらの生成位置の計算に使う）
   */
  public petalAnchor(index: number, time: number): PetalAnchor {
    const { placement, uniformScale } = this.placementFor(index, time);
    const angleDeg = this.params.rotation + placement.angleDeg;
    const direction = directionFromAngle(angleDeg);
    const offsetDistance = placement.radialOffset * this.params.petal.length;

    return {
      offset: { x: direction.x * offsetDistance, y: direction.y * offsetDistance },
      angleDeg,
      shape: {
        ...this.params.petal,
        count: 1,
        length: this.params.petal.length * placement.lengthScale * uniformScale,
        widthRatio: Math.min(1, this.params.petal.widthRatio * placement.widthScale)
      }
    };
  }

  /**
   * 花冠を描画コマンドにする
   * 番号の小さい花びらから描く（重なった輪生では外側→内側）
   * @param origin 花冠の原点（画面座標）
   * @param time 揺らぎ用の時刻（秒）
   */
  public draw(origin: Point, time: number): DrawCommand[] {
    const commands: DrawCommand[] = [];
    const outline = this.getPetalOutline();
    const { petal, rotation } = this.params;

    if (outline.length > 0) {
      for (let i = 0; i < petal.count; i++) {
        const { placement, uniformScale } = this.placementFor(i, time);
        commands.push({
          type: 'polygon',
          points: transformOutline(
            outline,
            origin,
            rotation + placement.angleDeg,
            placement.widthScale * uniformScale,
            placement.lengthScale * uniformScale,
            placement.radialOffset * petal.length
          ),
          fill: { ...this.params.petalColor }
        });
      }
    }

    commands.push(...buildCenterOrnament(
      this.params.center,
      origin,
      this.params.centerRadius,
      { ...this.params.centerColor }
    ));

    return commands;
  }
}
