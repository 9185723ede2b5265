/**
 * RoseCurveクラス
 * バラ曲線（Rose Curve）r = a * |cos(k * θ)| で花びらの長さを変調する
 */
export class RoseCurve {
  /**
   * 指定された角度でのバラ曲線の半径を計算
   * @param theta 角度（ラジアン）
   * @param a 振幅
   * @param k 花びらの数を決定する係数
   * @returns 半径（0以上）
   */
  public calculateRadius(theta: number, a: number, k: number): number {
    return Math.abs(a * Math.cos(k * theta));
  }

  /**
   * 花びらの長さ倍率
   * baseScaleを下限として、バラ曲線の山の位置にある花びらほど長くなる
   * @param angleDeg 花びらの角度（度）
   * @param k バラ曲線の係数
   * @param baseScale 谷の位置での倍率（0-1）
   */
  public lengthScale(angleDeg: number, k: number, baseScale: number): number {
    const theta = (angleDeg * Math.PI) / 180;
    return baseScale + this.calculateRadius(theta, 1, k) * (1 - baseScale);
  }

  /**
   * 極座標から直交座標に変換
   * @param r 半径
   * @param theta 角度（ラジアン）
   * @param centerX 中心のX座標
   * @param centerY 中心のY座標
   */
  public polarToCartesian(r: number, theta: number, centerX: number = 0, centerY: number = 0): {x: number, y: number} {
    return {
      x: centerX + r * Math.cos(theta),
      y: centerY + r * Math.sin(theta)
    };
  }
}
