import type { PetalShape, Point } from './types';
import { GEOMETRY } from './config';

/**
 * 3次ベジェ曲線上の点
 * @param t 0-1
 */
export function cubicPoint(p0: Point, p1: Point, p2: Point, p3: Point, t: number): Point {
  const mt = 1 - t;
  const a = mt * mt * mt;
  const b = 3 * mt * mt * t;
  const c = 3 * mt * t * t;
  const d = t * t * t;
  return {
    x: a * p0.x + b * p1.x + c * p2.x + d * p3.x,
    y: a * p0.y + b * p1.y + c * p2.y + d * p3.y
  };
}

/**
 * 3次ベジェ曲線の微分（接線方向、正規化しない）
 */
export function cubicDerivative(p0: Point, p1: Point, p2: Point, p3: Point, t: number): Point {
  const mt = 1 - t;
  const a = 3 * mt * mt;
  const b = 6 * mt * t;
  const c = 3 * t * t;
  return {
    x: a * (p1.x - p0.x) + b * (p2.x - p1.x) + c * (p3.x - p2.x),
    y: a * (p1.y - p0.y) + b * (p2.y - p1.y) + c * (p3.y - p2.y)
  };
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * 花びらの輪郭を生成する
 *
 * 原点が根元、先端は -Y 方向（画面座標で上向き）。
 * 左の曲線（根元→先端）と右の曲線（先端→根元）の2本の3次ベジェで閉じた形を作る。
 * 枚数0や長さ0以下の場合は空配列を返す（描画側でスキップする）。
 *
 * @returns 閉じた多角形（最初の点と最後の点が等しい）
 */
export function buildPetalOutline(shape: PetalShape): Point[] {
  if (shape.count <= 0 || !(shape.length > 0)) {
    return [];
  }

  const length = shape.length;
  const halfWidth = length * shape.widthRatio;
  const bulgeY = length * clamp(shape.bulgePosition, 0.05, 0.95);
  const tipWidth = halfWidth * (1 - clamp(shape.tipPointiness, 0, 1));

  // 膨らみの制御点を外側（凸）または内側（凹）にずらす
  const curveShift = shape.edgeCurvature * halfWidth * 0.5;
  const nearTipY = -(length - length * GEOMETRY.PETAL_TIP_INSET);

  const base: Point = { x: 0, y: 0 };
  const tip: Point = { x: 0, y: -length };

  const leftBulge: Point = { x: -(halfWidth + curveShift), y: -bulgeY };
  const leftNearTip: Point = { x: -tipWidth, y: nearTipY };
  const rightNearTip: Point = { x: tipWidth, y: nearTipY };
  const rightBulge: Point = { x: halfWidth + curveShift, y: -bulgeY };

  const segments = GEOMETRY.PETAL_CURVE_SEGMENTS;
  const points: Point[] = [{ x: 0, y: 0 }];

  // 左側: 根元→先端
  for (let i = 1; i <= segments; i++) {
    points.push(cubicPoint(base, leftBulge, leftNearTip, tip, i / segments));
  }

  // 右側: 先端→根元（根元は最初の点を複製して閉じる）
  for (let i = 1; i < segments; i++) {
    points.push(cubicPoint(tip, rightNearTip, rightBulge, base, i / segments));
  }
  points.push({ x: points[0].x, y: points[0].y });

  return points;
}

/**
 * 輪郭を変形して配置する（拡大縮小→軸方向の移動→回転→平行移動）
 * @param points 花びらローカル座標の輪郭
 * @param origin 配置先の原点
 * @param angleDeg 回転角（度、時計回り）
 * @param scaleX 幅方向の倍率
 * @param scaleY 長さ方向の倍率
 * @param axisOffset 花びらの軸（-Y）方向へのずらし量
 */
export function transformOutline(
  points: readonly Point[],
  origin: Point,
  angleDeg: number,
  scaleX: number = 1,
  scaleY: number = 1,
  axisOffset: number = 0
): Point[] {
  const rad = (angleDeg * Math.PI) / 180;
  const cos = Math.cos(rad);
  const sin = Math.sin(rad);

  return points.map((point) => {
    const x = point.x * scaleX;
    const y = point.y * scaleY - axisOffset;
    return {
      x: origin.x + x * cos - y * sin,
      y: origin.y + x * sin + y * cos
    };
  });
}

/**
 * 角度（度）に対応する花びらの向き（単位ベクトル）
 * 0度で真上（-Y）、時計回り
 */
export function directionFromAngle(angleDeg: number): Point {
  const rad = (angleDeg * Math.PI) / 180;
  return { x: Math.sin(rad), y: -Math.cos(rad) };
}

/**
 * 円を多角形で近似する
 */
export function circleOutline(center: Point, radius: number, segments: number = GEOMETRY.CIRCLE_SEGMENTS): Point[] {
  const points: Point[] = [];
  for (let i = 0; i <= segments; i++) {
    const theta = ((i % segments) / segments) * Math.PI * 2;
    points.push({
      x: center.x + Math.cos(theta) * radius,
      y: center.y + Math.sin(theta) * radius
    });
  }
  return points;
}
