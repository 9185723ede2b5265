import type { Point, StemParams, TendrilParams } from './types';
import { GEOMETRY } from './config';
import { cubicDerivative, cubicPoint } from './PetalGeometry';

type StemShape = Pick<StemParams, 'height' | 'curvature'>;

/**
 * 茎の中心線の制御点
 * 輪郭の生成と巻きひげの取り付け位置の計算で同じ式を使う
 */
function stemControlPoints(stem: StemShape): [Point, Point, Point, Point] {
  const h = stem.height;
  const xOffset = stem.curvature * h * 0.3;
  return [
    { x: 0, y: 0 },
    { x: xOffset * 0.6, y: -h * 0.5 },
    { x: xOffset, y: -h * 0.9 },
    { x: xOffset, y: -h }
  ];
}

/**
 * 茎の先端位置（根元からの相対座標）
 */
export function stemTop(stem: StemShape): Point {
  return { x: stem.curvature * stem.height * 0.3, y: -stem.height };
}

/**
 * 茎の中心線上の点
 * @param t 0=根元、1=先端
 */
export function stemPointAt(stem: StemShape, t: number): Point {
  const [p0, p1, p2, p3] = stemControlPoints(stem);
  return cubicPoint(p0, p1, p2, p3, t);
}

/**
 * 茎の中心線の単位接線（根元→先端の向き）
 */
export function stemTangentAt(stem: StemShape, t: number): Point {
  const [p0, p1, p2, p3] = stemControlPoints(stem);
  const d = cubicDerivative(p0, p1, p2, p3, t);
  const len = Math.hypot(d.x, d.y);
  if (len === 0) {
    return { x: 0, y: -1 };
  }
  return { x: d.x / len, y: d.y / len };
}

/**
 * 節の膨らみ倍率（各節の境界を中心としたコサインの山）
 */
export function nodeBulgeFactor(t: number, segments: number, nodeWidth: number): number {
  const radius = GEOMETRY.STEM_NODE_RADIUS;
  let factor = 1;
  for (let j = 1; j < segments; j++) {
    const distance = Math.abs(t - j / segments);
    if (distance < radius) {
      const bump = 0.5 * (1 + Math.cos((Math.PI * distance) / radius));
      factor *= 1 + (nodeWidth - 1) * bump;
    }
  }
  return factor;
}

/**
 * 茎の輪郭（太さのあるリボン）を生成する
 * 左の縁を根元→先端、右の縁を先端→根元の順に並べて閉じる
 */
export function buildStemOutline(stem: StemParams): Point[] {
  if (!(stem.height > 0) || !(stem.thickness > 0)) {
    return [];
  }

  const segments = Math.max(1, Math.floor(stem.segments));
  const samples = Math.max(segments * GEOMETRY.STEM_SAMPLES_PER_SEGMENT, GEOMETRY.STEM_MIN_SAMPLES);
  const baseHalf = stem.thickness * 0.5;
  const taper = Math.max(0, Math.min(1, stem.taperRatio));

  const left: Point[] = [];
  const right: Point[] = [];

  for (let i = 0; i <= samples; i++) {
    const t = i / samples;
    const center = stemPointAt(stem, t);
    const tangent = stemTangentAt(stem, t);
    const normal = { x: -tangent.y, y: tangent.x };

    // 根元から先端へ線形に細くなる
    const half = baseHalf * (1 - t * (1 - taper)) * nodeBulgeFactor(t, segments, stem.nodeWidth);

    left.push({ x: center.x + normal.x * half, y: center.y + normal.y * half });
    right.push({ x: center.x - normal.x * half, y: center.y - normal.y * half });
  }

  const outline = [...left, ...right.reverse()];
  outline.push({ x: outline[0].x, y: outline[0].y });
  return outline;
}

/**
 * 巻きひげの折れ線を生成する
 * 茎上の点から外側へ、1ステップごとに向きを回転させながら渦を巻く
 */
export function buildTendrilPath(stem: StemShape, tendril: TendrilParams): Point[] {
  const steps = GEOMETRY.TENDRIL_STEPS;
  const anchor = stemPointAt(stem, tendril.stemT);
  const tangent = stemTangentAt(stem, tendril.stemT);
  const outward = { x: -tangent.y * tendril.direction, y: tangent.x * tendril.direction };

  const cosA = Math.cos(tendril.startAngle);
  const sinA = Math.sin(tendril.startAngle);
  let heading = Math.atan2(outward.y * cosA + tangent.y * sinA, outward.x * cosA + tangent.x * sinA);

  const turn = (tendril.curlAmount * Math.PI / steps) * tendril.direction;
  const initialStep = tendril.length / steps;

  const points: Point[] = [anchor];
  let x = anchor.x;
  let y = anchor.y;

  for (let i = 0; i < steps; i++) {
    heading += turn;
    // 先端に向かって初期の60%まで短くなる
    const stepLength = initialStep * (1 - (1 - GEOMETRY.TENDRIL_MIN_STEP_RATIO) * (i / (steps - 1)));
    x += Math.cos(heading) * stepLength;
    y += Math.sin(heading) * stepLength;
    points.push({ x, y });
  }

  return points;
}
