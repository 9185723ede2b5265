import type { CenterVariant, Color, DrawCommand, Point } from './types';
import { GEOMETRY } from './config';
import { circleOutline } from './PetalGeometry';
import { RoseCurve } from './RoseCurve';

const polar = new RoseCurve();

function shade(color: Color, factor: number): Color {
  return {
    r: Math.min(255, Math.round(color.r * factor)),
    g: Math.min(255, Math.round(color.g * factor)),
    b: Math.min(255, Math.round(color.b * factor)),
    a: color.a
  };
}

function disc(center: Point, radius: number, fill: Color): DrawCommand {
  return { type: 'polygon', points: circleOutline(center, radius), fill };
}

/**
 * 花の中心の装飾を描画コマンドにする
 * 花冠のトポロジーとは独立で、花冠の原点に重ねて描く
 * @param variant 装飾の種類
 * @param origin 花冠の原点（画面座標）
 * @param radius 中心の半径
 * @param color 中心の色
 */
export function buildCenterOrnament(variant: CenterVariant, origin: Point, radius: number, color: Color): DrawCommand[] {
  if (!(radius > 0)) {
    return [];
  }

  switch (variant.kind) {
    case 'simpleDisc':
      return [disc(origin, radius, color)];

    case 'stamens': {
      // 放射状の雄しべ（線＋先端の葯）
      const count = Math.max(3, Math.round(variant.detail));
      const commands: DrawCommand[] = [disc(origin, radius * 0.6, shade(color, 0.8))];
      const anther = shade(color, 1.2);
      for (let i = 0; i < count; i++) {
        const theta = (i / count) * Math.PI * 2;
        const tip = polar.polarToCartesian(radius * 1.6, theta, origin.x, origin.y);
        commands.push({ type: 'line', from: origin, to: tip, color, width: Math.max(0.5, radius * 0.12) });
        commands.push(disc(tip, radius * 0.25, anther));
      }
      return commands;
    }

    case 'pollenGrid': {
      // 黄金角で並べた花粉の粒
      const count = Math.max(3, Math.round(variant.detail)) * 3;
      const commands: DrawCommand[] = [disc(origin, radius, color)];
      const grain = shade(color, 0.6);
      const goldenRad = (GEOMETRY.GOLDEN_ANGLE * Math.PI) / 180;
      for (let i = 0; i < count; i++) {
        const r = radius * 0.9 * Math.sqrt(i / count);
        const point = polar.polarToCartesian(r, i * goldenRad, origin.x, origin.y);
        commands.push({ type: 'polygon', points: circleOutline(point, radius * 0.12, 8), fill: grain });
      }
      return commands;
    }

    case 'geometricStar': {
      const spikes = Math.max(3, Math.round(variant.detail));
      const points: Point[] = [];
      for (let i = 0; i < spikes * 2; i++) {
        const r = i % 2 === 0 ? radius : radius * 0.45;
        const theta = (i / (spikes * 2)) * Math.PI * 2 - Math.PI / 2;
        points.push(polar.polarToCartesian(r, theta, origin.x, origin.y));
      }
      points.push({ x: points[0].x, y: points[0].y });
      return [
        { type: 'polygon', points, fill: color },
        disc(origin, radius * 0.3, shade(color, 1.25))
      ];
    }

    default: {
      const unknown: never = variant;
      throw new Error(`未知の中心装飾です: ${JSON.stringify(unknown)}`);
    }
  }
}
