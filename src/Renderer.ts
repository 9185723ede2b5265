import type { DrawCommand } from './types';

/**
 * 描画先（p5インスタンスが満たす最小限の描画API）
 * テストではモックを渡す
 */
export interface DrawSurface {
  readonly width: number;
  readonly height: number;
  push(): unknown;
  pop(): unknown;
  noStroke(): unknown;
  noFill(): unknown;
  fill(r: number, g: number, b: number, a: number): unknown;
  stroke(r: number, g: number, b: number, a: number): unknown;
  strokeWeight(weight: number): unknown;
  rect(x: number, y: number, w: number, h: number): unknown;
  beginShape(): unknown;
  vertex(x: number, y: number): unknown;
  endShape(): unknown;
  line(x1: number, y1: number, x2: number, y2: number): unknown;
  textSize(size: number): unknown;
  text(str: string, x: number, y: number): unknown;
}

/**
 * HUDに表示する情報
 */
export interface HudInfo {
  fps: number;
  population: number;
  target: number;
  reactive: boolean;
  activity: number;
  volume: number;
  noteName: string;
  beatDensity: number;
  fallingPetals: number;
  scheme: string;
  demo: boolean;
}

const BACKGROUND_BANDS = 48;
const HUD_TEXT_SIZE = 13;
const HUD_LINE_HEIGHT = 18;
const HUD_MARGIN = 12;

/**
 * HUDの行を組み立てる
 */
export function buildHudLines(info: HudInfo): string[] {
  return [
    `FPS ${Math.round(info.fps)}`,
    `Flowers ${info.population} / ${info.target}${info.reactive ? ' (reactive)' : ''}`,
    `Activity ${info.activity.toFixed(2)}  Beat ${info.beatDensity.toFixed(2)}`,
    `Volume ${info.volume.toFixed(2)}  Pitch ${info.noteName}`,
    `Petals ${info.fallingPetals}`,
    `Palette ${info.scheme}${info.demo ? '  [demo]' : ''}`,
    '[r] reactive  [0-9] palette  [d] demo  [h] HUD'
  ];
}

function lerp(a: number, b: number, t: number): number {
  return a + (b - a) * t;
}

/**
 * Rendererクラス
 * 花畑が出力した描画コマンドをp5で描く
 */
export class Renderer {
  private surface: DrawSurface;

  constructor(surface: DrawSurface) {
    this.surface = surface;
  }

  /**
   * 背景を描画
   * 上が夜空のディープネイビー、下が暗い草地の縦グラデーション
   */
  public drawBackground(): void {
    const s = this.surface;
    const bandHeight = s.height / BACKGROUND_BANDS;

    s.push();
    s.noStroke();
    for (let i = 0; i < BACKGROUND_BANDS; i++) {
      const t = i / (BACKGROUND_BANDS - 1);
      // 二乗で下側に寄せて緑を出す
      const groundT = t * t;
      s.fill(lerp(12, 14, groundT), lerp(18, 32, groundT), lerp(40, 20, groundT), 255);
      // 隙間が出ないよう1px重ねる
      s.rect(0, i * bandHeight, s.width, bandHeight + 1);
    }
    s.pop();
  }

  /**
   * 描画コマンドを順番に描く
   * @returns 実際に描いたコマンド数
   */
  public drawCommands(commands: readonly DrawCommand[]): number {
    const s = this.surface;
    let drawn = 0;

    s.push();
    for (const command of commands) {
      switch (command.type) {
        case 'polygon': {
          if (command.points.length < 3 || command.fill.a <= 0) {
            break;
          }
          s.noStroke();
          s.fill(command.fill.r, command.fill.g, command.fill.b, command.fill.a);
          s.beginShape();
          for (const point of command.points) {
            s.vertex(point.x, point.y);
          }
          // 輪郭は始点を繰り返して閉じている
          s.endShape();
          drawn++;
          break;
        }
        case 'line': {
          if (command.color.a <= 0 || command.width <= 0) {
            break;
          }
          s.noFill();
          s.stroke(command.color.r, command.color.g, command.color.b, command.color.a);
          s.strokeWeight(command.width);
          s.line(command.from.x, command.from.y, command.to.x, command.to.y);
          drawn++;
          break;
        }
        default: {
          const unreachable: never = command;
          throw new Error(`未知の描画コマンドです: ${JSON.stringify(unreachable)}`);
        }
      }
    }
    s.pop();

    return drawn;
  }

  /**
   * 左上にHUDを描画
   */
  public drawHud(lines: readonly string[]): void {
    const s = this.surface;
    s.push();
    s.noStroke();
    s.fill(0, 0, 0, 140);
    s.rect(HUD_MARGIN / 2, HUD_MARGIN / 2, 300, lines.length * HUD_LINE_HEIGHT + HUD_MARGIN);
    s.fill(235, 240, 255, 220);
    s.textSize(HUD_TEXT_SIZE);
    lines.forEach((line, index) => {
      s.text(line, HUD_MARGIN, HUD_MARGIN + HUD_TEXT_SIZE + index * HUD_LINE_HEIGHT);
    });
    s.pop();
  }
}
