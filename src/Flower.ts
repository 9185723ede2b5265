import type { DrawCommand, InflorescenceParams, Point, StemParams } from './types';
import { Inflorescence } from './Inflorescence';
import { Stem } from './Stem';
import type { RandomSource } from './Randomness';

/**
 * 茎と花冠を組み合わせた1本の花
 */
export class Flower {
  private inflorescence: Inflorescence;
  private stem: Stem;

  constructor(head: InflorescenceParams, stem: StemParams, random: RandomSource) {
    this.inflorescence = new Inflorescence(head, random);
    this.stem = new Stem(stem);
  }

  public getInflorescence(): Inflorescence {
    return this.inflorescence;
  }

  public getStem(): Stem {
    return this.stem;
  }

  /**
   * 花冠の原点（画面座標）
   * @param ground 茎の根元
   */
  public headPosition(ground: Point): Point {
    const top = this.stem.getTopPosition();
    return { x: ground.x + top.x, y: ground.y + top.y };
  }

  /**
   * 茎を根元から描き、その先端に花冠を描く
   * @param ground 茎の根元（画面座標）
   * @param time 揺らぎ用の時刻（秒）
   */
  public draw(ground: Point, time: number): DrawCommand[] {
    return [
      ...this.stem.draw(ground),
      ...this.inflorescence.draw(this.headPosition(ground), time)
    ];
  }
}
