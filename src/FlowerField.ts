import type { AudioSignals, DrawCommand, TickStats, Viewport } from './types';
import { GEOMETRY, POPULATION } from './config';
import { FlowerInstance } from './FlowerInstance';
import { FallingPetalSystem } from './FallingPetalSystem';
import { AudioActivityEstimator } from './AudioActivity';
import { GrowthController } from './GrowthController';
import { ColorScheme } from './ColorScheme';
import { randomInt, SeededRandom, type RandomSource } from './Randomness';

/**
 * FlowerFieldのオプション
 */
export interface FlowerFieldOptions {
  baseCount?: number;
  random?: RandomSource;
  fallingPetals?: FallingPetalSystem;
  colorScheme?: ColorScheme;
}

const MIN_DELTA = 0.001;
const MAX_DELTA = 0.1;

function emptyStats(): TickStats {
  return { spawned: 0, respawned: 0, markedForFastDeath: 0, removed: 0, detachedPetals: 0 };
}

/**
 * FlowerFieldクラス
 * 花の集団・落下する花びら・音声の盛り上がりをまとめて管理する
 */
export class FlowerField {
  private instances: FlowerInstance[] = [];
  private random: RandomSource;
  private fallingPetals: FallingPetalSystem;
  private activity: AudioActivityEstimator = new AudioActivityEstimator();
  private growth: GrowthController = new GrowthController();
  private colorScheme: ColorScheme;
  private baseCount: number;
  private reactive: boolean = false;
  private viewport: Viewport;
  private populationTarget: number;
  private lastStats: TickStats = emptyStats();

  constructor(viewport: Viewport, options: FlowerFieldOptions = {}) {
    const baseCount = options.baseCount ?? POPULATION.DEFAULT_BASE_COUNT;
    if (!Number.isInteger(baseCount) || baseCount <= 0) {
      throw new Error(`baseCountは1以上の整数で指定してください: ${baseCount}`);
    }
    this.baseCount = Math.min(baseCount, POPULATION.MAX_TARGET);
    this.populationTarget = this.baseCount;
    this.random = options.random ?? new SeededRandom();
    this.fallingPetals = options.fallingPetals ?? new FallingPetalSystem({}, this.random);
    this.colorScheme = options.colorScheme ?? new ColorScheme();
    this.viewport = { ...viewport };
    this.fallingPetals.setViewportHeight(viewport.height);
  }

  /**
   * 花畑を初期化する（開花のタイミングはばらけさせる）
   * @param count 花の本数（省略時はbaseCount）
   */
  public setup(count: number = this.baseCount): void {
    const total = Math.max(0, Math.min(Math.floor(count), POPULATION.MAX_TARGET));
    this.instances = [];
    this.fallingPetals.clear();

    for (let i = 0; i < total; i++) {
      const instance = new FlowerInstance(this.random, this.colorScheme.paletteForSpawn(this.random));
      instance.setLifePhase(this.random.random());
      instance.syncVisiblePetals();
      this.instances.push(instance);
    }
    this.sortByDepth();

    console.log(`[FlowerField] ${total}本の花を生成しました`);
  }

  public resize(width: number, height: number): void {
    this.viewport = { width, height };
    this.fallingPetals.setViewportHeight(height);
  }

  public getViewport(): Readonly<Viewport> {
    return this.viewport;
  }

  /**
   * 1ティック進める
   * @param deltaTime 経過時間（秒、0.001〜0.1に制限）
   * @param signals 音声シグナル
   */
  public update(deltaTime: number, signals: AudioSignals): void {
    const dt = Math.max(MIN_DELTA, Math.min(MAX_DELTA, Number.isFinite(deltaTime) ? deltaTime : MIN_DELTA));
    const stats = emptyStats();

    this.activity.update(dt, signals);
    this.colorScheme.update(dt);

    const activityLevel = this.activity.getActivityLevel();
    this.populationTarget = this.reactive ? this.growth.populationTarget(activityLevel) : this.baseCount;

    let needsSort = false;

    // 目標まで少しずつ増やす
    const missing = Math.min(this.populationTarget, POPULATION.MAX_TARGET) - this.instances.length;
    const toSpawn = Math.min(POPULATION.MAX_SPAWN_PER_TICK, missing);
    for (let i = 0; i < toSpawn; i++) {
      this.instances.push(new FlowerInstance(this.random, this.colorScheme.paletteForSpawn(this.random)));
      stats.spawned++;
      needsSort = true;
    }

    if (this.reactive) {
      stats.markedForFastDeath = this.markFastDeaths();
    }

    const speed = this.growth.lifecycleSpeed({
      fullness: this.activity.getSmoothedFullness(),
      activityLevel,
      reactive: this.reactive,
      population: this.instances.length,
      baseCount: this.baseCount
    });

    const time = this.activity.getElapsedTime();
    const volume = this.activity.getSmoothedVolume();
    const pitchNorm = this.activity.getPitchNorm();
    let living = this.instances.length;

    for (const instance of this.instances) {
      instance.advance(dt, speed);

      if (instance.hasCompletedCycle()) {
        if (living > this.populationTarget) {
          instance.markForRemoval();
          living--;
          continue;
        }
        instance.respawn(this.colorScheme.paletteForSpawn(this.random));
        stats.respawned++;
        needsSort = true;
      }

      const detached = instance.applyLifecycle({ volume, pitchNorm, time, viewport: this.viewport });
      for (const petal of detached) {
        this.fallingPetals.spawn(petal.position, petal.angleDeg, petal.shape, petal.color);
      }
      stats.detachedPetals += detached.length;
      if (instance.isPendingRemoval()) {
        living--;
      }
    }

    // 削除はループの後にまとめて行う
    const before = this.instances.length;
    this.instances = this.instances.filter((instance) => !instance.isPendingRemoval());
    stats.removed = before - this.instances.length;

    if (needsSort) {
      this.sortByDepth();
    }

    this.fallingPetals.update(dt);
    this.lastStats = stats;
  }

  /**
   * 目標を超えた分だけ、開花中の花を早送りで枯らす
   * @returns 今回印を付けた本数
   */
  private markFastDeaths(): number {
    const alive = this.instances.filter((instance) => !instance.isFastDying() && !instance.isPendingRemoval()).length;
    const excess = alive - this.populationTarget;
    if (excess <= 0 || this.instances.length === 0) {
      return 0;
    }

    let marked = 0;
    const slots = Math.min(POPULATION.MAX_FAST_DEATH_PER_TICK, excess);
    for (let slot = 0; slot < slots; slot++) {
      for (let attempt = 0; attempt < POPULATION.FAST_DEATH_ATTEMPTS; attempt++) {
        const candidate = this.instances[randomInt(this.random, 0, this.instances.length)];
        if (candidate.isEligibleForFastDeath()) {
          candidate.startFastDeath();
          marked++;
          break;
        }
      }
    }
    return marked;
  }

  /**
   * 奥（画面上側）から手前へ並べる
   */
  private sortByDepth(): void {
    this.instances.sort((a, b) => a.getIdentity().normPos.y - b.getIdentity().normPos.y);
  }

  /**
   * 奥から手前の順に花を描き、最後に落下中の花びらを描く
   */
  public draw(): DrawCommand[] {
    const time = this.activity.getElapsedTime();
    const commands: DrawCommand[] = [];
    for (const instance of this.instances) {
      if (instance.isPendingRemoval() || instance.getAlpha() <= GEOMETRY.MIN_DRAW_ALPHA) {
        continue;
      }
      commands.push(...instance.draw(this.viewport, time));
    }
    commands.push(...this.fallingPetals.draw());
    return commands;
  }

  public setReactiveMode(reactive: boolean): void {
    if (this.reactive === reactive) {
      return;
    }
    this.reactive = reactive;
    console.log(`[FlowerField] リアクティブモード: ${reactive ? 'ON' : 'OFF'}`);
  }

  public isReactiveMode(): boolean {
    return this.reactive;
  }

  public setColorScheme(mode: number): void {
    this.colorScheme.setMode(mode);
    console.log(`[FlowerField] カラースキーム: ${this.colorScheme.describe()}`);
  }

  public getColorScheme(): ColorScheme {
    return this.colorScheme;
  }

  public getInstances(): readonly FlowerInstance[] {
    return this.instances;
  }

  public getPopulationTarget(): number {
    return this.populationTarget;
  }

  public getActivity(): AudioActivityEstimator {
    return this.activity;
  }

  public getFallingPetals(): FallingPetalSystem {
    return this.fallingPetals;
  }

  public getTickStats(): Readonly<TickStats> {
    return this.lastStats;
  }

  public getBaseCount(): number {
    return this.baseCount;
  }
}
