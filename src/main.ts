import p5 from 'p5';
import type { SignalSource } from './types';
import { AudioAnalyzer } from './AudioAnalyzer';
import { DemoSignalSource } from './DemoSignalSource';
import { FlowerField } from './FlowerField';
import { FallingPetalSystem } from './FallingPetalSystem';
import { Renderer, buildHudLines } from './Renderer';
import { createP5RandomSource } from './Randomness';
import { pitchToNoteName } from './PitchUtils';

const MIN_DELTA = 0.001;
const MAX_DELTA = 0.1;

/**
 * エラーメッセージを画面下に表示
 */
function showError(message: string, hideAfterMs?: number): void {
  const errorMsg = document.getElementById('error-message');
  if (!errorMsg) {
    return;
  }
  errorMsg.textContent = message;
  errorMsg.classList.remove('hidden');
  if (hideAfterMs !== undefined) {
    setTimeout(() => {
      errorMsg.classList.add('hidden');
    }, hideAfterMs);
  }
}

/**
 * p5.jsを使ったSonic Meadowアプリケーション
 */
const sketch = (p: p5) => {
  let field: FlowerField;
  let renderer: Renderer;
  const audioAnalyzer = new AudioAnalyzer();
  const demoSource = new DemoSignalSource();

  let isDemoMode = false;
  let showHud = true;

  function currentSource(): SignalSource {
    return isDemoMode || !audioAnalyzer.isActive() ? demoSource : audioAnalyzer;
  }

  /**
   * マイク入力を開始する（失敗したらデモモードに切り替える）
   */
  async function startMicrophone(): Promise<void> {
    try {
      await audioAnalyzer.initialize();
      isDemoMode = false;
      console.log('[Main] マイク入力モードで起動');
    } catch (error) {
      console.error('[Main] マイクアクセスエラー:', error);
      isDemoMode = true;
      showError(
        error instanceof Error
          ? `${error.message}（デモモードで表示しています）`
          : 'マイクアクセスに失敗しました。デモモードで表示しています。',
        5000
      );
    }
  }

  function toggleDemoMode(): void {
    if (isDemoMode) {
      void startMicrophone();
    } else {
      audioAnalyzer.dispose();
      isDemoMode = true;
      console.log('[Main] デモモードに切り替え');
    }
  }

  /**
   * 初期化
   */
  p.setup = () => {
    p.createCanvas(p.windowWidth, p.windowHeight);
    p.frameRate(60);

    const random = createP5RandomSource(p);
    field = new FlowerField(
      { width: p.width, height: p.height },
      { random, fallingPetals: new FallingPetalSystem({}, random) }
    );
    field.setup();
    renderer = new Renderer(p);

    void startMicrophone();
  };

  /**
   * 描画ループ
   */
  p.draw = () => {
    const deltaTime = Math.max(MIN_DELTA, Math.min(MAX_DELTA, p.deltaTime / 1000));
    const source = currentSource();

    field.update(deltaTime, source.getSignals());

    renderer.drawBackground();
    renderer.drawCommands(field.draw());

    if (showHud) {
      const activity = field.getActivity();
      renderer.drawHud(buildHudLines({
        fps: p.frameRate(),
        population: field.getInstances().length,
        target: field.getPopulationTarget(),
        reactive: field.isReactiveMode(),
        activity: activity.getActivityLevel(),
        volume: activity.getSmoothedVolume(),
        noteName: pitchToNoteName(activity.getSmoothedPitch()),
        beatDensity: activity.getBeatDensity(),
        fallingPetals: field.getFallingPetals().getPetals().length,
        scheme: field.getColorScheme().describe(),
        demo: source === demoSource
      }));
    }
  };

  /**
   * キー操作
   * r: リアクティブモード / 0-9: カラースキーム / d: デモモード / h: HUD
   */
  p.keyPressed = () => {
    const key = p.key.toLowerCase();
    if (key === 'r') {
      field.setReactiveMode(!field.isReactiveMode());
    } else if (key === 'd') {
      toggleDemoMode();
    } else if (key === 'h') {
      showHud = !showHud;
    } else if (/^[0-9]$/.test(key)) {
      field.setColorScheme(Number(key));
    }
  };

  /**
   * ウィンドウリサイズ時
   */
  p.windowResized = () => {
    p.resizeCanvas(p.windowWidth, p.windowHeight);
    field.resize(p.width, p.height);
  };
};

// p5インスタンスを作成
new p5(sketch);
