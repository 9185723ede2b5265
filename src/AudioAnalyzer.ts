import type { AudioSignals, SignalSource } from './types';
import { AUDIO_SMOOTHING } from './config';

const FFT_SIZE = 2048;
const SILENCE_RMS = 0.01;
const FULLNESS_BIN_THRESHOLD = 40;

/**
 * 音高推定の結果
 */
export interface PitchEstimate {
  pitch: number;       // Hz（0は未検出）
  confidence: number;  // 0-1
}

const SILENT: AudioSignals = { volume: 0, pitch: 0, pitchConfidence: 0, spectralFullness: 0 };

/**
 * RMS（二乗平均平方根）
 * @param samples -1〜1の波形
 */
export function computeRms(samples: ArrayLike<number>): number {
  if (samples.length === 0) {
    return 0;
  }
  let sum = 0;
  for (let i = 0; i < samples.length; i++) {
    sum += samples[i] * samples[i];
  }
  return Math.sqrt(sum / samples.length);
}

/**
 * 自己相関法による音高検出
 * 信頼度は最良のラグの相関をラグ0の相関（エネルギー）で割ったもの
 */
export function detectPitch(samples: ArrayLike<number>, sampleRate: number): PitchEstimate {
  if (computeRms(samples) < SILENCE_RMS || !(sampleRate > 0)) {
    return { pitch: 0, confidence: 0 };
  }

  const n = samples.length;
  let energy = 0;
  for (let i = 0; i < n; i++) {
    energy += samples[i] * samples[i];
  }

  // 探索範囲は50Hz〜2500Hz
  const minLag = Math.max(1, Math.floor(sampleRate / AUDIO_SMOOTHING.PITCH_MAX_HZ));
  const maxLag = Math.min(Math.floor(sampleRate / AUDIO_SMOOTHING.PITCH_MIN_HZ), n - 1);

  let bestLag = 0;
  let bestCorrelation = 0;
  for (let lag = minLag; lag <= maxLag; lag++) {
    let correlation = 0;
    for (let i = 0; i < n - lag; i++) {
      correlation += samples[i] * samples[i + lag];
    }
    if (correlation > bestCorrelation) {
      bestCorrelation = correlation;
      bestLag = lag;
    }
  }

  if (bestLag === 0) {
    return { pitch: 0, confidence: 0 };
  }

  return {
    pitch: sampleRate / bestLag,
    confidence: Math.max(0, Math.min(1, bestCorrelation / energy))
  };
}

/**
 * スペクトルの充実度（しきい値を超える周波数ビンの割合）
 * @param bins 0-255の振幅スペクトル
 */
export function spectralFullness(bins: ArrayLike<number>, threshold: number = FULLNESS_BIN_THRESHOLD): number {
  if (bins.length === 0) {
    return 0;
  }
  let filled = 0;
  for (let i = 0; i < bins.length; i++) {
    if (bins[i] > threshold) {
      filled++;
    }
  }
  return filled / bins.length;
}

/**
 * AudioAnalyzer - マイク入力から音量・音高・スペクトルの充実度をリアルタイムで解析
 */
export class AudioAnalyzer implements SignalSource {
  private audioContext: AudioContext | null = null;
  private analyserNode: AnalyserNode | null = null;
  private microphone: MediaStreamAudioSourceNode | null = null;
  private mediaStream: MediaStream | null = null;
  private timeData = new Float32Array(0);
  private frequencyData = new Uint8Array(0);
  private active: boolean = false;

  /**
   * AudioAnalyzerを初期化し、マイクアクセスを取得
   */
  async initialize(): Promise<void> {
    try {
      console.log('[AudioAnalyzer] 初期化開始...');

      if (this.active) {
        this.dispose();
      }

      if (typeof AudioContext === 'undefined') {
        throw new Error('Web Audio APIがサポートされていません');
      }
      if (typeof navigator === 'undefined' || !navigator.mediaDevices) {
        throw new Error('マイク入力がサポートされていません');
      }

      this.audioContext = new AudioContext();

      this.mediaStream = await navigator.mediaDevices.getUserMedia({
        audio: {
          echoCancellation: false,
          noiseSuppression: false,
          autoGainControl: false
        }
      });
      console.log('[AudioAnalyzer] マイクアクセス許可されました');

      const audioTracks = this.mediaStream.getAudioTracks();
      if (audioTracks.length > 0) {
        const track = audioTracks[0];
        console.log('[AudioAnalyzer] 使用中のマイク:', track.label);
        track.addEventListener('ended', () => {
          console.warn('[AudioAnalyzer] マイクトラックが停止されました');
          this.active = false;
        });
      }

      this.analyserNode = this.audioContext.createAnalyser();
      this.analyserNode.fftSize = FFT_SIZE;
      this.analyserNode.smoothingTimeConstant = 0.8;

      this.microphone = this.audioContext.createMediaStreamSource(this.mediaStream);
      this.microphone.connect(this.analyserNode);

      if (this.audioContext.state === 'suspended') {
        await this.audioContext.resume();
      }

      this.timeData = new Float32Array(this.analyserNode.fftSize);
      this.frequencyData = new Uint8Array(this.analyserNode.frequencyBinCount);

      this.active = true;
      console.log('[AudioAnalyzer] 初期化完了 (sampleRate:', this.audioContext.sampleRate, ')');
    } catch (error) {
      console.error('[AudioAnalyzer] 初期化エラー:', error);
      // 途中まで作ったAudioContextやストリームを残さない
      this.dispose();
      if (error instanceof Error) {
        if (error.name === 'NotAllowedError') {
          throw new Error('マイクアクセスが拒否されました');
        } else if (error.name === 'NotFoundError') {
          throw new Error('マイクが見つかりません');
        }
      }
      throw error;
    }
  }

  /**
   * 現在の音声シグナルを取得（未初期化・停止中は無音）
   */
  getSignals(): AudioSignals {
    if (!this.active || !this.analyserNode || !this.audioContext) {
      return { ...SILENT };
    }

    if (this.audioContext.state === 'suspended') {
      this.audioContext.resume().catch((e: unknown) => {
        console.warn('[AudioAnalyzer] AudioContext再開エラー:', e);
      });
      return { ...SILENT };
    }

    this.analyserNode.getFloatTimeDomainData(this.timeData);
    this.analyserNode.getByteFrequencyData(this.frequencyData);

    const estimate = detectPitch(this.timeData, this.audioContext.sampleRate);

    return {
      volume: computeRms(this.timeData),
      pitch: estimate.pitch,
      pitchConfidence: estimate.confidence,
      spectralFullness: spectralFullness(this.frequencyData)
    };
  }

  /**
   * AudioAnalyzerがアクティブかどうかを返す
   */
  isActive(): boolean {
    return this.active;
  }

  /**
   * リソースを解放
   */
  dispose(): void {
    this.active = false;

    if (this.mediaStream) {
      this.mediaStream.getTracks().forEach((track) => track.stop());
      this.mediaStream = null;
    }

    if (this.microphone) {
      this.microphone.disconnect();
      this.microphone = null;
    }

    if (this.analyserNode) {
      this.analyserNode.disconnect();
      this.analyserNode = null;
    }

    if (this.audioContext) {
      if (this.audioContext.state !== 'closed') {
        this.audioContext.close().catch((e: unknown) => {
          console.warn('[AudioAnalyzer] AudioContextクローズエラー:', e);
        });
      }
      this.audioContext = null;
    }

    console.log('[AudioAnalyzer] リソース解放完了');
  }
}
