import { AUDIO_SMOOTHING } from './config';

const NOTE_NAMES = ['C', 'C#', 'D', 'D#', 'E', 'F', 'F#', 'G', 'G#', 'A', 'A#', 'B'];

/**
 * 音高を -1〜1 に正規化する
 * 中央ド（261Hz）を0として、50Hz〜2500Hzの対数幅の半分で割る
 * @param pitch 音高（Hz）
 * @returns 50Hz以下は0
 */
export function normalizePitch(pitch: number): number {
  if (!(pitch > AUDIO_SMOOTHING.PITCH_MIN_HZ)) {
    return 0;
  }
  const logCenter = Math.log2(AUDIO_SMOOTHING.PITCH_CENTER_HZ);
  const logRange = Math.log2(AUDIO_SMOOTHING.PITCH_MAX_HZ) - Math.log2(AUDIO_SMOOTHING.PITCH_MIN_HZ);
  const normalized = (Math.log2(pitch) - logCenter) / (logRange * 0.5);
  return Math.max(-1, Math.min(1, normalized));
}

/**
 * 周波数を音名に変換する（A4 = 440Hz）
 * @param freqHz 周波数（Hz）
 * @returns 例: 'A4'、未検出の場合は'—'
 */
export function pitchToNoteName(freqHz: number): string {
  if (!(freqHz > 0) || !Number.isFinite(freqHz)) {
    return '—';
  }
  const midi = Math.round(69 + 12 * Math.log2(freqHz / 440));
  const name = NOTE_NAMES[((midi % 12) + 12) % 12];
  const octave = Math.floor(midi / 12) - 1;
  return `${name}${octave}`;
}
