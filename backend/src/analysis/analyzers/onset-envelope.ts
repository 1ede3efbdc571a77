import { OnsetEvent } from './IOnsetAnalyzer';

export const FRAME_HOP = 512;
export const FRAME_SIZE = 2048;

export interface OnsetDetectOptions {
  hop?: number;
  frameSize?: number;
  threshold?: number;
  /** Frames on each side a peak must dominate. */
  peakWindow?: number;
}

export function frameLogEnergy(samples: ArrayLike<number>, hop: number, frameSize: number): number[] {
  const length = samples.length;
  if (!length) {
    return [];
  }
  const frameCount = length >= frameSize ? Math.floor((length - frameSize) / hop) + 1 : 1;
  const energies: number[] = [];
  for (let frame = 0; frame < frameCount; frame += 1) {
    const offset = frame * hop;
    const end = Math.min(offset + frameSize, length);
    let energy = 0;
    for (let i = offset; i < end; i += 1) {
      energy += samples[i] * samples[i];
    }
    energies.push(Math.log1p(energy));
  }
  return energies;
}

/** Half-wave rectified first difference of the log energy. */
export function onsetEnvelope(logEnergy: readonly number[]): number[] {
  return logEnergy.map((value, index) => (index === 0 ? 0 : Math.max(0, value - logEnergy[index - 1])));
}

export function quantile(values: readonly number[], q: number): number {
  if (!values.length) {
    return 0;
  }
  const sorted = [...values].sort((a, b) => a - b);
  const position = q * (sorted.length - 1);
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (position - lower);
}

export function pickPeaks(envelope: readonly number[], window: number): number[] {
  const peaks: number[] = [];
  for (let i = 0; i < envelope.length; i += 1) {
    const value = envelope[i];
    if (value <= 0) {
      continue;
    }
    const from = Math.max(0, i - window);
    const to = Math.min(envelope.length - 1, i + window);
    let max = -Infinity;
    let sum = 0;
    for (let j = from; j <= to; j += 1) {
      max = Math.max(max, envelope[j]);
      sum += envelope[j];
    }
    if (value >= max && value >= sum / (to - from + 1)) {
      peaks.push(i);
    }
  }
  return peaks;
}

export function detectOnsetEvents(
  samples: ArrayLike<number>,
  sampleRate: number,
  options: OnsetDetectOptions = {},
): OnsetEvent[] {
  const hop = options.hop ?? FRAME_HOP;
  const frameSize = options.frameSize ?? FRAME_SIZE;
  const threshold = options.threshold ?? 0.3;

  const envelope = onsetEnvelope(frameLogEnergy(samples, hop, frameSize));
  const scale = quantile(envelope, 0.98) || envelope.reduce((max, value) => Math.max(max, value), 0);
  if (scale <= 0) {
    return [];
  }

  return pickPeaks(envelope, options.peakWindow ?? 3)
    .map((frame) => ({
      time: (frame * hop) / sampleRate,
      confidence: Math.min(1, envelope[frame] / scale),
    }))
    .filter((event) => event.confidence >= threshold);
}
