import { InvalidInputError } from '../common/errors';

export interface Segment {
  start: number;
  end: number;
}

export interface SegmentOptions {
  /** Onsets closer than this to the previous cut point are merged away. */
  minGapSec?: number;
  /** Segments longer than this are split into equal steps from their start. */
  maxGapSec?: number;
  /** Quantise onsets to this frame rate before merging. */
  fps?: number;
}

export function quantizeToFps(time: number, fps: number): number {
  return Math.round(time * fps) / fps;
}

/** Upper bound on the segments a max-gap split may produce. */
export const MAX_SEGMENTS = 100_000;

function assertPositive(value: number | undefined, name: string) {
  if (value !== undefined && !(Number.isFinite(value) && value > 0)) {
    throw new InvalidInputError(`${name} must be a positive number`);
  }
}

function validate(onsets: readonly number[], durationSec: number, options: SegmentOptions) {
  if (!Number.isFinite(durationSec) || durationSec <= 0) {
    throw new InvalidInputError(`duration must be positive, got ${durationSec}`);
  }
  const minGap = options.minGapSec ?? 0;
  if (!Number.isFinite(minGap) || minGap < 0) {
    throw new InvalidInputError('minGapSec must be zero or positive');
  }
  assertPositive(options.maxGapSec, 'maxGapSec');
  assertPositive(options.fps, 'fps');
  if (options.maxGapSec && durationSec / options.maxGapSec > MAX_SEGMENTS) {
    throw new InvalidInputError(
      `maxGapSec ${options.maxGapSec} would split ${durationSec}s into more than ${MAX_SEGMENTS} segments`,
    );
  }
  onsets.forEach((onset, index) => {
    if (!Number.isFinite(onset) || onset < 0 || onset > durationSec) {
      throw new InvalidInputError(`onset #${index} (${onset}) is outside [0, ${durationSec}]`);
    }
  });
}

const SPLIT_EPSILON = 1e-9;

function splitLongSpans(boundaries: number[], maxGapSec: number): number[] {
  const out = [boundaries[0]];
  for (let i = 1; i < boundaries.length; i += 1) {
    const start = boundaries[i - 1];
    const end = boundaries[i];
    for (let k = 1; end - (start + k * maxGapSec) > SPLIT_EPSILON; k += 1) {
      out.push(start + k * maxGapSec);
    }
    out.push(end);
  }
  return out;
}

export function segmentsFromBoundaries(boundaries: readonly number[]): Segment[] {
  const segments: Segment[] = [];
  for (let i = 1; i < boundaries.length; i += 1) {
    segments.push({ start: boundaries[i - 1], end: boundaries[i] });
  }
  return segments;
}

export function boundariesOf(segments: readonly Segment[]): number[] {
  if (!segments.length) {
    return [];
  }
  return [segments[0].start, ...segments.map((segment) => segment.end)];
}

/**
 * Derives contiguous cut segments covering `[0, durationSec)` from onset times.
 *
 * Zero is always the first cut point and `durationSec` the last; an onset
 * becomes a cut point only if it keeps `minGapSec` away from both the
 * previously kept cut point and the end of the audio.
 */
export function buildSegments(
  onsets: readonly number[],
  durationSec: number,
  options: SegmentOptions = {},
): Segment[] {
  validate(onsets, durationSec, options);
  const minGap = options.minGapSec ?? 0;
  const { fps } = options;

  const times = [...onsets]
    .map((time) => (fps ? Math.min(durationSec, Math.max(0, quantizeToFps(time, fps))) : time))
    .sort((a, b) => a - b);

  const boundaries = [0];
  for (const time of times) {
    const last = boundaries[boundaries.length - 1];
    if (time <= last || time - last < minGap) {
      continue;
    }
    if (time >= durationSec || durationSec - time < minGap) {
      continue;
    }
    boundaries.push(time);
  }
  boundaries.push(durationSec);

  const split = options.maxGapSec ? splitLongSpans(boundaries, options.maxGapSec) : boundaries;
  return segmentsFromBoundaries(split);
}

/** Throws unless `segments` partition `[0, durationSec)` exactly. */
export function assertPartition(segments: readonly Segment[], durationSec: number) {
  if (!segments.length) {
    throw new InvalidInputError('segment list is empty');
  }
  if (segments[0].start !== 0) {
    throw new InvalidInputError(`first segment starts at ${segments[0].start}, expected 0`);
  }
  segments.forEach((segment, index) => {
    if (!(segment.end > segment.start)) {
      throw new InvalidInputError(`segment #${index} has no positive length`);
    }
    const next = segments[index + 1];
    if (next && next.start !== segment.end) {
      throw new InvalidInputError(`segment #${index + 1} does not start where #${index} ends`);
    }
  });
  const last = segments[segments.length - 1];
  if (last.end !== durationSec) {
    throw new InvalidInputError(`last segment ends at ${last.end}, expected ${durationSec}`);
  }
}
