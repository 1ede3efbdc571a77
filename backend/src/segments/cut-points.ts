import { InvalidInputError } from '../common/errors';
import { Segment, boundariesOf, quantizeToFps, segmentsFromBoundaries } from './segment-builder';

export interface FlashPruneOptions {
  minGapSec: number;
  fps: number;
}

export function pruneFlashTimes(times: readonly number[], { minGapSec, fps }: FlashPruneOptions): number[] {
  if (!(fps > 0)) {
    throw new InvalidInputError('fps must be positive');
  }
  const gap = Math.max(1 / fps, minGapSec);
  const kept: number[] = [];
  let last = -Infinity;
  for (const time of [...times].sort((a, b) => a - b)) {
    if (time - last >= gap) {
      kept.push(time);
      last = time;
    }
  }
  return kept.map((time) => quantizeToFps(time, fps));
}

/**
 * Splits `segments` at extra cut times. Times outside the covered range, or
 * nearer than `minLengthSec` to an existing boundary, are ignored, so the
 * result still partitions the same range.
 */
export function injectCutPoints(
  segments: readonly Segment[],
  cutTimes: readonly number[],
  minLengthSec: number,
): Segment[] {
  const boundaries = boundariesOf(segments);
  if (boundaries.length < 2) {
    return [...segments];
  }
  const first = boundaries[0];
  const last = boundaries[boundaries.length - 1];

  for (const time of [...cutTimes].sort((a, b) => a - b)) {
    if (time <= first || time >= last) {
      continue;
    }
    if (boundaries.some((boundary) => Math.abs(boundary - time) < minLengthSec)) {
      continue;
    }
    boundaries.push(time);
    boundaries.sort((a, b) => a - b);
  }
  return segmentsFromBoundaries(boundaries);
}
