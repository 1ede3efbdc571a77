import { InvalidInputError } from '../common/errors';
import { MAX_SEGMENTS, Segment, assertPartition, buildSegments } from './segment-builder';

function mulberry32(seed: number) {
  let state = seed;
  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

describe('buildSegments', () => {
  it('covers the whole duration with one segment when there are no onsets', () => {
    expect(buildSegments([], 10)).toEqual([{ start: 0, end: 10 }]);
  });

  it('cuts at each onset and synthesises the leading segment', () => {
    expect(buildSegments([2, 5], 10, { minGapSec: 0.5 })).toEqual([
      { start: 0, end: 2 },
      { start: 2, end: 5 },
      { start: 5, end: 10 },
    ]);
  });

  it('merges an onset that follows the previous cut within the minimum gap', () => {
    expect(buildSegments([2, 2.1], 10, { minGapSec: 0.5 })).toEqual([
      { start: 0, end: 2 },
      { start: 2, end: 10 },
    ]);
  });

  it('does not emit a zero-length leading segment for an onset at 0', () => {
    expect(buildSegments([0, 5], 10)).toEqual([
      { start: 0, end: 5 },
      { start: 5, end: 10 },
    ]);
  });

  it('drops onsets at the end of the audio or too close to it', () => {
    expect(buildSegments([10], 10)).toEqual([{ start: 0, end: 10 }]);
    expect(buildSegments([9.8], 10, { minGapSec: 0.5 })).toEqual([{ start: 0, end: 10 }]);
  });

  it('collapses duplicate onsets even without a minimum gap', () => {
    expect(buildSegments([3, 3], 10)).toEqual([
      { start: 0, end: 3 },
      { start: 3, end: 10 },
    ]);
  });

  it('sorts unordered onsets', () => {
    expect(buildSegments([5, 2], 10)).toEqual(buildSegments([2, 5], 10));
  });

  it('quantises onsets to the frame grid', () => {
    expect(buildSegments([1.01], 10, { fps: 10 })).toEqual([
      { start: 0, end: 1 },
      { start: 1, end: 10 },
    ]);
  });

  it('splits segments longer than the maximum gap', () => {
    expect(buildSegments([], 10, { maxGapSec: 4 })).toEqual([
      { start: 0, end: 4 },
      { start: 4, end: 8 },
      { start: 8, end: 10 },
    ]);
    expect(buildSegments([], 10, { maxGapSec: 5 })).toEqual([
      { start: 0, end: 5 },
      { start: 5, end: 10 },
    ]);
  });

  it.each([0, -1, Number.NaN, Number.POSITIVE_INFINITY])('rejects a duration of %p', (duration) => {
    expect(() => buildSegments([], duration)).toThrow(InvalidInputError);
  });

  it('rejects onsets outside the audio', () => {
    expect(() => buildSegments([-1], 10)).toThrow(InvalidInputError);
    expect(() => buildSegments([11], 10)).toThrow('onset #0 (11) is outside [0, 10]');
  });

  it('rejects negative gaps and non-positive rates', () => {
    expect(() => buildSegments([], 10, { minGapSec: -1 })).toThrow(InvalidInputError);
    expect(() => buildSegments([], 10, { maxGapSec: 0 })).toThrow(InvalidInputError);
    expect(() => buildSegments([], 10, { fps: -30 })).toThrow(InvalidInputError);
  });

  it('refuses a maximum gap that would produce too many segments', () => {
    expect(() => buildSegments([], 2000, { maxGapSec: 0.0001 })).toThrow(
      `maxGapSec 0.0001 would split 2000s into more than ${MAX_SEGMENTS} segments`,
    );
    expect(buildSegments([], 25_000, { maxGapSec: 0.25 })).toHaveLength(MAX_SEGMENTS);
  });

  describe('over generated inputs', () => {
    const random = mulberry32(42);
    const cases = Array.from({ length: 200 }, () => {
      const duration = 1 + random() * 99;
      const onsets = Array.from({ length: Math.floor(random() * 30) }, () => random() * duration).sort(
        (a, b) => a - b,
      );
      return { duration, onsets, minGapSec: random() * 2 };
    });

    it('partitions [0, duration) into ascending segments of positive length', () => {
      for (const { duration, onsets, minGapSec } of cases) {
        const segments = buildSegments(onsets, duration, { minGapSec });
        expect(() => assertPartition(segments, duration)).not.toThrow();
        segments.forEach((segment) => expect(segment.end).toBeGreaterThan(segment.start));
      }
    });

    it('never keeps two onsets closer than the minimum gap', () => {
      for (const { duration, onsets, minGapSec } of cases) {
        const crowded = onsets.some((onset, i) => i > 0 && onset - onsets[i - 1] < minGapSec);
        if (!crowded) {
          continue;
        }
        expect(buildSegments(onsets, duration, { minGapSec }).length).toBeLessThan(onsets.length + 1);
      }
    });

    it('keeps every segment within the maximum gap', () => {
      for (const { duration, onsets, minGapSec } of cases) {
        const segments = buildSegments(onsets, duration, { minGapSec, maxGapSec: 3 });
        expect(() => assertPartition(segments, duration)).not.toThrow();
        segments.forEach((segment) => expect(segment.end - segment.start).toBeLessThanOrEqual(3 + 1e-6));
      }
    });
  });
});

describe('assertPartition', () => {
  const valid: Segment[] = [
    { start: 0, end: 4 },
    { start: 4, end: 10 },
  ];

  it('accepts a contiguous list', () => {
    expect(() => assertPartition(valid, 10)).not.toThrow();
  });

  it('rejects gaps, overlaps and short coverage', () => {
    expect(() => assertPartition([{ start: 0, end: 4 }, { start: 5, end: 10 }], 10)).toThrow(
      'segment #1 does not start where #0 ends',
    );
    expect(() => assertPartition([{ start: 0, end: 4 }, { start: 3, end: 10 }], 10)).toThrow(InvalidInputError);
    expect(() => assertPartition(valid, 12)).toThrow('last segment ends at 10, expected 12');
    expect(() => assertPartition([{ start: 1, end: 10 }], 10)).toThrow(InvalidInputError);
    expect(() => assertPartition([], 10)).toThrow('segment list is empty');
  });
});
