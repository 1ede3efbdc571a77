import { Segment } from './segment-builder';

export function toCutSheetCsv(segments: readonly Segment[]): string {
  const rows = segments.map(
    (segment, index) => `${index + 1},${segment.start.toFixed(3)},${segment.end.toFixed(3)}`,
  );
  return ['index,start,end', ...rows].join('\n');
}
