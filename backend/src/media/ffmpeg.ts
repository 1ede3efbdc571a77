export type AspectRatio = '16:9' | '1:1' | '9:16' | '4:3';
export type ClipMode = 'head' | 'tail';

export const ASPECT_RATIOS: Record<AspectRatio, { width: number; height: number }> = {
  '16:9': { width: 1280, height: 720 },
  '1:1': { width: 720, height: 720 },
  '9:16': { width: 720, height: 1280 },
  '4:3': { width: 960, height: 720 },
};

export interface MediaMeta {
  width: number;
  height: number;
  durationSec: number;
}

export const FALLBACK_MEDIA_META: MediaMeta = { width: 1280, height: 720, durationSec: 0 };

const ENCODE_ARGS = ['-pix_fmt', 'yuv420p', '-c:v', 'libx264', '-preset', 'veryfast', '-crf', '20'];

function seconds(value: number): string {
  return value.toFixed(3);
}

export function scaleFilter(fps: number, aspectRatio: AspectRatio): string {
  const { width, height } = ASPECT_RATIOS[aspectRatio];
  return (
    `fps=${Math.trunc(fps)},` +
    `scale=${width}:${height}:force_original_aspect_ratio=decrease,` +
    `pad=${width}:${height}:(ow-iw)/2:(oh-ih)/2:black`
  );
}

export interface VideoClipParams {
  source: string;
  sourceDurationSec: number;
  lengthSec: number;
  clipMode: ClipMode;
  fps: number;
  aspectRatio: AspectRatio;
  outputPath: string;
}

/** Trims from the head or tail when the source is long enough, otherwise loops it. */
export function videoClipArgs(params: VideoClipParams): string[] {
  const { source, sourceDurationSec, lengthSec, clipMode } = params;
  const fits = sourceDurationSec > 0 && lengthSec <= sourceDurationSec;
  const input = fits
    ? ['-ss', seconds(clipMode === 'tail' ? Math.max(sourceDurationSec - lengthSec, 0) : 0)]
    : ['-stream_loop', '-1'];
  return [
    '-y',
    ...input,
    '-t',
    seconds(lengthSec),
    '-i',
    source,
    '-vf',
    scaleFilter(params.fps, params.aspectRatio),
    '-an',
    ...ENCODE_ARGS,
    params.outputPath,
  ];
}

export interface ImageClipParams {
  source: string;
  lengthSec: number;
  fps: number;
  aspectRatio: AspectRatio;
  outputPath: string;
}

export function imageClipArgs(params: ImageClipParams): string[] {
  return [
    '-y',
    '-loop',
    '1',
    '-t',
    seconds(params.lengthSec),
    '-i',
    params.source,
    '-vf',
    scaleFilter(params.fps, params.aspectRatio),
    ...ENCODE_ARGS,
    params.outputPath,
  ];
}

export function concatListText(fileNames: readonly string[]): string {
  return ['ffconcat version 1.0', ...fileNames.map((name) => `file '${name}'`)].join('\n') + '\n';
}

export function concatArgs(listFile: string, fps: number, outputPath: string): string[] {
  return [
    '-y',
    '-f',
    'concat',
    '-safe',
    '0',
    '-i',
    listFile,
    '-fflags',
    '+genpts',
    '-r',
    String(Math.trunc(fps)),
    ...ENCODE_ARGS,
    '-movflags',
    '+faststart',
    outputPath,
  ];
}

export function muxArgs(videoPath: string, audioPath: string, outputPath: string): string[] {
  return ['-y', '-i', videoPath, '-i', audioPath, '-c:v', 'copy', '-c:a', 'aac', '-shortest', outputPath];
}

export function probeArgs(path: string): string[] {
  return [
    '-v',
    'error',
    '-select_streams',
    'v:0',
    '-show_entries',
    'stream=width,height,duration',
    '-show_entries',
    'format=duration',
    '-of',
    'json',
    path,
  ];
}

export interface DecodeWindow {
  startSec: number;
  endSec: number;
}

/** Mono little-endian float32 PCM on stdout. */
export function decodePcmArgs(path: string, sampleRate: number, window?: DecodeWindow): string[] {
  const range = window
    ? ['-ss', seconds(window.startSec), '-t', seconds(Math.max(window.endSec - window.startSec, 0))]
    : [];
  return ['-v', 'error', ...range, '-i', path, '-f', 'f32le', '-ac', '1', '-ar', String(sampleRate), 'pipe:1'];
}

function positiveNumber(value: unknown): number | null {
  const parsed = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : NaN;
  return Number.isFinite(parsed) && parsed > 0 ? parsed : null;
}

function field(source: unknown, key: string): unknown {
  return typeof source === 'object' && source !== null ? Reflect.get(source, key) : undefined;
}

/** Reads ffprobe's JSON; the container duration wins over the stream's. */
export function parseProbeOutput(stdout: string): MediaMeta {
  let data: unknown;
  try {
    data = JSON.parse(stdout || '{}');
  } catch {
    return { ...FALLBACK_MEDIA_META };
  }

  const streams = field(data, 'streams');
  const stream: unknown = Array.isArray(streams) ? streams[0] : undefined;
  const width = positiveNumber(field(stream, 'width'));
  const height = positiveNumber(field(stream, 'height'));
  const durationSec =
    positiveNumber(field(field(data, 'format'), 'duration')) ?? positiveNumber(field(stream, 'duration')) ?? 0;

  if (!width || !height) {
    return { ...FALLBACK_MEDIA_META, durationSec };
  }
  return { width: Math.trunc(width), height: Math.trunc(height), durationSec };
}

export interface TimelineParams {
  audioPath: string;
  durationSec: number;
  /** Flash window bounds, drawn in red. */
  window: [number, number];
  /** Flash cut times, drawn in green. */
  cuts: readonly number[];
  outputPath: string;
}

export const TIMELINE_SIZE = { width: 1800, height: 400 };

const WAVE_COLOR = '0xf0b429';
const WINDOW_COLOR = 'red';
const CUT_COLOR = '0x22c55e';

/** Horizontal pixel of `timeSec`, or null when it falls outside the audio. */
export function timelineX(timeSec: number, durationSec: number, lineWidth: number): number | null {
  if (!(durationSec > 0) || timeSec < 0 || timeSec > durationSec) {
    return null;
  }
  const x = Math.round((timeSec / durationSec) * TIMELINE_SIZE.width);
  return Math.min(x, TIMELINE_SIZE.width - lineWidth);
}

function markerBox(x: number, width: number, color: string): string {
  return `drawbox=x=${x}:y=0:w=${width}:h=ih:color=${color}:t=fill`;
}

/** Waveform picture of the audio with the flash window and cut markers drawn over it. */
export function timelineArgs(params: TimelineParams): string[] {
  const { width, height } = TIMELINE_SIZE;
  const [lo, hi] = [Math.min(...params.window), Math.max(...params.window)];
  const markers: string[] = [];
  for (const bound of [lo, hi]) {
    const x = timelineX(bound, params.durationSec, 3);
    if (x !== null) {
      markers.push(markerBox(x, 3, WINDOW_COLOR));
    }
  }
  for (const cut of params.cuts) {
    const x = timelineX(cut, params.durationSec, 2);
    if (x !== null) {
      markers.push(markerBox(x, 2, CUT_COLOR));
    }
  }
  const filter = [
    '[0:a]aformat=channel_layouts=mono',
    `showwavespic=s=${width}x${height}:colors=${WAVE_COLOR}`,
    ...markers,
  ].join(',');
  return [
    '-y',
    '-v',
    'error',
    '-i',
    params.audioPath,
    '-filter_complex',
    `${filter}[out]`,
    '-map',
    '[out]',
    '-frames:v',
    '1',
    params.outputPath,
  ];
}
