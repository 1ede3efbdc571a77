import 'reflect-metadata';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { INestApplication } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import request from 'supertest';
import { AppModule } from '../src/app.module';
import { configureApp } from '../src/app.setup';
import { IOnsetAnalyzer, ONSET_ANALYZER, OnsetAnalysis } from '../src/analysis/analyzers/IOnsetAnalyzer';
import { ToolUnavailableError } from '../src/common/errors';
import { APP_CONFIG, AppConfig, loadConfig } from '../src/config/app-config';
import { COMMAND_RUNNER, CommandResult, CommandRunner } from '../src/media/command-runner';
import { NO_MEDIA_MESSAGE } from '../src/render/render.controller';

const analysis: OnsetAnalysis = {
  durationSec: 10,
  onsets: [
    { time: 2, confidence: 0.9 },
    { time: 5, confidence: 0.8 },
  ],
};

const analyzer: IOnsetAnalyzer = {
  analyze: async () => analysis,
};

const missingTools: CommandRunner = {
  run: async (command: string): Promise<CommandResult> => {
    throw new ToolUnavailableError(`Command not found: ${command}`);
  },
};

const ok = (stdout = ''): CommandResult => ({ code: 0, stdout: Buffer.from(stdout), stderr: '' });

const FAKE_OUTPUTS: Record<string, string> = {
  'cut.mp4': 'fake-mp4',
  'waveform.png': 'fake-png',
};

/** Answers like a working ffmpeg install and writes the final outputs the controllers stream back. */
class FakeTools implements CommandRunner {
  readonly calls: string[][] = [];

  async run(command: string, args: string[]): Promise<CommandResult> {
    this.calls.push([command, ...args]);
    if (args[0] === '-version') {
      return ok(`${command} version 6.0\n`);
    }
    if (command === 'ffprobe') {
      return ok(JSON.stringify({ streams: [{ width: 640, height: 360 }], format: { duration: '4' } }));
    }
    const target = args[args.length - 1];
    const content = FAKE_OUTPUTS[path.basename(target)];
    if (content !== undefined && path.isAbsolute(target)) {
      await fs.writeFile(target, content);
    }
    return ok();
  }
}

async function renderDirs(): Promise<string[]> {
  return (await fs.readdir(os.tmpdir())).filter((name) => name.startsWith('flashcut-render-')).sort();
}

/** Work directories are removed after the response stream closes, so give the removal a moment. */
async function settledRenderDirs(expected: string[]): Promise<string[]> {
  let current = await renderDirs();
  for (let attempt = 0; attempt < 50 && current.join() !== expected.join(); attempt += 1) {
    await new Promise((resolve) => setTimeout(resolve, 20));
    current = await renderDirs();
  }
  return current;
}

async function createApp(config: AppConfig, runner: CommandRunner = missingTools): Promise<INestApplication> {
  const moduleRef = await Test.createTestingModule({ imports: [AppModule] })
    .overrideProvider(APP_CONFIG)
    .useValue(config)
    .overrideProvider(ONSET_ANALYZER)
    .useValue(analyzer)
    .overrideProvider(COMMAND_RUNNER)
    .useValue(runner)
    .compile();
  moduleRef.useLogger(false);
  const app = configureApp(moduleRef.createNestApplication());
  await app.init();
  return app;
}

const audio = Buffer.from('RIFF-test-audio');

describe('HTTP API', () => {
  let app: INestApplication;
  let uploadDir: string;

  beforeAll(async () => {
    uploadDir = await fs.mkdtemp(path.join(os.tmpdir(), 'flashcut-e2e-'));
    app = await createApp({ ...loadConfig({}), uploadDir });
  });

  afterAll(async () => {
    await app.close();
    await fs.rm(uploadDir, { recursive: true, force: true });
  });

  it('GET /health', async () => {
    const res = await request(app.getHttpServer()).get('/health').expect(200);
    expect(res.body).toEqual({ ok: true });
  });

  it('GET /tools reports missing tools without failing', async () => {
    const res = await request(app.getHttpServer()).get('/tools').expect(200);
    expect(res.body.ffmpeg).toEqual({
      path: 'ffmpeg',
      available: false,
      version: null,
      error: 'Command not found: ffmpeg',
    });
  });

  it('POST /segments merges onsets within the minimum gap', async () => {
    const res = await request(app.getHttpServer())
      .post('/segments')
      .send({ onsets: [2, 2.1], durationSec: 10, minGapSec: 0.5 })
      .expect(200);
    expect(res.body).toEqual({
      segments: [
        { start: 0, end: 2 },
        { start: 2, end: 10 },
      ],
    });
  });

  it('POST /segments rejects a non-positive duration', async () => {
    const res = await request(app.getHttpServer())
      .post('/segments')
      .send({ onsets: [], durationSec: 0 })
      .expect(400);
    expect(res.body).toEqual({ error: 'InvalidInput', message: 'duration must be positive, got 0' });
  });

  it('POST /segments bounds the maximum gap', async () => {
    const res = await request(app.getHttpServer())
      .post('/segments')
      .send({ onsets: [], durationSec: 2000, maxGapSec: 0.0001 })
      .expect(400);
    expect(res.body).toEqual({ error: 'InvalidInput', message: 'maxGapSec must not be less than 0.1' });
  });

  it('POST /segments rejects malformed onsets', async () => {
    const res = await request(app.getHttpServer())
      .post('/segments')
      .send({ onsets: ['soon'], durationSec: 10 })
      .expect(400);
    expect(res.body.error).toBe('InvalidInput');
  });

  it('POST /analyze returns the report and removes the upload', async () => {
    const res = await request(app.getHttpServer())
      .post('/analyze')
      .attach('audio', audio, 'song.wav')
      .expect(200);

    expect(res.body).toMatchObject({
      audio: 'song.wav',
      durationSec: 10,
      fps: 30,
      flash: [],
      segments: [
        { start: 0, end: 2 },
        { start: 2, end: 5 },
        { start: 5, end: 10 },
      ],
    });
    await expect(fs.readdir(uploadDir)).resolves.toEqual([]);
  });

  it('POST /analyze?format=csv returns the cut sheet', async () => {
    const res = await request(app.getHttpServer())
      .post('/analyze?format=csv')
      .attach('audio', audio, 'song.wav')
      .expect(200);

    expect(res.headers['content-type']).toMatch(/^text\/csv/);
    expect(res.text).toBe('index,start,end\n1,0.000,2.000\n2,2.000,5.000\n3,5.000,10.000');
  });

  it('POST /analyze requires an audio file', async () => {
    const res = await request(app.getHttpServer()).post('/analyze').field('fps', '30').expect(400);
    expect(res.body).toEqual({ error: 'InvalidInput', message: 'Please upload an audio file.' });
  });

  it('POST /analyze validates form parameters and still removes the upload', async () => {
    const res = await request(app.getHttpServer())
      .post('/analyze')
      .field('fps', '5')
      .attach('audio', audio, 'song.wav')
      .expect(400);

    expect(res.body.error).toBe('InvalidInput');
    await expect(fs.readdir(uploadDir)).resolves.toEqual([]);
  });

  it('POST /render degrades to a skipped render without ffmpeg', async () => {
    const res = await request(app.getHttpServer())
      .post('/render')
      .field('clipMode', 'TAIL')
      .attach('audio', audio, 'song.wav')
      .attach('images', Buffer.from('png'), 'cover.png')
      .expect(200);

    expect(res.body.render).toEqual({ status: 'skipped', message: 'Rendering skipped: Command not found: ffmpeg' });
    expect(res.body.report.segments).toHaveLength(3);
    await expect(fs.readdir(uploadDir)).resolves.toEqual([]);
  });

  it('POST /timeline degrades to a skipped render without ffmpeg', async () => {
    const res = await request(app.getHttpServer())
      .post('/timeline')
      .attach('audio', audio, 'song.wav')
      .expect(200);

    expect(res.body.render).toEqual({ status: 'skipped', message: 'Timeline skipped: Command not found: ffmpeg' });
    expect(res.body.report.flashWindow).toEqual([10, 25]);
    await expect(fs.readdir(uploadDir)).resolves.toEqual([]);
  });
});

describe('HTTP API with ffmpeg available', () => {
  let app: INestApplication;
  let uploadDir: string;
  const tools = new FakeTools();

  beforeAll(async () => {
    uploadDir = await fs.mkdtemp(path.join(os.tmpdir(), 'flashcut-e2e-tools-'));
    app = await createApp({ ...loadConfig({}), uploadDir }, tools);
  });

  beforeEach(() => {
    tools.calls.length = 0;
  });

  afterAll(async () => {
    await app.close();
    await fs.rm(uploadDir, { recursive: true, force: true });
  });

  it('POST /render streams the video as an attachment and removes its work directory', async () => {
    const before = await renderDirs();
    const res = await request(app.getHttpServer())
      .post('/render')
      .field('outputName', 'cut.mp4')
      .attach('audio', audio, 'song.wav')
      .attach('images', Buffer.from('png'), 'cover.png')
      .expect(200);

    expect(res.headers['content-type']).toMatch(/^video\/mp4/);
    expect(res.headers['content-disposition']).toBe('attachment; filename="cut.mp4"');
    expect(Buffer.isBuffer(res.body)).toBe(true);
    expect(res.body.toString('utf8')).toBe('fake-mp4');
    await expect(settledRenderDirs(before)).resolves.toEqual(before);
    await expect(fs.readdir(uploadDir)).resolves.toEqual([]);
  });

  it('POST /render cuts uploaded videos in preference to images', async () => {
    await request(app.getHttpServer())
      .post('/render')
      .field('outputName', 'cut.mp4')
      .attach('audio', audio, 'song.wav')
      .attach('videos', Buffer.from('mp4'), 'clip.mp4')
      .attach('images', Buffer.from('png'), 'cover.png')
      .expect(200);

    expect(tools.calls.filter(([command]) => command === 'ffprobe')).toHaveLength(1);
    expect(tools.calls.some((call) => call.includes('-loop'))).toBe(false);
  });

  it('POST /render skips when no usable media was uploaded', async () => {
    const res = await request(app.getHttpServer())
      .post('/render')
      .attach('audio', audio, 'song.wav')
      .attach('images', Buffer.from('jpg'), 'photo.jpg')
      .expect(200);

    expect(res.body.render).toEqual({ status: 'skipped', message: NO_MEDIA_MESSAGE });
    expect(res.body.report.segments).toHaveLength(3);
  });

  it('POST /timeline returns the waveform picture', async () => {
    const before = await renderDirs();
    const res = await request(app.getHttpServer())
      .post('/timeline')
      .attach('audio', audio, 'song.wav')
      .expect(200);

    expect(res.headers['content-type']).toMatch(/^image\/png/);
    expect(res.headers['content-disposition']).toBe('inline; filename="waveform.png"');
    expect(res.body.toString('utf8')).toBe('fake-png');
    await expect(settledRenderDirs(before)).resolves.toEqual(before);
  });
});

describe('upload ceiling', () => {
  let app: INestApplication;
  let uploadDir: string;

  beforeAll(async () => {
    uploadDir = await fs.mkdtemp(path.join(os.tmpdir(), 'flashcut-e2e-limit-'));
    app = await createApp({ ...loadConfig({}), uploadDir, maxUploadBytes: 64 });
  });

  afterAll(async () => {
    await app.close();
    await fs.rm(uploadDir, { recursive: true, force: true });
  });

  it('rejects uploads over the limit with 413', async () => {
    const res = await request(app.getHttpServer())
      .post('/analyze')
      .attach('audio', Buffer.alloc(256), 'big.wav')
      .expect(413);
    expect(res.body).toEqual({ error: 'UploadTooLarge', message: 'Upload exceeds the 64 byte limit' });
  });
});
