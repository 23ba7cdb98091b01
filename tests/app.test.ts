import path from 'path';
import request from 'supertest';
import type { Application } from 'express';

import { createApp } from '../src/app';
import { loadSettings } from '../src/config/settings';
import { BatchOrchestrator } from '../src/services/batchOrchestrator';
import { FakeMediaService } from './helpers/fakeMediaService';
import { makeTempDir, removeDir, writeInput } from './helpers/tempDir';

describe('Video to audio converter API', () => {
  let app: Application;
  let orchestrator: BatchOrchestrator;
  let media: FakeMediaService;
  let inputDir: string;
  let outputDir: string;

  beforeEach(async () => {
    inputDir = await makeTempDir('inputs-');
    outputDir = await makeTempDir('outputs-');
    media = new FakeMediaService();
    const context = await createApp({ settings: loadSettings({}), mediaService: media });
    app = context.app;
    orchestrator = context.orchestrator;
  });

  afterEach(async () => {
    await orchestrator.waitForIdle();
    await removeDir(inputDir);
    await removeDir(outputDir);
  });

  it('reports health and the availability of the media tool', async () => {
    await request(app).get('/health').expect(200, { status: 'ok', mediaTool: 'up' });

    media.available = false;
    await request(app).get('/health').expect(200, { status: 'ok', mediaTool: 'down' });
  });

  it('returns supported formats', async () => {
    const response = await request(app).get('/formats');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ formats: { input: ['.mp4'], output: 'mp3' } });
  });

  it('queues files and reports rejected ones', async () => {
    const clip = path.join(inputDir, 'clip.mp4');

    const response = await request(app)
      .post('/files')
      .send({ paths: [clip, 'notes.txt'] });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      added: [clip],
      rejected: [{ path: 'notes.txt', reason: 'expected one of .mp4' }],
      duplicates: [],
      files: [clip]
    });
  });

  it('requires a list of paths', async () => {
    const response = await request(app).post('/files').send({ paths: [42] });

    expect(response.status).toBe(400);
    expect(response.body.message).toBe('paths must be a non-empty array of file paths.');
  });

  it('removes one queued file or clears them all', async () => {
    const one = path.join(inputDir, 'one.mp4');
    const two = path.join(inputDir, 'two.mp4');
    await request(app).post('/files').send({ paths: [one, two] });

    await request(app).delete('/files/entry').send({ path: one }).expect(200, { files: [two] });
    await request(app).delete('/files/entry').send({ path: one }).expect(404);
    await request(app).delete('/files').expect(200, { files: [] });
  });

  it('rejects an output directory that does not exist', async () => {
    const missing = path.join(outputDir, 'missing');

    const response = await request(app).put('/output-directory').send({ path: missing });

    expect(response.status).toBe(400);
    expect(response.body).toEqual({
      message: `Output directory does not exist: ${missing}`,
      code: 'INVALID_DIRECTORY'
    });
    await request(app).get('/output-directory').expect(200, { outputDirectory: null });
  });

  it('refuses to start without queued files', async () => {
    await request(app).put('/output-directory').send({ path: outputDir }).expect(200, { outputDirectory: outputDir });

    const response = await request(app).post('/batch');

    expect(response.status).toBe(400);
    expect(response.body.code).toBe('EMPTY_INPUT_LIST');
  });

  it('refuses to start without an output directory', async () => {
    await request(app).post('/files').send({ paths: [path.join(inputDir, 'clip.mp4')] });

    const response = await request(app).post('/batch');

    expect(response.status).toBe(400);
    expect(response.body.code).toBe('NO_OUTPUT_DIRECTORY');
  });

  it('answers 503 when the media tool is unavailable', async () => {
    await request(app).post('/files').send({ paths: [path.join(inputDir, 'clip.mp4')] });
    await request(app).put('/output-directory').send({ path: outputDir });
    media.available = false;

    const response = await request(app).post('/batch');

    expect(response.status).toBe(503);
    expect(response.body.code).toBe('MEDIA_TOOL_UNAVAILABLE');
  });

  it('converts a batch and exposes progress, results and log', async () => {
    const a = await writeInput(inputDir, 'a.mp4', 'audio');
    const b = await writeInput(inputDir, 'b.mp4', 'silent');
    await request(app).post('/files').send({ paths: [a, b] });
    await request(app).put('/output-directory').send({ path: outputDir });

    const started = await request(app).post('/batch');
    expect(started.status).toBe(202);
    expect(started.body.job.inputPaths).toEqual([a, b]);
    expect(started.body.job.outputDirectory).toBe(outputDir);

    await orchestrator.waitForIdle();

    const status = await request(app).get('/batch');
    expect(status.status).toBe(200);
    expect(status.body.batch.state).toBe('completed');
    expect(status.body.batch.canStart).toBe(true);
    expect(status.body.batch.canCancel).toBe(false);
    expect(status.body.batch.progress).toEqual({ completed: 2, total: 2, percent: 100, currentFile: 'b.mp4' });
    expect(status.body.batch.results).toEqual([
      { status: 'succeeded', inputPath: a, outputPath: path.join(outputDir, 'a.mp3') },
      { status: 'failed', inputPath: b, reason: 'no audio track' }
    ]);
    expect(status.body.batch.summary).toEqual({ total: 2, succeeded: 1, failed: 1, skipped: 0 });

    const log = await request(app).get('/batch/log');
    const lastEntry = log.body.entries[log.body.entries.length - 1];
    expect(lastEntry.level).toBe('info');
    expect(lastEntry.message).toBe('Conversion process completed: 1 succeeded, 1 failed, 0 skipped.');
  });

  it('cancels a running batch and rejects a cancel when nothing runs', async () => {
    await request(app).post('/batch/cancel').expect(409);

    const one = await writeInput(inputDir, 'one.mp4', 'audio');
    const two = await writeInput(inputDir, 'two.mp4', 'audio');
    await request(app).post('/files').send({ paths: [one, two] });
    await request(app).put('/output-directory').send({ path: outputDir });
    let release: () => void = () => undefined;
    const writeStarted = new Promise<void>((resolve) => {
      release = media.holdWrites(() => resolve());
    });

    await request(app).post('/batch').expect(202);
    await writeStarted;
    await request(app).post('/batch').expect(409);
    await request(app).post('/batch/cancel').expect(202);
    release();
    await orchestrator.waitForIdle();

    const status = await request(app).get('/batch');
    expect(status.body.batch.state).toBe('cancelled');
    expect(status.body.batch.summary).toEqual({ total: 2, succeeded: 1, failed: 0, skipped: 0 });
  });
});
