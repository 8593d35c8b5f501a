import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { writeFileSync } from 'node:fs';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import {
  FakeAssetStore,
  FakeSupervisor,
  IMAGE_ASSET_ID,
  SolidFrameSource,
  UNKNOWN_ASSET_ID,
  VIDEO_ASSET_ID,
  type FakeProcess,
} from './__fixtures__/fakes.js';
import { loadConfig } from './config.js';
import type { EncoderProbe } from './encoder/probe.js';
import { silentLogger } from './logger.js';
import { createServer } from './server.js';

const keying = { keyColor: '00FF00', similarity: 0.1, blend: 0.05 };

describe('Server', () => {
  let dataDir: string;
  let supervisor: FakeSupervisor;
  let probe: EncoderProbe;
  let app: Awaited<ReturnType<typeof createServer>>;

  async function build(onStart?: (proc: FakeProcess) => void) {
    supervisor = new FakeSupervisor(onStart);
    app = await createServer(loadConfig({ DATA_DIR: dataDir, LOG_LEVEL: 'silent', NODE_ENV: 'test' }), {
      logger: silentLogger,
      assets: new FakeAssetStore(),
      supervisor,
      frames: new SolidFrameSource({ r: 0, g: 255, b: 0 }),
      checkEncoder: async () => probe,
    });
  }

  async function jobStatus(jobId: string): Promise<string> {
    const response = await app.inject({ method: 'GET', url: `/api/jobs/${jobId}` });
    return JSON.parse(response.body).status;
  }

  beforeEach(async () => {
    dataDir = await mkdtemp(path.join(tmpdir(), 'server-'));
    probe = { ok: true, ffmpeg: 'ffmpeg version 6.1', ffprobe: 'ffprobe version 6.1' };
    await build();
  });

  afterEach(async () => {
    await app.close();
    await rm(dataDir, { recursive: true, force: true });
  });

  it('should respond to health check with job stats', async () => {
    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(JSON.parse(response.body)).toEqual({
      ok: true,
      queueDepth: 0,
      running: 0,
      done: 0,
      error: 0,
      canceled: 0,
      active: 0,
      pending: 0,
      maxConcurrentJobs: 2,
    });
  });

  it('should include X-Request-ID header', async () => {
    const response = await app.inject({ method: 'GET', url: '/health' });
    expect(response.headers['x-request-id']).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/);
  });

  it('should report encoder availability', async () => {
    const ok = await app.inject({ method: 'GET', url: '/api/probe' });
    expect(ok.statusCode).toBe(200);
    expect(JSON.parse(ok.body)).toEqual({ ok: true, ffmpeg: 'ffmpeg version 6.1', ffprobe: 'ffprobe version 6.1' });

    probe = { ok: false };
    const missing = await app.inject({ method: 'GET', url: '/api/probe' });
    expect(missing.statusCode).toBe(503);
    expect(JSON.parse(missing.body)).toEqual({
      ok: false,
      message: 'ffmpeg or ffprobe not found. Install ffmpeg and ensure it is in PATH.',
    });
  });

  describe('POST /api/assets/:assetId/render', () => {
    it('should queue a job and return its id', async () => {
      const response = await app.inject({
        method: 'POST',
        url: `/api/assets/${VIDEO_ASSET_ID}/render`,
        payload: { ...keying, crf: 24, includeAudio: true },
      });

      expect(response.statusCode).toBe(201);
      const { jobId } = JSON.parse(response.body);
      expect(jobId).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/);

      const job = JSON.parse((await app.inject({ method: 'GET', url: `/api/jobs/${jobId}` })).body);
      expect(job.id).toBe(jobId);
      expect(job.assetId).toBe(VIDEO_ASSET_ID);
      expect(job.params).toEqual({ keyColor: '00FF00', similarity: 0.1, blend: 0.05, crf: 24, includeAudio: true });
      expect(job.output).toBeNull();
    });

    it('should reject out-of-range similarity with the field named', async () => {
      const response = await app.inject({
        method: 'POST',
        url: `/api/assets/${VIDEO_ASSET_ID}/render`,
        payload: { ...keying, similarity: 0.6 },
      });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body)).toEqual({
        error: {
          type: 'BAD_INPUT',
          message: 'Invalid similarity value: 0.6. Must be between 0 and 0.5',
          fields: { similarity: 0.6 },
        },
      });

      const list = JSON.parse((await app.inject({ method: 'GET', url: '/api/jobs' })).body);
      expect(list.jobs).toEqual([]);
    });

    it('should reject a body that does not match the schema', async () => {
      const response = await app.inject({
        method: 'POST',
        url: `/api/assets/${VIDEO_ASSET_ID}/render`,
        payload: { similarity: 0.1, blend: 0.05 },
      });

      expect(response.statusCode).toBe(400);
      const body = JSON.parse(response.body);
      expect(body.error.type).toBe('BAD_INPUT');
      expect(body.error.message).toBe('Request validation failed');
      expect(body.error.fields.issues[0].path).toBe('keyColor');
    });

    it('should reject malformed JSON', async () => {
      const response = await app.inject({
        method: 'POST',
        url: `/api/assets/${VIDEO_ASSET_ID}/render`,
        headers: { 'content-type': 'application/json' },
        payload: '{"keyColor":',
      });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).error.type).toBe('BAD_INPUT');
    });

    it('should return 404 for an unknown asset', async () => {
      const response = await app.inject({
        method: 'POST',
        url: `/api/assets/${UNKNOWN_ASSET_ID}/render`,
        payload: keying,
      });

      expect(response.statusCode).toBe(404);
      expect(JSON.parse(response.body)).toEqual({ error: { type: 'NOT_FOUND', message: 'Asset not found' } });
    });
  });

  describe('jobs', () => {
    async function startJob(): Promise<{ jobId: string; proc: FakeProcess }> {
      const response = await app.inject({ method: 'POST', url: `/api/assets/${VIDEO_ASSET_ID}/render`, payload: keying });
      const { jobId } = JSON.parse(response.body);
      await vi.waitFor(async () => expect(await jobStatus(jobId)).toBe('running'));
      const proc = supervisor.processes.find((p) => p.outputPath.includes(jobId));
      if (!proc) throw new Error(`no process for ${jobId}`);
      return { jobId, proc };
    }

    it('should return 404 for an unknown job', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/jobs/01J9ZV3Q5W8X2Y4Z6A7B8C9D0K' });
      expect(response.statusCode).toBe(404);
      expect(JSON.parse(response.body).error.message).toBe('Job not found');
    });

    it('should cancel a running job', async () => {
      const { jobId } = await startJob();

      const response = await app.inject({ method: 'POST', url: `/api/jobs/${jobId}/cancel` });
      expect(response.statusCode).toBe(200);
      expect(JSON.parse(response.body)).toEqual({ jobId, status: 'canceled' });
      expect(await jobStatus(jobId)).toBe('canceled');
    });

    it('should refuse to download an unfinished job', async () => {
      const { jobId } = await startJob();

      const response = await app.inject({ method: 'GET', url: `/api/jobs/${jobId}/download` });
      expect(response.statusCode).toBe(409);
      expect(JSON.parse(response.body)).toEqual({
        error: { type: 'CONFLICT', message: 'Job is not complete. Current status: running' },
      });
    });

    it('should stream the output of a finished job', async () => {
      const { jobId, proc } = await startJob();
      await writeFile(proc.outputPath, 'webm-bytes');
      proc.exit(0);
      await vi.waitFor(async () => expect(await jobStatus(jobId)).toBe('done'));

      const job = JSON.parse((await app.inject({ method: 'GET', url: `/api/jobs/${jobId}` })).body);
      expect(job.progress).toBe(1);
      expect(job.output).toEqual({ filename: 'output.webm', mediaType: 'video/webm', sizeBytes: 10 });

      const response = await app.inject({ method: 'GET', url: `/api/jobs/${jobId}/download` });
      expect(response.statusCode).toBe(200);
      expect(response.headers['content-type']).toBe('video/webm');
      expect(response.headers['content-disposition']).toBe('attachment; filename="output.webm"');
      expect(response.body).toBe('webm-bytes');
    });

    it('should list jobs filtered by status', async () => {
      const { jobId } = await startJob();
      await app.inject({ method: 'POST', url: `/api/jobs/${jobId}/cancel` });

      const response = await app.inject({ method: 'GET', url: '/api/jobs?status=canceled' });
      const body = JSON.parse(response.body);
      expect(body.jobs.map((j: { id: string }) => j.id)).toEqual([jobId]);
    });

    it('should reject invalid query parameters', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/jobs?limit=0' });
      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).error.message).toBe('Invalid query parameters');
    });
  });

  it('should estimate the key color of an asset', async () => {
    const response = await app.inject({ method: 'POST', url: `/api/assets/${IMAGE_ASSET_ID}/estimate-key` });

    expect(response.statusCode).toBe(200);
    expect(JSON.parse(response.body)).toEqual({ hex: '00FF00', rgb: { r: 0, g: 255, b: 0 }, samples: 40 });
  });

  it('should return a PNG preview', async () => {
    await app.close();
    await build((proc) => {
      writeFileSync(proc.outputPath, 'png-bytes');
      proc.exit(0);
    });

    const response = await app.inject({
      method: 'POST',
      url: `/api/assets/${IMAGE_ASSET_ID}/preview`,
      payload: { ...keying, maxWidth: 200 },
    });

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-type']).toBe('image/png');
    expect(response.body).toBe('png-bytes');
    expect(supervisor.processes[0].spec.args).toContain('chromakey=0x00FF00:0.1:0.05,format=rgba,scale=200:-1');
  });

  it('should answer unknown routes in the error shape', async () => {
    const response = await app.inject({ method: 'GET', url: '/api/nope' });
    expect(response.statusCode).toBe(404);
    expect(JSON.parse(response.body)).toEqual({ error: { type: 'NOT_FOUND', message: 'Route GET /api/nope not found' } });
  });
});
