import Fastify, { type FastifyError } from 'fastify';
import helmet from '@fastify/helmet';
import cors from '@fastify/cors';
import { createReadStream } from 'node:fs';
import { ulid } from 'ulid';
import type { AppConfig } from './config.js';
import { checkEncoder, type EncoderProbe } from './encoder/probe.js';
import { ProcessSupervisor, type EncoderSupervisor } from './encoder/process-supervisor.js';
import { JobNotFoundError, errorResponse, isEngineError, toApiError } from './errors.js';
import { FfmpegFrameSource, type FrameSource } from './keying/frame-grabber.js';
import { msg } from './lib/error-messages.js';
import { createLogger, type Logger } from './logger.js';
import { parseBody, parseInput, parseQuery } from './middleware/validation.js';
import { JobRegistry } from './registry/index.js';
import { createJobRepository, type JobRepository } from './repositories/index.js';
import {
  AssetParamsSchema,
  JobListQuerySchema,
  JobParamsSchema,
  PreviewRequestSchema,
  RenderRequestSchema,
} from './schemas/job.js';
import { FileAssetStore, ffprobeMetadata } from './storage/asset-store.js';
import { FileOutputStore, type OutputStore } from './storage/output-store.js';
import type { AssetStore } from './types/asset.js';
import type { Job } from './types/job.js';

export interface ServerDeps {
  logger: Logger;
  repo: JobRepository;
  assets: AssetStore;
  outputs: OutputStore;
  supervisor: EncoderSupervisor;
  frames: FrameSource;
  checkEncoder: () => Promise<EncoderProbe>;
}

/** Public view of a job; the output's location on disk stays internal. */
export function presentJob(job: Job) {
  const { output, ...rest } = job;
  return {
    ...rest,
    output: output ? { filename: output.filename, mediaType: output.mediaType, sizeBytes: output.sizeBytes } : null,
  };
}

export async function createServer(config: AppConfig, overrides: Partial<ServerDeps> = {}) {
  const logger = overrides.logger ?? createLogger(config);
  const deps: ServerDeps = {
    logger,
    repo: overrides.repo ?? createJobRepository({ logTailLines: config.logTailLines }),
    assets: overrides.assets ?? new FileAssetStore(config.dataDir, ffprobeMetadata(config.ffprobePath)),
    outputs: overrides.outputs ?? new FileOutputStore(config.dataDir),
    supervisor: overrides.supervisor ?? new ProcessSupervisor({
      graceMs: config.cancelGraceMs,
      failureContextLines: config.failureContextLines,
      logger,
    }),
    frames: overrides.frames ?? new FfmpegFrameSource(config.ffmpegPath),
    checkEncoder: overrides.checkEncoder ?? (() => checkEncoder(config)),
  };

  const registry = new JobRegistry(deps, {
    ffmpegPath: config.ffmpegPath,
    maxConcurrentJobs: config.maxConcurrentJobs,
    previewMaxWidth: config.previewMaxWidth,
  });

  const app = Fastify({
    logger,
    genReqId: () => ulid(),
  });

  // Security
  await app.register(helmet, {
    contentSecurityPolicy: false,
  });

  // CORS (dev-friendly)
  if (config.corsDev) {
    await app.register(cors, {
      origin: ['http://localhost:3000', 'http://localhost:5173'],
      credentials: true,
    });
  }

  // Echo X-Request-ID
  app.addHook('onRequest', async (request, reply) => {
    reply.header('X-Request-ID', request.id);
  });

  app.setErrorHandler((err: FastifyError, request, reply) => {
    // Framework-level rejections (bad JSON, wrong content type, body limit) keep their 4xx status.
    if (!isEngineError(err) && err.statusCode !== undefined && err.statusCode >= 400 && err.statusCode < 500) {
      return reply.code(err.statusCode).send(errorResponse('BAD_INPUT', err.message));
    }
    const { statusCode, body } = toApiError(err);
    if (statusCode >= 500) {
      request.log.error({ err }, 'request failed');
    }
    return reply.code(statusCode).send(body);
  });

  app.setNotFoundHandler((request, reply) => {
    reply.code(404).send(errorResponse('NOT_FOUND', `Route ${request.method} ${request.url} not found`));
  });

  app.get('/health', async () => {
    const stats = await registry.getStats();
    return { ok: true, ...stats };
  });

  app.get('/api/probe', async (_request, reply) => {
    const probe = await deps.checkEncoder();
    if (!probe.ok) {
      return reply.code(503).send({ ...probe, message: msg('ENCODER_UNAVAILABLE') });
    }
    return probe;
  });

  app.post('/api/assets/:assetId/estimate-key', async (request) => {
    const { assetId } = parseInput(AssetParamsSchema, request.params);
    return registry.estimateKey(assetId);
  });

  app.post('/api/assets/:assetId/preview', async (request, reply) => {
    const { assetId } = parseInput(AssetParamsSchema, request.params);
    const params = parseBody(PreviewRequestSchema, request.body);
    const png = await registry.preview(assetId, params);
    return reply.type('image/png').header('Cache-Control', 'no-store').send(png);
  });

  app.post('/api/assets/:assetId/render', async (request, reply) => {
    const { assetId } = parseInput(AssetParamsSchema, request.params);
    const params = parseBody(RenderRequestSchema, request.body);
    const jobId = await registry.startRender(assetId, params);
    return reply.code(201).send({ jobId });
  });

  app.get('/api/jobs', async (request) => {
    const query = parseQuery(JobListQuerySchema, request.query);
    const result = await registry.listJobs(query);
    return { jobs: result.jobs.map(presentJob), nextCursor: result.nextCursor };
  });

  app.get('/api/jobs/:jobId', async (request) => {
    const { jobId } = parseInput(JobParamsSchema, request.params);
    const job = await registry.getStatus(jobId);
    if (!job) throw new JobNotFoundError(jobId);
    return presentJob(job);
  });

  app.post('/api/jobs/:jobId/cancel', async (request) => {
    const { jobId } = parseInput(JobParamsSchema, request.params);
    const status = await registry.cancel(jobId);
    return { jobId, status };
  });

  app.get('/api/jobs/:jobId/download', async (request, reply) => {
    const { jobId } = parseInput(JobParamsSchema, request.params);
    const output = await registry.download(jobId);
    return reply
      .type(output.mediaType)
      .header('Content-Length', output.sizeBytes)
      .header('Content-Disposition', `attachment; filename="${output.filename}"`)
      .send(createReadStream(output.path));
  });

  // Cancel whatever is still running before the process goes away
  app.addHook('onClose', async () => {
    await registry.shutdown();
  });

  return app;
}
