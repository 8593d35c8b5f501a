import { z } from 'zod';

const intFromEnv = (fallback: number, min: number, max = Number.MAX_SAFE_INTEGER) =>
  z.preprocess(
    (val) => (val === undefined || val === '' ? fallback : Number(val)),
    z.number().int().min(min).max(max)
  );

export const ConfigSchema = z.object({
  PORT: intFromEnv(4600, 0, 65535),
  HOST: z.string().min(1).default('0.0.0.0'),
  DATA_DIR: z.string().min(1).default('.data'),
  FFMPEG_PATH: z.string().min(1).default('ffmpeg'),
  FFPROBE_PATH: z.string().min(1).default('ffprobe'),
  MAX_CONCURRENT_JOBS: intFromEnv(2, 0),
  CANCEL_GRACE_MS: intFromEnv(5000, 0),
  LOG_TAIL_LINES: intFromEnv(50, 1, 10000),
  FAILURE_CONTEXT_LINES: intFromEnv(10, 1, 1000),
  PREVIEW_MAX_WIDTH: intFromEnv(640, 16, 7680),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_DEV: z.enum(['0', '1']).default('0'),
  NODE_ENV: z.string().default('production'),
});

export type EnvConfig = z.infer<typeof ConfigSchema>;

export interface AppConfig {
  port: number;
  host: string;
  dataDir: string;
  ffmpegPath: string;
  ffprobePath: string;
  /** 0 admits every queued job immediately. */
  maxConcurrentJobs: number;
  cancelGraceMs: number;
  logTailLines: number;
  failureContextLines: number;
  previewMaxWidth: number;
  logLevel: EnvConfig['LOG_LEVEL'];
  corsDev: boolean;
  nodeEnv: string;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`));
  }

  const c = parsed.data;
  return {
    port: c.PORT,
    host: c.HOST,
    dataDir: c.DATA_DIR,
    ffmpegPath: c.FFMPEG_PATH,
    ffprobePath: c.FFPROBE_PATH,
    maxConcurrentJobs: c.MAX_CONCURRENT_JOBS,
    cancelGraceMs: c.CANCEL_GRACE_MS,
    logTailLines: c.LOG_TAIL_LINES,
    failureContextLines: c.FAILURE_CONTEXT_LINES,
    previewMaxWidth: c.PREVIEW_MAX_WIDTH,
    logLevel: c.LOG_LEVEL,
    corsDev: c.CORS_DEV === '1',
    nodeEnv: c.NODE_ENV,
  };
}
