import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig } from './config.js';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    expect(loadConfig({})).toEqual({
      port: 4600,
      host: '0.0.0.0',
      dataDir: '.data',
      ffmpegPath: 'ffmpeg',
      ffprobePath: 'ffprobe',
      maxConcurrentJobs: 2,
      cancelGraceMs: 5000,
      logTailLines: 50,
      failureContextLines: 10,
      previewMaxWidth: 640,
      logLevel: 'info',
      corsDev: false,
      nodeEnv: 'production',
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      DATA_DIR: '/var/lib/render',
      FFMPEG_PATH: '/opt/ffmpeg/bin/ffmpeg',
      MAX_CONCURRENT_JOBS: '0',
      CANCEL_GRACE_MS: '250',
      LOG_LEVEL: 'debug',
      CORS_DEV: '1',
      NODE_ENV: 'production',
    });

    expect(config.port).toBe(8080);
    expect(config.dataDir).toBe('/var/lib/render');
    expect(config.ffmpegPath).toBe('/opt/ffmpeg/bin/ffmpeg');
    expect(config.maxConcurrentJobs).toBe(0);
    expect(config.cancelGraceMs).toBe(250);
    expect(config.logLevel).toBe('debug');
    expect(config.corsDev).toBe(true);
    expect(config.nodeEnv).toBe('production');
  });

  it('treats empty strings as unset', () => {
    expect(loadConfig({ PORT: '', MAX_CONCURRENT_JOBS: '' }).port).toBe(4600);
  });

  it('fails with the offending variable named', () => {
    let caught: unknown;
    try {
      loadConfig({ PORT: 'abc', LOG_LEVEL: 'verbose' });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    const issues = caught instanceof ConfigError ? caught.issues : [];
    expect(issues).toHaveLength(2);
    expect(issues[0]).toMatch(/^PORT: /);
    expect(issues[1]).toMatch(/^LOG_LEVEL: /);
  });

  it('rejects negative limits', () => {
    expect(() => loadConfig({ MAX_CONCURRENT_JOBS: '-1' })).toThrow(ConfigError);
  });
});
