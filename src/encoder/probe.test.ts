import { describe, it, expect } from 'vitest';
import { EncoderRuntimeError } from '../errors.js';
import { extractImageMetadata, extractVideoMetadata, parseProbeJson } from './probe.js';

describe('extractVideoMetadata', () => {
  it('reads size, duration, frame rate and audio presence', () => {
    const payload = parseProbeJson(JSON.stringify({
      format: { duration: '10.500000' },
      streams: [
        { codec_type: 'video', width: 1920, height: 1080, r_frame_rate: '30000/1001', duration: '10.4' },
        { codec_type: 'audio' },
      ],
    }));

    expect(extractVideoMetadata(payload)).toEqual({
      width: 1920,
      height: 1080,
      durationSeconds: 10.5,
      fps: 29.97,
      hasAudio: true,
    });
  });

  it('falls back to stream duration and average frame rate', () => {
    const metadata = extractVideoMetadata({
      format: {},
      streams: [{ codec_type: 'video', width: 640, height: 360, r_frame_rate: '0/0', avg_frame_rate: '25/1', duration: '4.0' }],
    });

    expect(metadata.durationSeconds).toBe(4);
    expect(metadata.fps).toBe(25);
    expect(metadata.hasAudio).toBe(false);
  });

  it('assumes 30 fps and zero duration when nothing is reported', () => {
    const metadata = extractVideoMetadata({ streams: [{ codec_type: 'video', width: 2, height: 2 }] });
    expect(metadata.fps).toBe(30);
    expect(metadata.durationSeconds).toBe(0);
  });

  it('fails without a video stream', () => {
    expect(() => extractVideoMetadata({ streams: [{ codec_type: 'audio' }] })).toThrow('No video stream found in file');
  });
});

describe('extractImageMetadata', () => {
  it('reads the picture size', () => {
    expect(extractImageMetadata({ streams: [{ codec_type: 'video', width: 800, height: 600 }] })).toEqual({ width: 800, height: 600 });
  });
});

describe('parseProbeJson', () => {
  it.each(['not json', 'null', '42'])('rejects %j', (raw) => {
    expect(() => parseProbeJson(raw)).toThrow(EncoderRuntimeError);
  });
});
