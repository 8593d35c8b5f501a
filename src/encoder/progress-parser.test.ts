import { describe, it, expect } from 'vitest';
import { isProgressLine, parseOutTimeSeconds, ProgressParser } from './progress-parser.js';

describe('isProgressLine', () => {
  it.each(['frame=12', 'stream_0_0_q=28.0', 'out_time=00:00:01.000000', 'speed=N/A', 'progress=end'])(
    'recognises %j',
    (line) => {
      expect(isProgressLine(line)).toBe(true);
    }
  );

  it.each(['Conversion failed!', 'Error while filtering: Invalid argument', 'color=0x00ff00', '=5', ''])(
    'treats %j as a diagnostic',
    (line) => {
      expect(isProgressLine(line)).toBe(false);
    }
  );
});

describe('parseOutTimeSeconds', () => {
  it('reads microseconds from out_time_us and out_time_ms', () => {
    expect(parseOutTimeSeconds('out_time_us=2500000')).toBe(2.5);
    expect(parseOutTimeSeconds('out_time_ms=2500000')).toBe(2.5);
  });

  it('reads an HH:MM:SS.micro timecode', () => {
    expect(parseOutTimeSeconds('out_time=00:01:02.500000')).toBe(62.5);
  });

  it.each(['out_time=N/A', 'out_time_us=N/A', 'frame=10', 'progress=end', 'speed=1.01x', '', '=5'])(
    'ignores %j',
    (line) => {
      expect(parseOutTimeSeconds(line)).toBeUndefined();
    }
  );
});

describe('ProgressParser', () => {
  it('publishes only forward movement', () => {
    const parser = new ProgressParser(10);

    expect(parser.feed('out_time_us=1000000')).toBe(0.1);
    expect(parser.feed('out_time_us=1000000')).toBeUndefined();
    expect(parser.feed('out_time_us=500000')).toBeUndefined();
    expect(parser.feed('frame=42')).toBeUndefined();
    expect(parser.feed('out_time=00:00:05.000000')).toBe(0.5);
    expect(parser.current).toBe(0.5);
    expect(parser.lastOutTimeSeconds).toBe(5);
  });

  it('caps progress at 1 when the output runs past the probed duration', () => {
    const parser = new ProgressParser(10);
    expect(parser.feed('out_time_us=20000000')).toBe(1);
    expect(parser.feed('out_time_us=30000000')).toBeUndefined();
    expect(parser.current).toBe(1);
  });

  it('reports nothing without a duration', () => {
    expect(new ProgressParser().feed('out_time_us=1000000')).toBeUndefined();
    expect(new ProgressParser(0).feed('out_time_us=1000000')).toBeUndefined();
  });
});
