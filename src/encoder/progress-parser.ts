const parseNumber = (value?: string) => {
  if (!value) {
    return undefined;
  }
  const parsed = Number.parseFloat(value);
  return Number.isFinite(parsed) ? parsed : undefined;
};

const parseTimecode = (value?: string) => {
  if (!value) {
    return undefined;
  }
  const parts = value.trim().split(':');
  if (parts.length !== 3) {
    return undefined;
  }
  const [hours, minutes, seconds] = parts.map(parseNumber);
  if (hours === undefined || minutes === undefined || seconds === undefined) {
    return undefined;
  }
  return hours * 3600 + minutes * 60 + seconds;
};

const PROGRESS_KEYS = new Set([
  'frame',
  'fps',
  'bitrate',
  'total_size',
  'out_time_us',
  'out_time_ms',
  'out_time',
  'dup_frames',
  'drop_frames',
  'speed',
  'progress',
]);

/** True for the key=value lines `-progress` writes, as opposed to diagnostics. */
export function isProgressLine(line: string): boolean {
  const eq = line.indexOf('=');
  if (eq <= 0) {
    return false;
  }
  const key = line.slice(0, eq).trim();
  return PROGRESS_KEYS.has(key) || /^stream_\d+_\d+_q$/.test(key);
}

/**
 * Output position, in seconds, carried by one progress line, if any.
 * ffmpeg reports microseconds under both `out_time_us` and `out_time_ms`.
 */
export function parseOutTimeSeconds(line: string): number | undefined {
  const eq = line.indexOf('=');
  if (eq <= 0) {
    return undefined;
  }
  const key = line.slice(0, eq).trim();
  const value = line.slice(eq + 1).trim();

  switch (key) {
    case 'out_time_us':
    case 'out_time_ms': {
      const micros = parseNumber(value);
      return micros !== undefined && micros >= 0 ? micros / 1_000_000 : undefined;
    }
    case 'out_time': {
      const seconds = parseTimecode(value);
      return seconds !== undefined && seconds >= 0 ? seconds : undefined;
    }
    default:
      return undefined;
  }
}

/**
 * Turns a stream of encoder lines into progress in [0, 1]. Holds only the
 * furthest output time seen, so published values never go backwards.
 */
export class ProgressParser {
  private outTimeSeconds = 0;
  private progress = 0;

  constructor(private readonly durationSeconds?: number) {}

  get current(): number {
    return this.progress;
  }

  get lastOutTimeSeconds(): number {
    return this.outTimeSeconds;
  }

  /** Returns the new progress when the line moved it forward, otherwise undefined. */
  feed(line: string): number | undefined {
    if (!this.durationSeconds || this.durationSeconds <= 0) {
      return undefined;
    }
    const outTime = parseOutTimeSeconds(line);
    if (outTime === undefined || outTime <= this.outTimeSeconds) {
      return undefined;
    }
    this.outTimeSeconds = outTime;

    const next = Math.min(1, outTime / this.durationSeconds);
    if (next <= this.progress) {
      return undefined;
    }
    this.progress = next;
    return next;
  }
}
