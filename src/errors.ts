import { fmt, msg } from './lib/error-messages.js';

export type ErrorType =
  | 'BAD_INPUT'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'UNPROCESSABLE'
  | 'ENCODER_UNAVAILABLE'
  | 'ENCODER_FAILED'
  | 'INTERNAL';

export interface ApiError {
  error: {
    type: ErrorType;
    message: string;
    hint?: string;
    fields?: Record<string, unknown>;
  };
}

export function errorResponse(type: ErrorType, message: string, hint?: string, fields?: Record<string, unknown>): ApiError {
  return { error: { type, message, hint, fields } };
}

export function errorTypeToStatus(type: ErrorType): number {
  switch (type) {
    case 'BAD_INPUT': return 400;
    case 'NOT_FOUND': return 404;
    case 'CONFLICT': return 409;
    case 'UNPROCESSABLE': return 422;
    case 'ENCODER_UNAVAILABLE': return 503;
    case 'ENCODER_FAILED':
    case 'INTERNAL':
    default: return 500;
  }
}

export interface EngineErrorOptions {
  details?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Base class for every error the engine raises on purpose. `type` is the
 * public taxonomy code; `code` names the concrete failure.
 */
export abstract class EngineError extends Error {
  abstract readonly type: ErrorType;
  readonly details?: Record<string, unknown>;

  constructor(message: string, options: EngineErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.details = options.details;
  }

  get code(): string {
    return this.name;
  }

  toJSON() {
    return {
      type: this.type,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/** Keying parameters out of range or inconsistent with the asset. */
export class InvalidParameterError extends EngineError {
  readonly type = 'BAD_INPUT' as const;
}

export class AssetNotFoundError extends EngineError {
  readonly type = 'NOT_FOUND' as const;

  constructor(readonly assetId: string) {
    super(msg('ASSET_NOT_FOUND'), { details: { assetId } });
  }
}

export class JobNotFoundError extends EngineError {
  readonly type = 'NOT_FOUND' as const;

  constructor(readonly jobId: string) {
    super(msg('JOB_NOT_FOUND'), { details: { jobId } });
  }
}

export class JobNotReadyError extends EngineError {
  readonly type = 'CONFLICT' as const;

  constructor(readonly jobId: string, readonly status: string) {
    super(fmt('JOB_NOT_READY', { status }), { details: { jobId, status } });
  }
}

export class OutputMissingError extends EngineError {
  readonly type = 'NOT_FOUND' as const;

  constructor(readonly jobId: string, options: { cause?: unknown } = {}) {
    super(msg('OUTPUT_MISSING'), { details: { jobId }, cause: options.cause });
  }
}

export class InsufficientSampleError extends EngineError {
  readonly type = 'UNPROCESSABLE' as const;

  constructor(readonly count: number, readonly minimum: number) {
    super(fmt('INSUFFICIENT_SAMPLES', { count, min: minimum }), { details: { count, minimum } });
  }
}

/** The encoder binary could not be started at all. */
export class EncoderLaunchError extends EngineError {
  readonly type = 'ENCODER_UNAVAILABLE' as const;
}

/** The encoder ran and exited unsuccessfully. `logTail` holds its last lines. */
export class EncoderRuntimeError extends EngineError {
  readonly type = 'ENCODER_FAILED' as const;

  constructor(message: string, readonly exitCode: number | null, readonly logTail: string[] = []) {
    super(message, { details: { exitCode, logTail } });
  }
}

// Logged, never thrown to callers: the job still ends `canceled`.
export class CancellationError extends EngineError {
  readonly type = 'INTERNAL' as const;
}

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Maps any thrown value onto the public `{ error: {...} }` shape plus status. */
export function toApiError(err: unknown): { statusCode: number; body: ApiError } {
  if (isEngineError(err)) {
    const fields = err instanceof InvalidParameterError ? err.details : undefined;
    return {
      statusCode: errorTypeToStatus(err.type),
      body: errorResponse(err.type, err.message, undefined, fields),
    };
  }
  return {
    statusCode: errorTypeToStatus('INTERNAL'),
    body: errorResponse('INTERNAL', msg('INTERNAL_UNEXPECTED')),
  };
}
