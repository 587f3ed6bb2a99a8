/**
 * Custom Error Classes
 */

import type { PipelineStage } from '../stateMachine.js';

/**
 * Base error class for all subburn errors
 */
export class SubburnError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SubburnError';
    this.code = code;
    this.details = details;

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Prober unavailable, failed, or produced output that could not be understood
 */
export class ProbeError extends SubburnError {
  constructor(filePath: string, message: string, details?: Record<string, unknown>) {
    super(
      `Probe failed for ${filePath}: ${message}`,
      'PROBE_ERROR',
      { filePath, ...details }
    );
    this.name = 'ProbeError';
  }
}

/**
 * Subtitle stream could not be extracted to a text subtitle file
 */
export class ExtractError extends SubburnError {
  constructor(
    filePath: string,
    subtitleIndex: number,
    message: string,
    details?: Record<string, unknown>,
    code: string = 'EXTRACT_ERROR'
  ) {
    super(
      `Subtitle extraction failed for ${filePath} (track ${subtitleIndex}): ${message}`,
      code,
      { filePath, subtitleIndex, ...details }
    );
    this.name = 'ExtractError';
  }
}

/**
 * Image-based subtitle codec (PGS, VobSub...) that cannot become text
 */
export class UnsupportedSubtitleFormatError extends ExtractError {
  public readonly codecName: string;

  constructor(filePath: string, subtitleIndex: number, codecName: string) {
    super(
      filePath,
      subtitleIndex,
      `bitmap subtitle codec ${codecName} cannot be converted to text`,
      { codecName },
      'UNSUPPORTED_SUBTITLE_FORMAT'
    );
    this.name = 'UnsupportedSubtitleFormatError';
    this.codecName = codecName;
  }
}

/**
 * Subtitle text that cannot be reformatted
 */
export class TransformError extends SubburnError {
  constructor(filePath: string, message: string) {
    super(
      `Subtitle transform failed for ${filePath}: ${message}`,
      'TRANSFORM_ERROR',
      { filePath }
    );
    this.name = 'TransformError';
  }
}

/**
 * Every encode tier failed
 */
export class EncodeFailedError extends SubburnError {
  constructor(
    inputPath: string,
    attempts: ReadonlyArray<{ strategy: string; error: string }>
  ) {
    super(
      `Encoding failed for ${inputPath} after ${attempts.length} attempt(s)`,
      'ENCODE_FAILED',
      { inputPath, attempts: attempts.map(a => ({ ...a, error: a.error.substring(0, 1000) })) }
    );
    this.name = 'EncodeFailedError';
  }
}

/**
 * User-initiated cancellation. Not a failure, but unwinds like one.
 */
export class CancelledError extends SubburnError {
  constructor(stage?: PipelineStage) {
    super(
      stage ? `Cancelled during ${stage}` : 'Cancelled',
      'CANCELLED',
      stage ? { stage } : undefined
    );
    this.name = 'CancelledError';
  }
}

/**
 * State transition error for invalid stage changes
 */
export class StateTransitionError extends SubburnError {
  constructor(
    runId: string,
    fromState: PipelineStage,
    toState: PipelineStage,
    message?: string
  ) {
    super(
      message ?? `Invalid state transition from ${fromState} to ${toState}`,
      'STATE_TRANSITION_ERROR',
      { runId, fromState, toState }
    );
    this.name = 'StateTransitionError';
  }
}

/**
 * Input path that is missing or not an MKV file
 */
export class InvalidInputError extends SubburnError {
  constructor(path: string, message: string) {
    super(`${path}: ${message}`, 'INVALID_INPUT', { path });
    this.name = 'InvalidInputError';
  }
}

/**
 * Track index outside the available range
 */
export class InvalidSelectionError extends SubburnError {
  constructor(kind: string, index: number, available: number) {
    super(
      `No ${kind} track ${index}: file has ${available} ${kind} track(s)`,
      'INVALID_SELECTION',
      { kind, index, available }
    );
    this.name = 'InvalidSelectionError';
  }
}

/**
 * Settings that cannot be read or written
 */
export class ConfigError extends SubburnError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

/**
 * Normalize anything thrown into a SubburnError
 */
export function toSubburnError(error: unknown): SubburnError {
  if (error instanceof SubburnError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new SubburnError(message, 'UNEXPECTED_ERROR');
}
