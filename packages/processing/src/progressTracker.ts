/**
 * Encode Progress Tracker
 *
 * Turns ffmpeg `-progress pipe:1` output into a fraction in [0, 1].
 *
 * - Running values are capped at 0.95; 1.0 is only reported by complete()
 * - Values never go down, including across retries of the same encode
 * - When ffmpeg goes quiet for `stallMs`, a fraction is synthesized from
 *   wall-clock time so the bar keeps moving
 */

import { EventEmitter } from 'node:events';
import { parseTimecode } from '@subburn/utils';

export const RUNNING_CAP = 0.95;

export interface ProgressTrackerOptions {
  heartbeatMs?: number;
  stallMs?: number;
  /** Milliseconds since some fixed point */
  clock?: () => number;
}

/**
 * Elapsed output time in seconds from one progress line, or null when the
 * line carries none
 */
export function parseElapsedSeconds(line: string): number | null {
  const trimmed = line.trim();

  const keyValue = trimmed.match(/^(\w+)=(.*)$/);
  if (keyValue) {
    const [, key, rawValue = ''] = keyValue;
    const value = rawValue.trim();
    if (value === 'N/A' || value.startsWith('-')) return null;

    switch (key) {
      case 'out_time':
        return timecodeSeconds(value);
      // Both are microseconds despite the name
      case 'out_time_us':
      case 'out_time_ms': {
        const micros = Number(value);
        return Number.isFinite(micros) ? micros / 1_000_000 : null;
      }
      default:
        break;
    }
  }

  // frame=  100 fps= 25 ... time=00:00:04.00 bitrate=...
  const legacy = trimmed.match(/time=\s*(\S+)/);
  if (legacy?.[1] && legacy[1] !== 'N/A' && !legacy[1].startsWith('-')) {
    return timecodeSeconds(legacy[1]);
  }

  return null;
}

function timecodeSeconds(value: string): number | null {
  try {
    return parseTimecode(value) / 1000;
  } catch {
    return null;
  }
}

export class EncodeProgressTracker extends EventEmitter {
  private readonly durationSeconds: number;
  private readonly heartbeatMs: number;
  private readonly stallMs: number;
  private readonly clock: () => number;

  private fraction = 0;
  private startedAt: number | null = null;
  private lastLineAt = 0;
  private timer: NodeJS.Timeout | null = null;

  constructor(durationSeconds: number, options: ProgressTrackerOptions = {}) {
    super();
    this.durationSeconds = durationSeconds > 0 ? durationSeconds : 0;
    this.heartbeatMs = options.heartbeatMs ?? 500;
    this.stallMs = options.stallMs ?? 2000;
    this.clock = options.clock ?? Date.now;
  }

  getProgress(): number {
    return this.fraction;
  }

  /**
   * Start the stall heartbeat. Calling it again after stop() resumes with
   * the original wall-clock origin.
   */
  start(): void {
    const now = this.clock();
    if (this.startedAt === null) this.startedAt = now;
    this.lastLineAt = now;

    if (!this.timer) {
      this.timer = setInterval(() => this.checkStall(), this.heartbeatMs);
      this.timer.unref();
    }
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /**
   * Feed one line of ffmpeg output
   */
  handleLine(line: string): void {
    const elapsed = parseElapsedSeconds(line);
    if (elapsed === null) return;

    this.lastLineAt = this.clock();
    if (this.durationSeconds === 0) return;

    this.update(Math.min(RUNNING_CAP, elapsed / this.durationSeconds));
  }

  /**
   * Synthesize progress if nothing arrived for stallMs
   */
  checkStall(): void {
    if (this.startedAt === null) return;

    const now = this.clock();
    if (now - this.lastLineAt < this.stallMs) return;

    const wallSeconds = (now - this.startedAt) / 1000;
    const synthetic = this.durationSeconds > 0
      ? Math.min(RUNNING_CAP, wallSeconds / (2 * this.durationSeconds))
      : RUNNING_CAP * (1 - Math.exp(-wallSeconds / 60));

    this.update(synthetic);
  }

  /**
   * Encoder exited successfully
   */
  complete(): void {
    this.stop();
    this.fraction = 1;
    this.emit('progress', 1);
  }

  private update(candidate: number): void {
    const next = Math.max(0, Math.min(RUNNING_CAP, candidate));
    if (next <= this.fraction) return;
    this.fraction = next;
    this.emit('progress', next);
  }
}
