/**
 * Progress Channel
 *
 * Single publish point for pipeline runs. Renderers subscribe here instead of
 * threading callbacks through every stage.
 */

import { EventEmitter } from 'node:events';
import { WORKING_STAGES, stageIndex, type PipelineStage } from '@subburn/core';

export interface StageEvent {
  runId: string;
  inputPath: string;
  from: PipelineStage;
  to: PipelineStage;
  reason?: string;
}

export interface ProgressEvent {
  runId: string;
  inputPath: string;
  stage: PipelineStage;
  /** Fraction of the current stage, 0-1 */
  stageFraction: number;
  /** Fraction of the whole run, 0-1 */
  overall: number;
}

/**
 * (stageIndex + stageFraction) / number of working stages; terminal stages
 * other than DONE report no overall value
 */
export function overallProgress(stage: PipelineStage, stageFraction: number): number | null {
  if (stage === 'DONE') return 1;
  const index = stageIndex(stage);
  if (index === null) return null;
  const fraction = Math.max(0, Math.min(1, stageFraction));
  return (index + fraction) / WORKING_STAGES.length;
}

export class ProgressChannel extends EventEmitter {
  publishStage(event: StageEvent): void {
    this.emit('stage', event);
  }

  publishProgress(event: ProgressEvent): void {
    this.emit('progress', event);
  }

  onStage(listener: (event: StageEvent) => void): () => void {
    this.on('stage', listener);
    return () => this.off('stage', listener);
  }

  onProgress(listener: (event: ProgressEvent) => void): () => void {
    this.on('progress', listener);
    return () => this.off('progress', listener);
  }
}
