import { describe, it, expect } from 'vitest';
import { ProgressChannel, overallProgress, type StageEvent } from '../progressChannel.js';

describe('overallProgress', () => {
  it('should split the run evenly across working stages', () => {
    expect(overallProgress('PROBING', 0)).toBe(0);
    expect(overallProgress('EXTRACTING', 0.5)).toBeCloseTo(0.3);
    expect(overallProgress('ENCODING', 1)).toBe(1);
  });

  it('should clamp the stage fraction', () => {
    expect(overallProgress('STRIPPING', 2)).toBeCloseTo(0.6);
    expect(overallProgress('STRIPPING', -1)).toBeCloseTo(0.4);
  });

  it('should report DONE as complete and other endings as nothing', () => {
    expect(overallProgress('DONE', 0)).toBe(1);
    expect(overallProgress('FAILED', 0.5)).toBeNull();
    expect(overallProgress('SKIPPED', 1)).toBeNull();
  });
});

describe('ProgressChannel', () => {
  it('should stop delivering after unsubscribe', () => {
    const channel = new ProgressChannel();
    const seen: StageEvent[] = [];
    const unsubscribe = channel.onStage(event => seen.push(event));
    const event: StageEvent = { runId: 'r1', inputPath: 'a.mkv', from: 'PROBING', to: 'EXTRACTING' };

    channel.publishStage(event);
    unsubscribe();
    channel.publishStage(event);

    expect(seen).toEqual([event]);
  });
});
