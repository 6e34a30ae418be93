import { performance } from 'perf_hooks';
import { RequestAbortedError } from '../common/errors';
import { ProcessingMode } from '../scoring/interfaces/score.interface';
import { PipelineStage, PipelineTiming } from './interfaces/recommendation.interface';

const TRANSITIONS: Readonly<Record<PipelineStage, readonly PipelineStage[]>> = {
  Received: ['Aggregating'],
  // Point queries skip normalization
  Aggregating: ['Normalizing', 'RuleScoring'],
  Normalizing: ['RuleScoring'],
  RuleScoring: ['ContextualPending', 'Combining'],
  ContextualPending: ['Combining'],
  Combining: ['Explaining'],
  Explaining: ['Done'],
  Done: [],
};

/**
 * Per-request stage machine. Records wall-clock time per stage and stops the
 * request at the next stage boundary once its signal is aborted.
 */
export class PipelineRun {
  private current: PipelineStage = 'Received';
  private readonly startedAt: number;
  private stageStartedAt: number;
  private readonly stages: Partial<Record<PipelineStage, number>> = {};

  constructor(
    readonly mode: ProcessingMode,
    private readonly signal?: AbortSignal,
    private readonly clock: () => number = () => performance.now(),
  ) {
    this.startedAt = this.clock();
    this.stageStartedAt = this.startedAt;
  }

  get stage(): PipelineStage {
    return this.current;
  }

  enter(next: PipelineStage): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Invalid pipeline transition ${this.current} -> ${next}`);
    }
    if (next === 'ContextualPending' && this.mode === 'fast') {
      throw new Error('Fast mode never waits on the contextual evaluator');
    }
    this.checkpoint();

    const now = this.clock();
    this.stages[this.current] = round2((this.stages[this.current] ?? 0) + now - this.stageStartedAt);
    this.current = next;
    this.stageStartedAt = now;
  }

  /**
   * Throws RequestAbortedError if the request has been cancelled.
   */
  checkpoint(): void {
    if (this.signal?.aborted) {
      throw new RequestAbortedError(this.current);
    }
  }

  finish(): PipelineTiming {
    this.enter('Done');
    return this.timing();
  }

  timing(): PipelineTiming {
    return { totalMs: round2(this.clock() - this.startedAt), stages: { ...this.stages } };
  }
}

function round2(ms: number): number {
  return Math.round(ms * 100) / 100;
}
