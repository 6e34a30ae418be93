/**
 * The contextual evaluator timed out, failed, or returned something unusable.
 * Callers downgrade to rule-only scoring.
 */
export class ContextualEvaluatorError extends Error {
  readonly timedOut: boolean;

  constructor(message: string, timedOut = false) {
    super(message);
    this.name = 'ContextualEvaluatorError';
    this.timedOut = timedOut;
    Object.setPrototypeOf(this, ContextualEvaluatorError.prototype);
  }
}
