/**
 * A business or social data source failed after its own retries ran out.
 */
export class UpstreamUnavailableError extends Error {
  readonly source: string;
  readonly attempts: number;

  constructor(source: string, attempts: number, cause?: string) {
    super(
      `Source '${source}' unavailable after ${attempts} attempt(s)${cause ? `: ${cause}` : ''}`,
    );
    this.name = 'UpstreamUnavailableError';
    this.source = source;
    this.attempts = attempts;
    Object.setPrototypeOf(this, UpstreamUnavailableError.prototype);
  }
}
