export class RequestAbortedError extends Error {
  constructor(stage: string) {
    super(`Request aborted during ${stage}`);
    this.name = 'RequestAbortedError';
    Object.setPrototypeOf(this, RequestAbortedError.prototype);
  }
}
