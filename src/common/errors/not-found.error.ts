export type NotFoundKind = 'region' | 'grid' | 'category';

/**
 * Unknown region, grid or category. Surfaced to the caller as-is.
 */
export class NotFoundError extends Error {
  readonly kind: NotFoundKind;
  readonly identifier: string;

  constructor(kind: NotFoundKind, identifier: string) {
    super(`Unknown ${kind} '${identifier}'`);
    this.name = 'NotFoundError';
    this.kind = kind;
    this.identifier = identifier;
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}
