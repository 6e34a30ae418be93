/**
 * A grid cell set is not a true partition of its region (gap or overlap).
 */
export class DataIntegrityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DataIntegrityError';
    Object.setPrototypeOf(this, DataIntegrityError.prototype);
  }
}
