export * from './configuration.error';
export * from './not-found.error';
export * from './upstream-unavailable.error';
export * from './contextual-evaluator.error';
export * from './data-integrity.error';
export * from './request-aborted.error';
