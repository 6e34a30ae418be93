import { HttpStatus } from '@nestjs/common';
import {
  ConfigurationError,
  ContextualEvaluatorError,
  DataIntegrityError,
  NotFoundError,
  RequestAbortedError,
  UpstreamUnavailableError,
} from '../errors';
import { DomainError, toHttpException } from './domain-exception.filter';

describe('toHttpException', () => {
  it.each<[string, DomainError, HttpStatus]>([
    ['unknown region', new NotFoundError('region', 'atlantis'), HttpStatus.NOT_FOUND],
    ['cancelled request', new RequestAbortedError('Combining'), HttpStatus.REQUEST_TIMEOUT],
    [
      'unreachable source',
      new UpstreamUnavailableError('postgres-businesses', 3),
      HttpStatus.SERVICE_UNAVAILABLE,
    ],
    [
      'contextual failure',
      new ContextualEvaluatorError('timed out', true),
      HttpStatus.SERVICE_UNAVAILABLE,
    ],
    ['bad configuration', new ConfigurationError('weights'), HttpStatus.INTERNAL_SERVER_ERROR],
    ['broken partition', new DataIntegrityError('gap'), HttpStatus.INTERNAL_SERVER_ERROR],
  ])('should map %s to its status', (_, error, status) => {
    expect(toHttpException(error).getStatus()).toBe(status);
  });

  it('should keep the domain message', () => {
    const exception = toHttpException(new NotFoundError('grid', 'test-town-009-009'));

    expect(exception.getResponse()).toEqual({
      statusCode: 404,
      error: 'Not Found',
      message: "Unknown grid 'test-town-009-009'",
    });
  });
});
