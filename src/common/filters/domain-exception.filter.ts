import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  InternalServerErrorException,
  Logger,
  NotFoundException,
  RequestTimeoutException,
  ServiceUnavailableException,
} from '@nestjs/common';
import { Response } from 'express';
import {
  ConfigurationError,
  ContextualEvaluatorError,
  DataIntegrityError,
  NotFoundError,
  RequestAbortedError,
  UpstreamUnavailableError,
} from '../errors';

export type DomainError =
  | ConfigurationError
  | ContextualEvaluatorError
  | DataIntegrityError
  | NotFoundError
  | RequestAbortedError
  | UpstreamUnavailableError;

/**
 * Maps domain errors that reach a controller to their HTTP counterparts.
 */
export function toHttpException(error: DomainError): HttpException {
  if (error instanceof NotFoundError) {
    return new NotFoundException(error.message);
  }
  if (error instanceof RequestAbortedError) {
    return new RequestTimeoutException(error.message);
  }
  if (error instanceof UpstreamUnavailableError || error instanceof ContextualEvaluatorError) {
    return new ServiceUnavailableException(error.message);
  }
  return new InternalServerErrorException(error.message);
}

@Catch(
  ConfigurationError,
  ContextualEvaluatorError,
  DataIntegrityError,
  NotFoundError,
  RequestAbortedError,
  UpstreamUnavailableError,
)
export class DomainExceptionFilter implements ExceptionFilter<DomainError> {
  private readonly logger = new Logger(DomainExceptionFilter.name);

  catch(error: DomainError, host: ArgumentsHost): void {
    const exception = toHttpException(error);
    const status = exception.getStatus();

    if (status >= 500) {
      this.logger.error(`${error.name}: ${error.message}`, error.stack);
    } else {
      this.logger.warn(`${error.name}: ${error.message}`);
    }

    const response = host.switchToHttp().getResponse<Response>();
    // The client may already be gone after a cancelled request
    if (response.headersSent || response.writableEnded) {
      return;
    }
    response.status(status).json(exception.getResponse());
  }
}
