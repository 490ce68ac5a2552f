import { ArgumentsHost, Catch, ExceptionFilter, Logger } from '@nestjs/common';
import { Response } from 'express';
import { throwError } from 'rxjs';
import { InvalidThresholdError, RecognitionError } from '../shared/errors';

@Catch(RecognitionError)
export class RecognitionExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger('Registration');

  catch(exception: RecognitionError, host: ArgumentsHost) {
    const status = exception instanceof InvalidThresholdError ? 400 : 500;
    if (status === 500) this.logger.error(exception.message, exception.stack);

    const body = {
      status: 'error',
      code: exception.code,
      message: exception.message,
      retryable: exception.retryable,
    };

    if (host.getType() === 'rpc') return throwError(() => body);
    host.switchToHttp().getResponse<Response>().status(status).json(body);
  }
}
