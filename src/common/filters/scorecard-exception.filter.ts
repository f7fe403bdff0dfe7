import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import type { Response } from 'express';
import { ScorecardError } from '../errors/scorecard.error';

@Catch(ScorecardError)
export class ScorecardExceptionFilter implements ExceptionFilter<ScorecardError> {
  private readonly logger = new Logger(ScorecardExceptionFilter.name);

  catch(exception: ScorecardError, host: ArgumentsHost): void {
    this.logger.error(`${exception.code}: ${exception.message}`, exception.stack);

    const res = host.switchToHttp().getResponse<Response>();
    res.status(HttpStatus.INTERNAL_SERVER_ERROR).json({
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      error: exception.code,
      message: exception.message,
    });
  }
}
