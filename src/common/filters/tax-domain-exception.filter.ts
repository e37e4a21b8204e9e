import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import { Request, Response } from 'express';
import {
  InsufficientLotsError,
  InvalidRecordError,
  RateNotFoundError,
  TaxDomainError,
} from '../errors/tax-domain.errors';
import { HttpExceptionResponse } from '../interfaces/http-exception.interface';

/** Maps data-correctness errors to HTTP responses carrying the offending record */
@Catch(TaxDomainError)
export class TaxDomainExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(TaxDomainExceptionFilter.name);

  catch(exception: TaxDomainError, host: ArgumentsHost): void {
    const http = host.switchToHttp();
    const response = http.getResponse<Response>();
    const request = http.getRequest<Request>();

    const statusCode = statusFor(exception);
    this.logger.warn(`${request.method} ${request.url} -> ${statusCode} ${exception.code}: ${exception.message}`);

    const body: HttpExceptionResponse = {
      statusCode,
      message: exception.message,
      error: exception.code,
      details: exception.details,
      timestamp: new Date().toISOString(),
      path: request.url,
    };
    response.status(statusCode).json(body);
  }
}

export function statusFor(exception: TaxDomainError): HttpStatus {
  if (exception instanceof InvalidRecordError) {
    return HttpStatus.BAD_REQUEST;
  }
  if (exception instanceof InsufficientLotsError || exception instanceof RateNotFoundError) {
    return HttpStatus.UNPROCESSABLE_ENTITY;
  }
  return HttpStatus.INTERNAL_SERVER_ERROR;
}
