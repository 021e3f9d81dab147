import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { ConversionError } from '../errors/conversion.error.js';

interface ErrorResponse {
  statusCode: number;
  timestamp: string;
  path: string;
  method: string;
  message: string;
  error?: string;
}

interface HttpExceptionResponse {
  message?: string | string[];
  error?: string;
}

interface HttpResponse {
  status: (code: number) => {
    json: (body: unknown) => void;
  };
}

interface HttpRequest {
  url: string;
  method: string;
}

/**
 * Status set by errors raised outside Nest's own exceptions, such as
 * body-parser's 400 for malformed JSON and 413 for an oversized body.
 */
function statusOf(error: object): number | undefined {
  const status = 'statusCode' in error ? error.statusCode : 'status' in error ? error.status : undefined;
  return typeof status === 'number' && status >= 400 && status < 600 ? status : undefined;
}

function describeHttpException(exception: HttpException): { message: string; error?: string } {
  const response = exception.getResponse();
  if (typeof response === 'string') {
    return { message: response };
  }
  const body = response as HttpExceptionResponse;
  const message = Array.isArray(body.message) ? body.message.join(', ') : (body.message ?? exception.message);
  return body.error === undefined ? { message } : { message, error: body.error };
}

@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<HttpResponse>();
    const request = ctx.getRequest<HttpRequest>();

    let status: number = HttpStatus.INTERNAL_SERVER_ERROR;
    let message = 'Internal server error';
    let error: string | undefined;

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      ({ message, error } = describeHttpException(exception));
    } else if (exception instanceof ConversionError) {
      // Conversion errors are normally reported inside the review itself.
      status = HttpStatus.UNPROCESSABLE_ENTITY;
      message = exception.message;
      error = exception.name;
    } else if (typeof exception === 'object' && exception !== null) {
      status = statusOf(exception) ?? status;
      if ('message' in exception && typeof exception.message === 'string') {
        message = exception.message;
      }
    }

    if (status >= 500) {
      this.logger.error(
        `${request.method} ${request.url} failed: ${message}`,
        exception instanceof Error ? exception.stack : undefined,
      );
    }

    const errorResponse: ErrorResponse = {
      statusCode: status,
      timestamp: new Date().toISOString(),
      path: request.url,
      method: request.method,
      message,
    };
    if (error !== undefined) {
      errorResponse.error = error;
    }

    response.status(status).json(errorResponse);
  }
}
