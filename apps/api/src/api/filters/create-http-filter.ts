import { ExceptionFilter, Catch, ArgumentsHost, HttpStatus, Logger } from '@nestjs/common';
import type { Type } from '@nestjs/common';
import type { FastifyReply, FastifyRequest } from 'fastify';

/**
 * Builds a filter that answers every exception extending one of `exceptions`
 * with `status` and the exception message. Nothing else about the error
 * reaches the client.
 */
export function createHttpFilter(
  status: HttpStatus,
  ...exceptions: Type<Error>[]
): Type<ExceptionFilter> {
  @Catch(...exceptions)
  class HttpExceptionFilter implements ExceptionFilter {
    private readonly logger = new Logger(`HttpExceptionFilter(${status})`);

    catch(exception: Error, host: ArgumentsHost) {
      const http = host.switchToHttp();
      const request = http.getRequest<FastifyRequest>();
      const response = http.getResponse<FastifyReply>();

      this.logger.debug({ method: request.method, url: request.url, error: exception.name }, exception.message);
      response.status(status).send({
        statusCode: status,
        message: exception.message,
      });
    }
  }
  return HttpExceptionFilter;
}
