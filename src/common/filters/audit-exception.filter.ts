import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Injectable,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { ImportDocumentError, MissingTableError } from '../../import/errors';
import { AuditLoggerService, RequestContext } from '../services/audit-logger.service';

@Injectable()
@Catch()
export class AuditExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(AuditExceptionFilter.name);

  constructor(private readonly auditLogger: AuditLoggerService) {}

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const context: RequestContext = {
      ip: request.ip || request.socket.remoteAddress || 'unknown',
      userAgent: request.headers['user-agent'] || 'unknown',
      endpoint: request.url,
      method: request.method,
    };

    let status = HttpStatus.INTERNAL_SERVER_ERROR;
    let body: string | object = 'Internal server error';

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      body = exception.getResponse();
    } else if (
      exception instanceof ImportDocumentError ||
      exception instanceof MissingTableError
    ) {
      status = HttpStatus.BAD_REQUEST;
      body = exception.message;
    } else {
      this.logger.error(
        `Unhandled error on ${context.method} ${context.endpoint}`,
        exception instanceof Error ? exception.stack : String(exception),
      );
    }

    // Extract validation errors
    let errors: string[] = [];
    if (typeof body === 'object' && 'message' in body) {
      if (Array.isArray(body.message)) {
        errors = body.message.map(String);
      } else if (typeof body.message === 'string') {
        errors = [body.message];
      }
    }

    if (status === HttpStatus.BAD_REQUEST && errors.length > 0) {
      this.auditLogger.logValidationError(context, errors);
    } else if (status === HttpStatus.TOO_MANY_REQUESTS) {
      this.auditLogger.logRateLimitExceeded(context);
    } else if (status !== HttpStatus.NOT_FOUND) {
      this.auditLogger.logRequestFailure(
        context,
        status,
        typeof body === 'string' ? body : JSON.stringify(body),
      );
    }

    response.status(status).json(
      typeof body === 'object'
        ? body
        : {
            statusCode: status,
            message: body,
            timestamp: new Date().toISOString(),
            path: context.endpoint,
          },
    );
  }
}
