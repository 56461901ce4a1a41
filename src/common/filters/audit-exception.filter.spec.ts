import {
  BadRequestException,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { Test, TestingModule } from '@nestjs/testing';
import { ThrottlerException } from '@nestjs/throttler';
import { ImportDocumentError } from '../../import/errors';
import { mockAuditLogger } from '../../logbook/testing/in-memory-database';
import { AuditLoggerService } from '../services/audit-logger.service';
import { AuditExceptionFilter } from './audit-exception.filter';

describe('AuditExceptionFilter', () => {
  const request = {
    ip: '127.0.0.1',
    socket: {},
    headers: { 'user-agent': 'jest' },
    url: '/logbook/import',
    method: 'POST',
  };
  const context = {
    ip: '127.0.0.1',
    userAgent: 'jest',
    endpoint: '/logbook/import',
    method: 'POST',
  };

  let audit: ReturnType<typeof mockAuditLogger>;
  let filter: AuditExceptionFilter;
  let response: { status: jest.Mock; json: jest.Mock };
  let host: ExecutionContextHost;

  beforeEach(async () => {
    audit = mockAuditLogger();
    const module: TestingModule = await Test.createTestingModule({
      providers: [AuditExceptionFilter, { provide: AuditLoggerService, useValue: audit }],
    }).compile();
    filter = module.get(AuditExceptionFilter);

    response = { status: jest.fn(), json: jest.fn() };
    response.status.mockReturnValue(response);
    host = new ExecutionContextHost([request, response]);
  });

  it('answers 400 for a malformed import document', () => {
    filter.catch(new ImportDocumentError('Import document must be a JSON array'), host);

    expect(response.status).toHaveBeenCalledWith(400);
    expect(response.json).toHaveBeenCalledWith({
      statusCode: 400,
      message: 'Import document must be a JSON array',
      timestamp: expect.any(String),
      path: '/logbook/import',
    });
    expect(audit.logRequestFailure).toHaveBeenCalledWith(
      context,
      400,
      'Import document must be a JSON array',
    );
  });

  it('records validation messages', () => {
    filter.catch(new BadRequestException(['days must be an integer']), host);

    expect(response.status).toHaveBeenCalledWith(400);
    expect(audit.logValidationError).toHaveBeenCalledWith(context, [
      'days must be an integer',
    ]);
  });

  it('records rate limiting', () => {
    filter.catch(new ThrottlerException(), host);

    expect(response.status).toHaveBeenCalledWith(429);
    expect(audit.logRateLimitExceeded).toHaveBeenCalledWith(context);
  });

  it('does not audit not-found responses', () => {
    filter.catch(new NotFoundException(), host);

    expect(response.status).toHaveBeenCalledWith(404);
    expect(audit.logRequestFailure).not.toHaveBeenCalled();
    expect(audit.logValidationError).not.toHaveBeenCalled();
  });

  it('hides unexpected errors behind a 500', () => {
    const error = jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);

    filter.catch(new Error('database is locked'), host);

    expect(response.status).toHaveBeenCalledWith(500);
    expect(audit.logRequestFailure).toHaveBeenCalledWith(context, 500, 'Internal server error');
    expect(error).toHaveBeenCalled();
    error.mockRestore();
  });
});
