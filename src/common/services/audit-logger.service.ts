import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { appendFileSync, mkdirSync } from 'fs';
import { join } from 'path';
import { DispatchResult, ImportSummary } from '../../import/types';
import { errorMessage } from '../utils/error-message';

type Severity = 'info' | 'warning' | 'error' | 'critical';

interface AuditLogEvent {
  timestamp?: string;
  type: string;
  severity: Severity;
  ip?: string;
  userAgent?: string;
  endpoint?: string;
  method?: string;
  details?: Record<string, unknown>;
  success?: boolean;
  errorMessage?: string;
}

export interface RequestContext {
  ip: string;
  userAgent: string;
  endpoint: string;
  method: string;
}

@Injectable()
export class AuditLoggerService {
  private readonly logger = new Logger('AUDIT');
  private readonly logPath: string;

  constructor(config: ConfigService) {
    const logDir = config.get<string>('audit.dir') || './database';
    this.logPath = join(logDir, 'audit.log');
    try {
      mkdirSync(logDir, { recursive: true });
    } catch (error) {
      this.logger.error(`Cannot create audit log directory ${logDir}: ${errorMessage(error)}`);
    }
    this.logger.log(`Audit logs will be written to: ${this.logPath}`);
  }

  private writeLog(event: AuditLogEvent) {
    const logEntry = {
      ...event,
      timestamp: event.timestamp || new Date().toISOString(),
    };
    const line = JSON.stringify(logEntry);

    if (event.severity === 'critical' || event.severity === 'error') {
      this.logger.error(line);
    } else if (event.severity === 'warning') {
      this.logger.warn(line);
    } else {
      this.logger.verbose(line);
    }

    try {
      appendFileSync(this.logPath, line + '\n', 'utf-8');
    } catch (error) {
      this.logger.error(`Failed to write audit log to file: ${errorMessage(error)}`);
    }
  }

  logRecordOutcome(result: DispatchResult) {
    switch (result.status) {
      case 'created':
      case 'updated':
        this.writeLog({
          type: result.status === 'created' ? 'RECORD_CREATED' : 'RECORD_UPDATED',
          severity: 'info',
          success: true,
          details: {
            table: result.table,
            key: result.key,
            label: result.label,
            ...(result.linked ? { linked: result.linked } : {}),
          },
        });
        break;
      case 'skipped':
        this.writeLog({
          type: 'RECORD_SKIPPED',
          severity: 'warning',
          success: false,
          errorMessage: result.reason,
          details: { table: result.table, key: result.key },
        });
        break;
      case 'unknown':
        this.writeLog({
          type: 'UNKNOWN_TABLE',
          severity: 'warning',
          success: false,
          details: { table: result.table, key: result.key },
        });
        break;
      case 'failed':
        this.writeLog({
          type: 'RECORD_FAILED',
          severity: 'error',
          success: false,
          errorMessage: result.reason,
          details: { table: result.table, key: result.key },
        });
        break;
    }
  }

  logImportRun(source: string, summary: ImportSummary) {
    this.writeLog({
      type: 'IMPORT_COMPLETED',
      severity: summary.failed > 0 ? 'warning' : 'info',
      success: summary.failed === 0,
      details: { source, ...summary },
    });
  }

  logImportAborted(source: string, summary: ImportSummary, reason: string) {
    this.writeLog({
      type: 'IMPORT_ABORTED',
      severity: 'critical',
      success: false,
      errorMessage: reason,
      details: { source, ...summary },
    });
  }

  logExport(target: string, aircraftRows: number, flightRows: number) {
    this.writeLog({
      type: 'EXPORT_COMPLETED',
      severity: 'info',
      success: true,
      details: { target, aircraftRows, flightRows },
    });
  }

  logValidationError(request: RequestContext, errors: string[]) {
    this.writeLog({
      type: 'VALIDATION_ERROR',
      severity: 'warning',
      ...request,
      success: false,
      details: {
        errors,
        message: 'Invalid input detected',
      },
    });
  }

  logRateLimitExceeded(request: RequestContext) {
    this.writeLog({
      type: 'RATE_LIMIT_EXCEEDED',
      severity: 'warning',
      ...request,
      success: false,
      details: {
        message: 'Rate limit exceeded',
        action: 'Request blocked',
      },
    });
  }

  logRequestFailure(request: RequestContext, status: number, message: string) {
    this.writeLog({
      type: 'REQUEST_FAILED',
      severity: status >= 500 ? 'error' : 'warning',
      ...request,
      success: false,
      errorMessage: message,
      details: { status },
    });
  }
}
