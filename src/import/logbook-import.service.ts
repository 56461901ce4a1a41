import { Injectable, Logger } from '@nestjs/common';
import { Mutex } from 'async-mutex';
import { readFile } from 'fs/promises';
import { AuditLoggerService } from '../common/services/audit-logger.service';
import { LogbookStore } from '../logbook/logbook.store';
import { ImportDocumentError } from './errors';
import { TableDispatcherService } from './table-dispatcher.service';
import { DispatchResult, emptySummary, ImportSummary } from './types';
import { errorMessage } from '../common/utils/error-message';

@Injectable()
export class LogbookImportService {
  private readonly logger = new Logger(LogbookImportService.name);

  private readonly mutex = new Mutex();

  constructor(
    private readonly dispatcher: TableDispatcherService,
    private readonly store: LogbookStore,
    private readonly auditLogger: AuditLoggerService,
  ) {}

  async importFile(path: string): Promise<ImportSummary> {
    let contents: string;
    try {
      contents = await readFile(path, 'utf-8');
    } catch (err) {
      throw new ImportDocumentError(
        `Cannot read import document ${path}: ${errorMessage(err)}`,
        err,
      );
    }
    this.logger.log(`Opened import document: ${path}`);

    let document: unknown;
    try {
      document = JSON.parse(contents);
    } catch (err) {
      throw new ImportDocumentError(
        `Import document ${path} is not valid JSON: ${errorMessage(err)}`,
        err,
      );
    }

    return this.importDocument(document, path);
  }

  /**
   * Reconciles every record of a backup document, in document order. Record
   * problems are reported and skipped; a record without a table tag aborts
   * the run, leaving earlier records committed.
   */
  async importDocument(
    document: unknown,
    source = 'request body',
  ): Promise<ImportSummary> {
    if (!Array.isArray(document)) {
      throw new ImportDocumentError('Import document must be a JSON array');
    }
    const records: unknown[] = document;

    const release = await this.mutex.acquire();
    try {
      const summary = emptySummary();

      for (const [index, record] of records.entries()) {
        let result: DispatchResult;
        try {
          result = await this.dispatcher.dispatch(record, index, this.store);
        } catch (err) {
          this.auditLogger.logImportAborted(source, summary, errorMessage(err));
          throw err;
        }
        this.tally(summary, result);
        this.auditLogger.logRecordOutcome(result);
      }

      this.logger.log(
        `Imported ${summary.total} records from ${source}: ` +
          `${summary.created} created, ${summary.updated} updated, ` +
          `${summary.skipped} skipped, ${summary.unknown} unknown table, ` +
          `${summary.failed} failed, ${summary.linked} linked`,
      );
      this.auditLogger.logImportRun(source, summary);

      return summary;
    } finally {
      release();
    }
  }

  private tally(summary: ImportSummary, result: DispatchResult) {
    summary.total += 1;
    summary[result.status] += 1;
    if ('linked' in result && result.linked) {
      summary.linked += 1;
    }
  }
}
