import { Inject, Injectable, Logger } from '@nestjs/common';
import { LogbookStore } from '../logbook/logbook.store';
import { MissingTableError } from './errors';
import { TableImporter } from './importers';
import {
  describeKey,
  DispatchResult,
  isTableName,
  TABLE_NAMES,
  TableName,
} from './types';
import { errorMessage } from '../common/utils/error-message';

export const TABLE_IMPORTER_LIST = Symbol('TABLE_IMPORTER_LIST');

@Injectable()
export class TableDispatcherService {
  private readonly logger = new Logger(TableDispatcherService.name);
  private readonly importers: ReadonlyMap<TableName, TableImporter>;

  constructor(@Inject(TABLE_IMPORTER_LIST) importers: TableImporter[]) {
    const byTable = new Map<TableName, TableImporter>();
    for (const importer of importers) {
      if (byTable.has(importer.table)) {
        throw new Error(`Duplicate importer for table: ${importer.table}`);
      }
      byTable.set(importer.table, importer);
    }

    const missing = TABLE_NAMES.filter((name) => !byTable.has(name));
    if (missing.length > 0) {
      throw new Error(`No importer registered for: ${missing.join(', ')}`);
    }
    this.importers = byTable;
  }

  /**
   * Reads the record's `table` tag, lower-cased. A record without one is a
   * malformed document, not a skippable record.
   */
  classify(record: unknown, index: number): string {
    if (
      typeof record !== 'object' ||
      record === null ||
      !('table' in record) ||
      typeof record.table !== 'string'
    ) {
      throw new MissingTableError(index, describeKey(record));
    }
    return record.table.toLowerCase();
  }

  async dispatch(
    record: unknown,
    index: number,
    store: LogbookStore,
  ): Promise<DispatchResult> {
    const table = this.classify(record, index);
    const key = describeKey(record);

    const importer = isTableName(table) ? this.importers.get(table) : undefined;
    if (!importer) {
      this.logger.warn(`No import method for table: ${table}`);
      return { status: 'unknown', table, key };
    }

    try {
      return await store.transaction((tx) => importer.import(record, tx));
    } catch (err) {
      const reason = errorMessage(err);
      this.logger.error(`Failed to import ${table} record ${key}`, reason);
      return { status: 'failed', table: importer.table, key, reason };
    }
  }
}
