import { Injectable } from '@nestjs/common';
import * as Joi from 'joi';
import { MyQuery } from '../../logbook/entities/my-query.entity';
import { LogbookTransaction } from '../../logbook/logbook.store';
import { count, flag, text } from '../meta-schema';
import { ImportOutcome } from '../types';
import { DecodedRecord, TableImporter } from './table-importer';

export interface MyQueryMeta {
  Name: string;
  mQCode: string;
  QuickView: boolean;
  ShortName: string;
  Record_Modified: number;
}

@Injectable()
export class MyQueryImporter extends TableImporter<MyQueryMeta> {
  readonly table = 'myquery';
  protected readonly entityName = 'Query';
  protected readonly metaSchema = Joi.object<MyQueryMeta>({
    Name: text(),
    mQCode: text(),
    QuickView: flag(),
    ShortName: text(),
    Record_Modified: count(),
  });

  protected async persist(
    record: DecodedRecord<MyQueryMeta>,
    tx: LogbookTransaction,
  ): Promise<ImportOutcome> {
    const { meta, guid } = record;

    const { created } = await tx.upsert(
      MyQuery,
      { guid },
      {
        ...this.envelopeFields(record),
        name: meta.Name,
        mq_code: meta.mQCode,
        quick_view: meta.QuickView,
        short_name: meta.ShortName,
        record_modified: meta.Record_Modified,
      },
    );

    return this.report(created, guid, meta.Name);
  }
}
