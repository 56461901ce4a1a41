import { Injectable } from '@nestjs/common';
import * as Joi from 'joi';
import { MyQueryBuild } from '../../logbook/entities/my-query-build.entity';
import { LogbookTransaction } from '../../logbook/logbook.store';
import { count, text } from '../meta-schema';
import { ImportOutcome } from '../types';
import { DecodedRecord, TableImporter } from './table-importer';

export interface MyQueryBuildMeta {
  Build1: string;
  Build2: number;
  Build3: number;
  Build4: string;
  mQCode: string;
  mQBCode: string;
  Record_Modified: number;
}

@Injectable()
export class MyQueryBuildImporter extends TableImporter<MyQueryBuildMeta> {
  readonly table = 'myquerybuild';
  protected readonly entityName = 'MyQueryBuild';
  protected readonly metaSchema = Joi.object<MyQueryBuildMeta>({
    Build1: text(),
    Build2: count(),
    Build3: count(),
    Build4: text(),
    mQCode: text(),
    mQBCode: text(),
    Record_Modified: count(),
  });

  protected async persist(
    record: DecodedRecord<MyQueryBuildMeta>,
    tx: LogbookTransaction,
  ): Promise<ImportOutcome> {
    const { meta, guid } = record;

    const { created } = await tx.upsert(
      MyQueryBuild,
      { guid },
      {
        ...this.envelopeFields(record),
        build1: meta.Build1,
        build2: meta.Build2,
        build3: meta.Build3,
        build4: meta.Build4,
        mq_code: meta.mQCode,
        mqb_code: meta.mQBCode,
        record_modified: meta.Record_Modified,
      },
    );

    return this.report(created, guid, guid);
  }
}
