import { Injectable } from '@nestjs/common';
import { randomUUID } from 'crypto';
import * as Joi from 'joi';
import { Qualification } from '../../logbook/entities/qualification.entity';
import { LogbookTransaction } from '../../logbook/logbook.store';
import { toDate } from '../coercion';
import { count, guid as guidString, raw, text } from '../meta-schema';
import { ImportOutcome } from '../types';
import { DecodedRecord, TableImporter } from './table-importer';

export interface QualificationMeta {
  QCode: string;
  RefExtra: number;
  RefModel: string;
  Validity: number;
  DateValid: unknown;
  QTypeCode: number;
  DateIssued: unknown;
  MinimumQty: number;
  NotifyDays: number;
  RefAirfield?: string | null;
  MinimumPeriod: number;
  NotifyComment: string;
  Record_Modified: number;
}

@Injectable()
export class QualificationImporter extends TableImporter<QualificationMeta> {
  readonly table = 'qualification';
  protected readonly entityName = 'Qualification';
  protected readonly metaSchema = Joi.object<QualificationMeta>({
    QCode: guidString().required(),
    RefExtra: count(),
    RefModel: text(),
    Validity: count(),
    DateValid: raw(),
    QTypeCode: count(),
    DateIssued: raw(),
    MinimumQty: count(),
    NotifyDays: count(),
    RefAirfield: guidString().allow(null).empty(''),
    MinimumPeriod: count(),
    NotifyComment: text(),
    Record_Modified: count(),
  });

  protected async persist(
    record: DecodedRecord<QualificationMeta>,
    tx: LogbookTransaction,
  ): Promise<ImportOutcome> {
    const { meta, guid } = record;
    // A generated airfield is kept across re-imports of the same record.
    const stored = await tx.findOne(Qualification, { guid });

    const { created } = await tx.upsert(
      Qualification,
      { guid },
      {
        ...this.envelopeFields(record),
        q_code: meta.QCode,
        ref_extra: meta.RefExtra,
        ref_model: meta.RefModel,
        validity: meta.Validity,
        date_valid: toDate(meta.DateValid),
        q_type_code: meta.QTypeCode,
        date_issued: toDate(meta.DateIssued),
        minimum_qty: meta.MinimumQty,
        notify_days: meta.NotifyDays,
        ref_airfield: meta.RefAirfield ?? stored?.ref_airfield ?? randomUUID(),
        minimum_period: meta.MinimumPeriod,
        notify_comment: meta.NotifyComment,
        record_modified: meta.Record_Modified,
      },
    );

    return this.report(created, guid, guid);
  }
}
