import { Injectable } from '@nestjs/common';
import * as Joi from 'joi';
import { LimitRule } from '../../logbook/entities/limit-rule.entity';
import { LogbookTransaction } from '../../logbook/logbook.store';
import { toDate } from '../coercion';
import { count, guid as guidString, raw } from '../meta-schema';
import { ImportOutcome } from '../types';
import { DecodedRecord, TableImporter } from './table-importer';

export interface LimitRuleMeta {
  LimitCode: string;
  LFrom: unknown;
  LTo: unknown;
  LType: number;
  LZone: number;
  LMinutes: number;
  LPeriodCode: number;
  Record_Modified: number;
}

/**
 * Flight-time limits. Keyed by owner, limit code and platform; the record
 * guid is carried along as a plain field.
 */
@Injectable()
export class LimitRuleImporter extends TableImporter<LimitRuleMeta> {
  readonly table = 'limitrules';
  protected readonly entityName = 'LimitRules';
  protected readonly metaSchema = Joi.object<LimitRuleMeta>({
    LimitCode: guidString().required(),
    LFrom: raw(),
    LTo: raw(),
    LType: count(),
    LZone: count(),
    LMinutes: count(),
    LPeriodCode: count(),
    Record_Modified: count(),
  });

  protected async persist(
    record: DecodedRecord<LimitRuleMeta>,
    tx: LogbookTransaction,
  ): Promise<ImportOutcome> {
    const { meta, envelope } = record;
    const key = {
      user_id: envelope.user_id,
      limit_code: meta.LimitCode,
      platform: envelope.platform,
    };

    const { created } = await tx.upsert(LimitRule, key, {
      ...this.envelopeFields(record),
      ...key,
      l_from: toDate(meta.LFrom),
      l_to: toDate(meta.LTo),
      l_type: meta.LType,
      l_zone: meta.LZone,
      l_minutes: meta.LMinutes,
      l_period_code: meta.LPeriodCode,
      record_modified: meta.Record_Modified,
    });

    return this.report(created, meta.LimitCode, meta.LimitCode);
  }
}
