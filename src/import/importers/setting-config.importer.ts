import { Injectable } from '@nestjs/common';
import * as Joi from 'joi';
import { SettingConfig } from '../../logbook/entities/setting-config.entity';
import { LogbookTransaction } from '../../logbook/logbook.store';
import { guidFromNumber, isCanonicalGuid, normalizeGuid } from '../guid';
import { count, text } from '../meta-schema';
import { ImportOutcome } from '../types';
import { DecodedRecord, TableImporter } from './table-importer';

export interface SettingConfigMeta {
  ConfigCode: number;
  Name: string;
  Group: string;
  Data: string;
  Record_Modified: number;
}

@Injectable()
export class SettingConfigImporter extends TableImporter<SettingConfigMeta> {
  readonly table = 'settingconfig';
  protected readonly entityName = 'SettingConfig';
  protected readonly metaSchema = Joi.object<SettingConfigMeta>({
    ConfigCode: count(),
    Name: text(),
    Group: text(),
    Data: text(),
    Record_Modified: count(),
  });

  /** Settings rows from older producers carry their config number as guid. */
  protected resolveGuid(value: unknown): string | null {
    if (isCanonicalGuid(value)) {
      return normalizeGuid(value);
    }
    if (typeof value !== 'string') {
      return null;
    }

    const derived = guidFromNumber(value);
    if (derived !== null) {
      this.logger.warn(`Non-canonical GUID ${value}, using ${derived}`);
    }
    return derived;
  }

  protected async persist(
    record: DecodedRecord<SettingConfigMeta>,
    tx: LogbookTransaction,
  ): Promise<ImportOutcome> {
    const { meta, guid } = record;

    const { created } = await tx.upsert(
      SettingConfig,
      { guid },
      {
        ...this.envelopeFields(record),
        config_code: meta.ConfigCode,
        name: meta.Name,
        group: meta.Group,
        data: meta.Data,
        record_modified: meta.Record_Modified,
      },
    );

    return this.report(created, guid, guid);
  }
}
