import { Logger } from '@nestjs/common';
import * as Joi from 'joi';
import { LogbookTransaction } from '../../logbook/logbook.store';
import { isCanonicalGuid, normalizeGuid } from '../guid';
import { envelopeSchema, META_VALIDATION_OPTIONS } from '../meta-schema';
import {
  describeKey,
  ImportOutcome,
  RecordEnvelope,
  RecordWritten,
  TableName,
} from '../types';

export interface DecodedRecord<TMeta> {
  envelope: RecordEnvelope;
  guid: string; // validated, lower-cased
  meta: TMeta;
}

export interface EnvelopeFields {
  guid: string;
  user_id: number;
  platform: number;
  modified: number;
}

/**
 * One importer per backup table. Subclasses describe their meta payload as a
 * Joi schema and persist the decoded record; decoding, guid gating and
 * outcome reporting live here.
 */
export abstract class TableImporter<TMeta extends object = object> {
  protected readonly logger = new Logger(this.constructor.name);

  abstract readonly table: TableName;
  protected abstract readonly entityName: string;
  protected abstract readonly metaSchema: Joi.ObjectSchema<TMeta>;

  async import(record: unknown, tx: LogbookTransaction): Promise<ImportOutcome> {
    const key = describeKey(record);

    const envelope = envelopeSchema.validate(record, {
      abortEarly: false,
      convert: true,
    });
    if (envelope.error) {
      return this.skip(key, `Invalid record envelope for ${key}: ${envelope.error.message}`);
    }

    const guid = this.resolveGuid(envelope.value.guid);
    if (guid === null) {
      return this.skip(key, `Invalid or missing GUID: ${key}`);
    }

    const meta = this.metaSchema.validate(
      envelope.value.meta,
      META_VALIDATION_OPTIONS,
    );
    if (meta.error) {
      return this.skip(guid, `Invalid meta for ${guid}: ${meta.error.message}`);
    }

    return this.persist({ envelope: envelope.value, guid, meta: meta.value }, tx);
  }

  protected abstract persist(
    record: DecodedRecord<TMeta>,
    tx: LogbookTransaction,
  ): Promise<ImportOutcome>;

  /** Returns the key to store under, or `null` to reject the record. */
  protected resolveGuid(value: unknown): string | null {
    return isCanonicalGuid(value) ? normalizeGuid(value) : null;
  }

  protected envelopeFields({ envelope, guid }: DecodedRecord<TMeta>): EnvelopeFields {
    return {
      guid,
      user_id: envelope.user_id,
      platform: envelope.platform,
      modified: envelope._modified,
    };
  }

  protected report(created: boolean, key: string, label: string): RecordWritten {
    this.logger.log(
      created
        ? `Created new ${this.entityName}: ${label}`
        : `Updated ${this.entityName}: ${label}`,
    );
    return {
      status: created ? 'created' : 'updated',
      table: this.table,
      key,
      label,
    };
  }

  protected skip(key: string, reason: string): ImportOutcome {
    this.logger.warn(reason);
    return { status: 'skipped', table: this.table, key, reason };
  }
}
