import { Injectable } from '@nestjs/common';
import * as Joi from 'joi';
import { Pilot } from '../../logbook/entities/pilot.entity';
import { LogbookTransaction } from '../../logbook/logbook.store';
import { count, flag, text } from '../meta-schema';
import { ImportOutcome } from '../types';
import { DecodedRecord, TableImporter } from './table-importer';

export interface PilotMeta {
  Notes: string;
  Active: boolean;
  Company: string;
  FavList: boolean;
  UserAPI: string;
  Facebook: string;
  LinkedIn: string;
  PilotRef: string;
  PilotCode: string;
  PilotName: string;
  PilotEMail: string;
  PilotPhone: string;
  Certificate: string;
  PhoneSearch: string;
  PilotSearch: string;
  RosterAlias: string;
  Record_Modified: number;
}

/** Crew names may carry any script; console lines keep the ASCII part. */
export function asciiOnly(value: string): string {
  return value.replace(/[^\x00-\x7F]/g, '');
}

@Injectable()
export class PilotImporter extends TableImporter<PilotMeta> {
  readonly table = 'pilot';
  protected readonly entityName = 'Pilot';
  protected readonly metaSchema = Joi.object<PilotMeta>({
    Notes: text(),
    Active: flag(),
    Company: text(),
    FavList: flag(),
    UserAPI: text(),
    Facebook: text(),
    LinkedIn: text(),
    PilotRef: text(),
    PilotCode: text(),
    PilotName: text(),
    PilotEMail: text(),
    PilotPhone: text(),
    Certificate: text(),
    PhoneSearch: text(),
    PilotSearch: text(),
    RosterAlias: text(),
    Record_Modified: count(),
  });

  protected async persist(
    record: DecodedRecord<PilotMeta>,
    tx: LogbookTransaction,
  ): Promise<ImportOutcome> {
    const { meta, guid } = record;

    const { created } = await tx.upsert(
      Pilot,
      { guid },
      {
        ...this.envelopeFields(record),
        notes: meta.Notes,
        active: meta.Active,
        company: meta.Company,
        fav_list: meta.FavList,
        user_api: meta.UserAPI,
        facebook: meta.Facebook,
        linkedin: meta.LinkedIn,
        pilot_ref: meta.PilotRef,
        pilot_code: meta.PilotCode,
        pilot_name: meta.PilotName,
        pilot_email: meta.PilotEMail,
        pilot_phone: meta.PilotPhone,
        certificate: meta.Certificate,
        phone_search: meta.PhoneSearch,
        pilot_search: meta.PilotSearch,
        roster_alias: meta.RosterAlias,
        record_modified: meta.Record_Modified,
      },
    );

    return this.report(created, guid, asciiOnly(meta.PilotName));
  }
}
