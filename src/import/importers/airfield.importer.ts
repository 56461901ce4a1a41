import { Injectable } from '@nestjs/common';
import * as Joi from 'joi';
import { Airfield } from '../../logbook/entities/airfield.entity';
import { LogbookTransaction } from '../../logbook/logbook.store';
import { count, flag, number, text } from '../meta-schema';
import { ImportOutcome } from '../types';
import { DecodedRecord, TableImporter } from './table-importer';

export interface AirfieldMeta {
  AFCode: string;
  AFIATA: string;
  AFICAO: string;
  AFName: string;
  City: string;
  AFCat: number;
  TZCode: number;
  Latitude: number;
  Longitude: number;
  ShowList: boolean;
  UserEdit: boolean;
  AFCountry: number;
  Notes: string;
  NotesUser: string;
  RegionUser: number;
  ElevationFT: number;
  Record_Modified: number;
}

@Injectable()
export class AirfieldImporter extends TableImporter<AirfieldMeta> {
  readonly table = 'airfield';
  protected readonly entityName = 'Airfield';
  protected readonly metaSchema = Joi.object<AirfieldMeta>({
    AFCode: text(),
    AFIATA: text(),
    AFICAO: text(),
    AFName: text(),
    City: text(),
    AFCat: count(),
    TZCode: count(),
    Latitude: number(),
    Longitude: number(),
    ShowList: flag(),
    UserEdit: flag(),
    AFCountry: count(),
    Notes: text(),
    NotesUser: text(),
    RegionUser: count(),
    ElevationFT: count(),
    Record_Modified: count(),
  });

  protected async persist(
    record: DecodedRecord<AirfieldMeta>,
    tx: LogbookTransaction,
  ): Promise<ImportOutcome> {
    const { meta, guid } = record;

    const { created } = await tx.upsert(
      Airfield,
      { guid },
      {
        ...this.envelopeFields(record),
        af_code: meta.AFCode,
        af_iata: meta.AFIATA,
        af_icao: meta.AFICAO,
        af_name: meta.AFName,
        city: meta.City,
        af_cat: meta.AFCat,
        tz_code: meta.TZCode,
        latitude: meta.Latitude,
        longitude: meta.Longitude,
        show_list: meta.ShowList,
        user_edit: meta.UserEdit,
        af_country: meta.AFCountry,
        notes: meta.Notes,
        notes_user: meta.NotesUser,
        region_user: meta.RegionUser,
        elevation_ft: meta.ElevationFT,
        record_modified: meta.Record_Modified,
      },
    );

    return this.report(created, guid, guid);
  }
}
