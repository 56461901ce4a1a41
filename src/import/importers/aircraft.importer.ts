import { Injectable } from '@nestjs/common';
import * as Joi from 'joi';
import { Aircraft } from '../../logbook/entities/aircraft.entity';
import { Flight } from '../../logbook/entities/flight.entity';
import { LogbookTransaction } from '../../logbook/logbook.store';
import { count, flag, text } from '../meta-schema';
import { ImportOutcome } from '../types';
import { DecodedRecord, TableImporter } from './table-importer';

export interface AircraftMeta {
  Make: string;
  Model: string;
  Category: number;
  Class: number;
  Power: number;
  Seats: number;
  Active: boolean;
  Reference: string;
  Tailwheel: boolean;
  Complex: boolean;
  HighPerf: boolean;
  Aerobatic: boolean;
  FNPT: number;
  Kg5700: boolean;
  Rating: string;
  Company: string;
  CondLog: number;
  FavList: boolean;
  SubModel: string;
  Record_Modified: number;
  EngType: number;
}

@Injectable()
export class AircraftImporter extends TableImporter<AircraftMeta> {
  readonly table = 'aircraft';
  protected readonly entityName = 'Aircraft';
  protected readonly metaSchema = Joi.object<AircraftMeta>({
    Make: text(),
    Model: text(),
    Category: count(),
    Class: count(),
    Power: count(),
    Seats: count(),
    Active: flag(),
    Reference: text(),
    Tailwheel: flag(),
    Complex: flag(),
    HighPerf: flag(),
    Aerobatic: flag(),
    FNPT: count(),
    Kg5700: flag(),
    Rating: text(),
    Company: text(),
    CondLog: count(),
    FavList: flag(),
    SubModel: text(),
    Record_Modified: count(),
    EngType: count(),
  });

  protected async persist(
    record: DecodedRecord<AircraftMeta>,
    tx: LogbookTransaction,
  ): Promise<ImportOutcome> {
    const { meta, guid } = record;

    const { entity: aircraft, created } = await tx.upsert(
      Aircraft,
      { guid },
      {
        ...this.envelopeFields(record),
        make: meta.Make,
        model: meta.Model,
        category: meta.Category,
        aircraft_class: meta.Class,
        power: meta.Power,
        seats: meta.Seats,
        active: meta.Active,
        reference: meta.Reference,
        tailwheel: meta.Tailwheel,
        complex: meta.Complex,
        high_perf: meta.HighPerf,
        aerobatic: meta.Aerobatic,
        fnpt: meta.FNPT,
        kg5700: meta.Kg5700,
        rating: meta.Rating,
        company: meta.Company,
        cond_log: meta.CondLog,
        fav_list: meta.FavList,
        sub_model: meta.SubModel,
        record_modified: meta.Record_Modified,
        eng_type: meta.EngType,
      },
    );

    const outcome = this.report(created, guid, aircraft.reference);

    // Backups reuse a guid across tables for an aircraft and the flight it
    // belongs to; that shared guid is the only link between them.
    const flight = await tx.findOne(Flight, { guid });
    if (!flight) {
      this.logger.warn(`No Flight found with guid: ${guid}`);
      return outcome;
    }

    flight.aircraft = aircraft;
    await tx.save(Flight, flight);
    this.logger.log(`Assigned Aircraft to Flight: ${flight.guid}`);

    return { ...outcome, linked: flight.guid };
  }
}
