import { Injectable } from '@nestjs/common';
import * as Joi from 'joi';
import { DeepPartial } from 'typeorm';
import { Aircraft } from '../../logbook/entities/aircraft.entity';
import { Flight } from '../../logbook/entities/flight.entity';
import { LogbookTransaction } from '../../logbook/logbook.store';
import { toDate, toDecimal, toInteger, toTimeOfDay } from '../coercion';
import { flag, raw, text } from '../meta-schema';
import { ImportOutcome } from '../types';
import { DecodedRecord, TableImporter } from './table-importer';

const APPROACH_SLOTS = 6;

export interface FlightMeta {
  ArrCode: string;
  DepCode: string;
  Route: string;
  DateUTC: unknown;
  ArrTimeUTC: unknown;
  DepTimeUTC: unknown;
  LdgTimeUTC: unknown;
  ArrOffset: unknown;
  DepOffset: unknown;
  minTOTAL: unknown;
  minPIC: unknown;
  minCOP: unknown;
  minNIGHT: unknown;
  minSFR: unknown;
  minXC: unknown;
  minAIR: unknown;
  FuelUsed: unknown;
  ToDay: unknown;
  LdgDay: unknown;
  ToNight: unknown;
  LdgNight: unknown;
  Holding: unknown;
  minINSTR: unknown;
  minIFR: unknown;
  HobbsIn: unknown;
  HobbsOut: unknown;
  ArrTimeSCHED: unknown;
  DepTimeSCHED: unknown;
  TagApproach: string;
  minDUAL: unknown;
  minEXAM: unknown;
  Training: unknown;
  Remarks: string;
  ToEdit: boolean;
  NextPage: boolean;
  UserBool: boolean;
  PF: boolean;
}

/** Splits the producer's approach tag list into the fixed approach slots. */
export function splitApproaches(tag: string): string[] {
  const codes = tag
    .split(/[,;]/)
    .map((code) => code.trim())
    .filter((code) => code.length > 0)
    .slice(0, APPROACH_SLOTS);
  return [...codes, ...Array<string>(APPROACH_SLOTS - codes.length).fill('')];
}

@Injectable()
export class FlightImporter extends TableImporter<FlightMeta> {
  readonly table = 'flight';
  protected readonly entityName = 'Flight';
  protected readonly metaSchema = Joi.object<FlightMeta>({
    ArrCode: text(),
    DepCode: text(),
    Route: text(),
    DateUTC: raw(),
    ArrTimeUTC: raw(),
    DepTimeUTC: raw(),
    LdgTimeUTC: raw(),
    ArrOffset: raw(),
    DepOffset: raw(),
    minTOTAL: raw(),
    minPIC: raw(),
    minCOP: raw(),
    minNIGHT: raw(),
    minSFR: raw(),
    minXC: raw(),
    minAIR: raw(),
    FuelUsed: raw(),
    ToDay: raw(),
    LdgDay: raw(),
    ToNight: raw(),
    LdgNight: raw(),
    Holding: raw(),
    minINSTR: raw(),
    minIFR: raw(),
    HobbsIn: raw(),
    HobbsOut: raw(),
    ArrTimeSCHED: raw(),
    DepTimeSCHED: raw(),
    TagApproach: text(),
    minDUAL: raw(),
    minEXAM: raw(),
    Training: raw(),
    Remarks: text(),
    ToEdit: flag(),
    NextPage: flag(),
    UserBool: flag(),
    PF: flag(),
  });

  protected async persist(
    record: DecodedRecord<FlightMeta>,
    tx: LogbookTransaction,
  ): Promise<ImportOutcome> {
    const { meta, guid } = record;
    const [approach1, approach2, approach3, approach4, approach5, approach6] =
      splitApproaches(meta.TagApproach);

    // Several targets have no counterpart in the backup format; these
    // source fields stand in for them so exports stay compatible.
    const values: DeepPartial<Flight> = {
      ...this.envelopeFields(record),
      from_airport: meta.ArrCode,
      to_airport: meta.DepCode,
      route: meta.Route,
      date: toDate(meta.DateUTC),
      time_out: toTimeOfDay(meta.ArrTimeUTC),
      time_off: toTimeOfDay(meta.DepTimeUTC),
      time_on: toTimeOfDay(meta.LdgTimeUTC),
      time_in: toTimeOfDay(meta.ArrTimeUTC),
      on_duty: toTimeOfDay(meta.ArrOffset),
      off_duty: toTimeOfDay(meta.DepOffset),
      total_time: toDecimal(meta.minTOTAL),
      pic: toDecimal(meta.minPIC),
      sic: toDecimal(meta.minCOP),
      night: toDecimal(meta.minNIGHT),
      solo: toDecimal(meta.minSFR),
      cross_country: toDecimal(meta.minXC),
      nvg: toDecimal(meta.minNIGHT),
      nvg_ops: toDecimal(meta.minAIR),
      distance: toDecimal(meta.FuelUsed),
      day_takeoffs: toInteger(meta.ToDay),
      day_landings_full_stop: toInteger(meta.LdgDay),
      night_takeoffs: toInteger(meta.ToNight),
      night_landings_full_stop: toInteger(meta.LdgNight),
      all_landings: toInteger(meta.Holding),
      actual_instrument: toDecimal(meta.minINSTR),
      simulated_instrument: toDecimal(meta.minIFR),
      hobbs_start: toDecimal(meta.HobbsIn),
      hobbs_end: toDecimal(meta.HobbsOut),
      tach_start: toDecimal(meta.ArrTimeSCHED),
      tach_end: toDecimal(meta.DepTimeSCHED),
      holds: toInteger(meta.Holding),
      approach1,
      approach2,
      approach3,
      approach4,
      approach5,
      approach6,
      dual_given: toDecimal(meta.minDUAL),
      simulated_flight: toDecimal(meta.minEXAM),
      ground_training: toDecimal(meta.Training),
      instructor_comments: meta.Remarks,
      pilot_comments: meta.Remarks,
      flight_review: meta.ToEdit,
      checkride: meta.NextPage,
      ipc: meta.UserBool,
      nvg_proficiency: meta.PF,
    };

    const aircraft = await tx.findOne(Aircraft, { guid });
    if (aircraft) {
      values.aircraft = aircraft;
    }

    const { created } = await tx.upsert(Flight, { guid }, values);
    const outcome = this.report(created, guid, guid);
    return aircraft ? { ...outcome, linked: guid } : outcome;
  }
}
