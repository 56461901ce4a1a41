import { Injectable } from '@nestjs/common';
import { EntityTarget, ObjectLiteral } from 'typeorm';
import {
  Aircraft,
  Airfield,
  Flight,
  ImagePic,
  LimitRule,
  MyQuery,
  MyQueryBuild,
  Pilot,
  Qualification,
  SettingConfig,
} from './logbook/entities';
import { LogbookStore } from './logbook/logbook.store';
import { TableName } from './import/types';

const TABLE_ENTITIES: Record<TableName, EntityTarget<ObjectLiteral>> = {
  aircraft: Aircraft,
  flight: Flight,
  imagepic: ImagePic,
  limitrules: LimitRule,
  myquery: MyQuery,
  myquerybuild: MyQueryBuild,
  pilot: Pilot,
  qualification: Qualification,
  settingconfig: SettingConfig,
  airfield: Airfield,
};

@Injectable()
export class AppService {
  constructor(private readonly store: LogbookStore) {}

  getHello(): string {
    return 'Logbook Bridge API';
  }

  /** Row count of every logbook table. */
  async getTableCounts(): Promise<Record<string, number>> {
    const entries = await Promise.all(
      Object.entries(TABLE_ENTITIES).map(
        async ([table, entity]) => [table, await this.store.count(entity)] as const,
      ),
    );
    return Object.fromEntries(entries);
  }
}
