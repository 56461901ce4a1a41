import { Aircraft } from './aircraft.entity';
import { Airfield } from './airfield.entity';
import { Flight } from './flight.entity';
import { ImagePic } from './image-pic.entity';
import { LimitRule } from './limit-rule.entity';
import { MyQuery } from './my-query.entity';
import { MyQueryBuild } from './my-query-build.entity';
import { Pilot } from './pilot.entity';
import { Qualification } from './qualification.entity';
import { SettingConfig } from './setting-config.entity';

export {
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
};
export { LogbookRecord } from './logbook-record';

export const LOGBOOK_ENTITIES = [
  Aircraft,
  Flight,
  ImagePic,
  LimitRule,
  MyQuery,
  MyQueryBuild,
  Pilot,
  Qualification,
  SettingConfig,
  Airfield,
];
