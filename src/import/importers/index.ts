import { AircraftImporter } from './aircraft.importer';
import { AirfieldImporter } from './airfield.importer';
import { FlightImporter } from './flight.importer';
import { ImagePicImporter } from './image-pic.importer';
import { LimitRuleImporter } from './limit-rule.importer';
import { MyQueryBuildImporter } from './my-query-build.importer';
import { MyQueryImporter } from './my-query.importer';
import { PilotImporter } from './pilot.importer';
import { QualificationImporter } from './qualification.importer';
import { SettingConfigImporter } from './setting-config.importer';

export {
  AircraftImporter,
  AirfieldImporter,
  FlightImporter,
  ImagePicImporter,
  LimitRuleImporter,
  MyQueryBuildImporter,
  MyQueryImporter,
  PilotImporter,
  QualificationImporter,
  SettingConfigImporter,
};
export { TableImporter } from './table-importer';

export const TABLE_IMPORTERS = [
  AircraftImporter,
  FlightImporter,
  ImagePicImporter,
  LimitRuleImporter,
  MyQueryImporter,
  MyQueryBuildImporter,
  PilotImporter,
  QualificationImporter,
  SettingConfigImporter,
  AirfieldImporter,
];
