import { ConfigService } from '@nestjs/config';
import { TypeOrmModuleOptions } from '@nestjs/typeorm';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { LOGBOOK_ENTITIES } from '../../logbook/entities';

export function typeOrmOptions(config: ConfigService): TypeOrmModuleOptions {
  const database = config.get<string>('database.path') || './database/logbook.sqlite';
  mkdirSync(dirname(database), { recursive: true });

  return {
    type: 'sqlite',
    database,
    entities: LOGBOOK_ENTITIES,
    synchronize: true,
  };
}
