import { DynamicModule } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { LOGBOOK_ENTITIES } from '../entities';

/** Fresh SQLite database per testing module. */
export function inMemoryDatabase(): DynamicModule {
  return TypeOrmModule.forRoot({
    type: 'sqlite',
    database: ':memory:',
    entities: LOGBOOK_ENTITIES,
    synchronize: true,
    dropSchema: true,
  });
}

export function testConfig(
  values: Record<string, unknown> = {},
): Promise<DynamicModule> {
  return ConfigModule.forRoot({
    isGlobal: true,
    ignoreEnvFile: true,
    load: [() => values],
  });
}

export const mockAuditLogger = () => ({
  logRecordOutcome: jest.fn(),
  logImportRun: jest.fn(),
  logImportAborted: jest.fn(),
  logExport: jest.fn(),
  logValidationError: jest.fn(),
  logRateLimitExceeded: jest.fn(),
  logRequestFailure: jest.fn(),
});
