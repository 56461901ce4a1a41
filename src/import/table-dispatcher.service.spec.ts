import { Logger } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { LogbookModule } from '../logbook/logbook.module';
import { LogbookStore } from '../logbook/logbook.store';
import { inMemoryDatabase } from '../logbook/testing/in-memory-database';
import { MissingTableError } from './errors';
import { AircraftImporter, FlightImporter, TABLE_IMPORTERS } from './importers';
import { TableDispatcherService } from './table-dispatcher.service';

describe('TableDispatcherService', () => {
  let moduleRef: TestingModule;
  let store: LogbookStore;
  let flightImporter: FlightImporter;
  let dispatcher: TableDispatcherService;

  beforeAll(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
  });

  afterAll(() => {
    jest.restoreAllMocks();
  });

  beforeEach(async () => {
    moduleRef = await Test.createTestingModule({
      imports: [inMemoryDatabase(), LogbookModule],
    }).compile();
    store = moduleRef.get(LogbookStore);

    const importers = TABLE_IMPORTERS.map((Importer) => new Importer());
    const flight = importers.find((importer) => importer instanceof FlightImporter);
    if (!(flight instanceof FlightImporter)) {
      throw new Error('flight importer not registered');
    }
    flightImporter = flight;
    dispatcher = new TableDispatcherService(importers);
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  it('refuses duplicate importers', () => {
    const importers = [...TABLE_IMPORTERS.map((Importer) => new Importer()), new AircraftImporter()];
    expect(() => new TableDispatcherService(importers)).toThrow(
      'Duplicate importer for table: aircraft',
    );
  });

  it('refuses an incomplete importer set', () => {
    expect(() => new TableDispatcherService([new AircraftImporter()])).toThrow(
      'No importer registered for: flight, imagepic, limitrules, myquery, ' +
        'myquerybuild, pilot, qualification, settingconfig, airfield',
    );
  });

  describe('classify', () => {
    it('lower-cases the table tag', () => {
      expect(dispatcher.classify({ table: 'SettingConfig' }, 0)).toBe('settingconfig');
    });

    it('treats a missing or non-string tag as fatal', () => {
      expect(() => dispatcher.classify({ guid: 'abc' }, 3)).toThrow(
        new MissingTableError(3, 'abc'),
      );
      expect(() => dispatcher.classify({ table: 5 }, 0)).toThrow(MissingTableError);
      expect(() => dispatcher.classify(null, 0)).toThrow(
        'Record #0 (guid <none>) has no "table" field',
      );
    });
  });

  it('returns unknown for tables without an importer', async () => {
    const result = await dispatcher.dispatch({ table: 'logbookbackup', guid: 12 }, 0, store);
    expect(result).toEqual({ status: 'unknown', table: 'logbookbackup', key: '12' });
  });

  it('turns an importer error into a failed outcome', async () => {
    jest.spyOn(flightImporter, 'import').mockRejectedValueOnce(new Error('disk full'));

    const result = await dispatcher.dispatch(
      { table: 'Flight', guid: '44444444-4444-4444-4444-444444444444' },
      0,
      store,
    );

    expect(result).toEqual({
      status: 'failed',
      table: 'flight',
      key: '44444444-4444-4444-4444-444444444444',
      reason: 'disk full',
    });
  });

  it('runs the importer inside a store transaction', async () => {
    const transaction = jest.spyOn(store, 'transaction');

    const result = await dispatcher.dispatch(
      {
        table: 'airfield',
        guid: '55555555-5555-5555-5555-555555555555',
        user_id: 2,
        platform: 3,
        meta: { AFICAO: 'EDDF', Latitude: 50.03 },
      },
      0,
      store,
    );

    expect(transaction).toHaveBeenCalledTimes(1);
    expect(result).toEqual({
      status: 'created',
      table: 'airfield',
      key: '55555555-5555-5555-5555-555555555555',
      label: '55555555-5555-5555-5555-555555555555',
    });
  });
});
