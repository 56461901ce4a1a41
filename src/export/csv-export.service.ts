import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { stringify } from 'csv-stringify/sync';
import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { Repository } from 'typeorm';
import { AuditLoggerService } from '../common/services/audit-logger.service';
import { Aircraft } from '../logbook/entities/aircraft.entity';
import { Flight } from '../logbook/entities/flight.entity';
import { AIRCRAFT_COLUMNS, ColumnSpec, FLIGHT_COLUMNS, toRow } from './columns';

export const AIRCRAFT_FILE = 'export_aircraft.csv';
export const FLIGHT_FILE = 'export_flight.csv';

export interface ExportResult {
  aircraftFile: string;
  flightFile: string;
  aircraftRows: number;
  flightRows: number;
}

function render<T>(columns: ColumnSpec<T>[], rows: T[]): string {
  return stringify([
    columns.map((column) => column.header),
    ...rows.map((row) => toRow(columns, row)),
  ]);
}

@Injectable()
export class CsvExportService {
  private readonly logger = new Logger(CsvExportService.name);

  constructor(
    @InjectRepository(Aircraft)
    private readonly aircraftRepo: Repository<Aircraft>,
    @InjectRepository(Flight)
    private readonly flightRepo: Repository<Flight>,
    private readonly auditLogger: AuditLoggerService,
  ) {}

  renderAircraft(aircraft: Aircraft[]): string {
    return render(AIRCRAFT_COLUMNS, aircraft);
  }

  renderFlights(flights: Flight[]): string {
    return render(FLIGHT_COLUMNS, flights);
  }

  async aircraftCsv(): Promise<{ csv: string; rows: number }> {
    const aircraft = await this.aircraftRepo.find();
    return { csv: this.renderAircraft(aircraft), rows: aircraft.length };
  }

  async flightCsv(): Promise<{ csv: string; rows: number }> {
    const flights = await this.flightRepo.find({ relations: { aircraft: true } });
    return { csv: this.renderFlights(flights), rows: flights.length };
  }

  async exportToDirectory(dir: string): Promise<ExportResult> {
    await mkdir(dir, { recursive: true });
    const aircraftFile = join(dir, AIRCRAFT_FILE);
    const flightFile = join(dir, FLIGHT_FILE);

    const aircraft = await this.aircraftCsv();
    await writeFile(aircraftFile, aircraft.csv, 'utf-8');
    this.logger.log(`Exported ${aircraft.rows} aircraft to ${aircraftFile}`);

    const flights = await this.flightCsv();
    await writeFile(flightFile, flights.csv, 'utf-8');
    this.logger.log(`Exported ${flights.rows} flights to ${flightFile}`);

    this.auditLogger.logExport(dir, aircraft.rows, flights.rows);

    return {
      aircraftFile,
      flightFile,
      aircraftRows: aircraft.rows,
      flightRows: flights.rows,
    };
  }
}
