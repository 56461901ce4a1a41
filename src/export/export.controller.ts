import { Controller, Get, Header, UseGuards } from '@nestjs/common';
import { ApiProduces, ApiTags } from '@nestjs/swagger';
import { ApiEnabledGuard } from '../common/guards/api-enabled.guard';
import { CsvExportService } from './csv-export.service';

@ApiTags('logbook')
@Controller('logbook/export')
@UseGuards(ApiEnabledGuard)
export class ExportController {
  constructor(private readonly exportService: CsvExportService) {}

  @Get('aircraft.csv')
  @Header('Content-Type', 'text/csv; charset=utf-8')
  @Header('Content-Disposition', 'attachment; filename="export_aircraft.csv"')
  @ApiProduces('text/csv')
  async aircraft(): Promise<string> {
    return (await this.exportService.aircraftCsv()).csv;
  }

  @Get('flights.csv')
  @Header('Content-Type', 'text/csv; charset=utf-8')
  @Header('Content-Disposition', 'attachment; filename="export_flight.csv"')
  @ApiProduces('text/csv')
  async flights(): Promise<string> {
    return (await this.exportService.flightCsv()).csv;
  }
}
