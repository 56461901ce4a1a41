import { Module } from '@nestjs/common';
import { CommonModule } from '../common/common.module';
import { LogbookModule } from '../logbook/logbook.module';
import { CsvExportService } from './csv-export.service';
import { ExportController } from './export.controller';

@Module({
  imports: [LogbookModule, CommonModule],
  providers: [CsvExportService],
  controllers: [ExportController],
  exports: [CsvExportService],
})
export class ExportModule {}
