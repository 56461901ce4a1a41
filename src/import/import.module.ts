import { Module } from '@nestjs/common';
import { CommonModule } from '../common/common.module';
import { LogbookModule } from '../logbook/logbook.module';
import { ImportController } from './import.controller';
import { TABLE_IMPORTERS, TableImporter } from './importers';
import { LogbookImportService } from './logbook-import.service';
import {
  TABLE_IMPORTER_LIST,
  TableDispatcherService,
} from './table-dispatcher.service';

@Module({
  imports: [LogbookModule, CommonModule],
  providers: [
    ...TABLE_IMPORTERS,
    {
      provide: TABLE_IMPORTER_LIST,
      useFactory: (...importers: TableImporter[]) => importers,
      inject: TABLE_IMPORTERS,
    },
    TableDispatcherService,
    LogbookImportService,
  ],
  controllers: [ImportController],
  exports: [LogbookImportService],
})
export class ImportModule {}
