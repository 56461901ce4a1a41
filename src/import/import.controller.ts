import { Body, Controller, HttpCode, Post, UseGuards } from '@nestjs/common';
import { ApiBody, ApiTags } from '@nestjs/swagger';
import { ApiEnabledGuard } from '../common/guards/api-enabled.guard';
import { LogbookImportService } from './logbook-import.service';
import { ImportSummary } from './types';

@ApiTags('logbook')
@Controller('logbook')
@UseGuards(ApiEnabledGuard)
export class ImportController {
  constructor(private readonly importService: LogbookImportService) {}

  /**
   * Reconciles a backup document posted as the JSON body. Answers 400 when
   * the body is not an array or a record has no table tag.
   */
  @Post('import')
  @HttpCode(200)
  @ApiBody({ description: 'Logbook backup document (JSON array of records)' })
  importDocument(@Body() document: unknown): Promise<ImportSummary> {
    return this.importService.importDocument(document);
  }
}
