#!/usr/bin/env node
import 'reflect-metadata';
import { INestApplicationContext, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { CliModule } from './cli.module';
import { errorMessage } from './common/utils/error-message';
import { CsvExportService } from './export/csv-export.service';
import { LogbookImportService } from './import/logbook-import.service';

const USAGE = 'Usage: logbook-bridge <import [file] | export [dir]>';

const logger = new Logger('CLI');

async function runImport(app: INestApplicationContext, file?: string) {
  const path = file ?? app.get(ConfigService).getOrThrow<string>('import.file');
  const summary = await app.get(LogbookImportService).importFile(path);
  logger.log(`Import finished: ${JSON.stringify(summary)}`);
}

async function runExport(app: INestApplicationContext, dir?: string) {
  const target = dir ?? app.get(ConfigService).getOrThrow<string>('export.dir');
  const result = await app.get(CsvExportService).exportToDirectory(target);
  logger.log(
    `Successfully exported data to ${result.aircraftFile} and ${result.flightFile}`,
  );
}

async function main(argv: string[]): Promise<number> {
  const [command, target] = argv;
  if (command !== 'import' && command !== 'export') {
    logger.error(USAGE);
    return 2;
  }

  const app = await NestFactory.createApplicationContext(CliModule, {
    logger: ['log', 'warn', 'error'],
  });
  try {
    if (command === 'import') {
      await runImport(app, target);
    } else {
      await runExport(app, target);
    }
    return 0;
  } finally {
    await app.close();
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logger.error(errorMessage(err));
    process.exitCode = 1;
  });
