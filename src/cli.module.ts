import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import appConfig from './common/utils/app.config';
import { typeOrmOptions } from './common/utils/typeorm.config';
import { ImportModule } from './import/import.module';
import { ExportModule } from './export/export.module';

/** Providers needed by the command line, without the HTTP layer. */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [appConfig],
    }),
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: typeOrmOptions,
      inject: [ConfigService],
    }),
    ImportModule,
    ExportModule,
  ],
})
export class CliModule {}
