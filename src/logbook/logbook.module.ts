import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { LOGBOOK_ENTITIES } from './entities';
import { LogbookStore } from './logbook.store';

@Module({
  imports: [TypeOrmModule.forFeature(LOGBOOK_ENTITIES)],
  providers: [LogbookStore],
  exports: [LogbookStore, TypeOrmModule],
})
export class LogbookModule {}
