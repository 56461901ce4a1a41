import { Module } from '@nestjs/common';
import { CommonModule } from '../common/common.module';
import { LogbookModule } from '../logbook/logbook.module';
import { ImagesController } from './images.controller';
import { ImagesService } from './images.service';

@Module({
  imports: [LogbookModule, CommonModule],
  providers: [ImagesService],
  controllers: [ImagesController],
})
export class ImagesModule {}
