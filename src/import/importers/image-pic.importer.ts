import { Injectable } from '@nestjs/common';
import * as Joi from 'joi';
import { ImagePic } from '../../logbook/entities/image-pic.entity';
import { LogbookTransaction } from '../../logbook/logbook.store';
import { count, flag, text } from '../meta-schema';
import { ImportOutcome } from '../types';
import { DecodedRecord, TableImporter } from './table-importer';

export interface ImagePicMeta {
  ImgCode: string;
  FileExt: string;
  FileName: string;
  LinkCode: string;
  Img_Upload: boolean;
  Img_Download: boolean;
  Record_Modified: number;
}

@Injectable()
export class ImagePicImporter extends TableImporter<ImagePicMeta> {
  readonly table = 'imagepic';
  protected readonly entityName = 'ImagePic';
  protected readonly metaSchema = Joi.object<ImagePicMeta>({
    ImgCode: Joi.string().required(),
    FileExt: text(),
    FileName: text(),
    LinkCode: text(),
    Img_Upload: flag(),
    Img_Download: flag(),
    Record_Modified: count(),
  });

  protected async persist(
    record: DecodedRecord<ImagePicMeta>,
    tx: LogbookTransaction,
  ): Promise<ImportOutcome> {
    const { meta, guid } = record;

    const { entity, created } = await tx.upsert(
      ImagePic,
      { guid, img_code: meta.ImgCode },
      {
        ...this.envelopeFields(record),
        img_code: meta.ImgCode,
        file_ext: meta.FileExt,
        file_name: meta.FileName,
        link_code: meta.LinkCode,
        img_upload: meta.Img_Upload,
        img_download: meta.Img_Download,
        record_modified: meta.Record_Modified,
      },
    );

    return this.report(created, `${guid}/${entity.img_code}`, entity.img_code);
  }
}
