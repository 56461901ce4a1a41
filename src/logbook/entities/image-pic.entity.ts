import { Column, Entity, Index } from 'typeorm';
import { LogbookRecord } from './logbook-record';

@Entity('image_pics')
@Index('UQ_image_pics_guid_img_code', ['guid', 'img_code'], { unique: true })
export class ImagePic extends LogbookRecord {
  @Column({ type: 'text' })
  img_code!: string;

  @Column({ type: 'text', default: '' })
  file_ext!: string;

  @Column({ type: 'text', default: '' })
  file_name!: string;

  @Column({ type: 'text', default: '' })
  link_code!: string; // code of the record the picture belongs to

  @Column({ type: 'boolean', default: false })
  img_upload!: boolean;

  @Column({ type: 'boolean', default: false })
  img_download!: boolean;
}
