import { Column, Entity, Index } from 'typeorm';
import { LogbookRecord } from './logbook-record';

@Entity('my_queries')
@Index('UQ_my_queries_guid', ['guid'], { unique: true })
export class MyQuery extends LogbookRecord {
  @Column({ type: 'text', default: '' })
  name!: string;

  @Column({ type: 'text', default: '' })
  mq_code!: string;

  @Column({ type: 'boolean', default: false })
  quick_view!: boolean;

  @Column({ type: 'text', default: '' })
  short_name!: string;
}
