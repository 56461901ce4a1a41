import { Column, Entity, Index } from 'typeorm';
import { LogbookRecord } from './logbook-record';

/** One condition of a saved query; `mq_code` points at its MyQuery. */
@Entity('my_query_builds')
@Index('UQ_my_query_builds_guid', ['guid'], { unique: true })
export class MyQueryBuild extends LogbookRecord {
  @Column({ type: 'text', default: '' })
  build1!: string;

  @Column({ type: 'integer', default: 0 })
  build2!: number;

  @Column({ type: 'integer', default: 0 })
  build3!: number;

  @Column({ type: 'text', default: '' })
  build4!: string;

  @Column({ type: 'text', default: '' })
  mq_code!: string;

  @Column({ type: 'text', default: '' })
  mqb_code!: string;
}
