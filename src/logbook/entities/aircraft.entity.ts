import { Column, Entity, Index } from 'typeorm';
import { LogbookRecord } from './logbook-record';

@Entity('aircraft')
@Index('UQ_aircraft_guid', ['guid'], { unique: true })
export class Aircraft extends LogbookRecord {
  @Column({ type: 'text', default: '' })
  make!: string;

  @Column({ type: 'text', default: '' })
  model!: string;

  @Column({ type: 'integer', default: 0 })
  category!: number;

  @Column({ type: 'integer', default: 0 })
  aircraft_class!: number;

  @Column({ type: 'integer', default: 0 })
  power!: number;

  @Column({ type: 'integer', default: 0 })
  seats!: number;

  @Column({ type: 'boolean', default: false })
  active!: boolean;

  @Column({ type: 'text', default: '' })
  reference!: string; // registration as shown in the logbook

  @Column({ type: 'boolean', default: false })
  tailwheel!: boolean;

  @Column({ type: 'boolean', default: false })
  complex!: boolean;

  @Column({ type: 'boolean', default: false })
  high_perf!: boolean;

  @Column({ type: 'boolean', default: false })
  aerobatic!: boolean;

  @Column({ type: 'integer', default: 0 })
  fnpt!: number;

  @Column({ type: 'boolean', default: false })
  kg5700!: boolean;

  @Column({ type: 'text', default: '' })
  rating!: string;

  @Column({ type: 'text', default: '' })
  company!: string;

  @Column({ type: 'integer', default: 0 })
  cond_log!: number;

  @Column({ type: 'boolean', default: false })
  fav_list!: boolean;

  @Column({ type: 'text', default: '' })
  sub_model!: string;

  @Column({ type: 'integer', default: 0 })
  eng_type!: number;
}
