import { Column, Entity, Index } from 'typeorm';
import { LogbookRecord } from './logbook-record';

@Entity('qualifications')
@Index('UQ_qualifications_guid', ['guid'], { unique: true })
export class Qualification extends LogbookRecord {
  @Column({ type: 'varchar', length: 36 })
  q_code!: string;

  @Column({ type: 'integer', default: 0 })
  ref_extra!: number;

  @Column({ type: 'text', default: '' })
  ref_model!: string;

  @Column({ type: 'integer', default: 0 })
  validity!: number;

  @Column({ type: 'date', nullable: true })
  date_valid!: string | null;

  @Column({ type: 'integer', default: 0 })
  q_type_code!: number;

  @Column({ type: 'date', nullable: true })
  date_issued!: string | null;

  @Column({ type: 'integer', default: 0 })
  minimum_qty!: number;

  @Column({ type: 'integer', default: 0 })
  notify_days!: number;

  @Column({ type: 'varchar', length: 36 })
  ref_airfield!: string; // Airfield guid

  @Column({ type: 'integer', default: 0 })
  minimum_period!: number;

  @Column({ type: 'text', default: '' })
  notify_comment!: string;
}
