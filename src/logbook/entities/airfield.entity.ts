import { Column, Entity, Index } from 'typeorm';
import { LogbookRecord } from './logbook-record';

@Entity('airfields')
@Index('UQ_airfields_guid', ['guid'], { unique: true })
export class Airfield extends LogbookRecord {
  @Column({ type: 'text', default: '' })
  af_code!: string;

  @Column({ type: 'text', default: '' })
  af_iata!: string;

  @Column({ type: 'text', default: '' })
  af_icao!: string;

  @Column({ type: 'text', default: '' })
  af_name!: string;

  @Column({ type: 'text', default: '' })
  city!: string;

  @Column({ type: 'integer', default: 0 })
  af_cat!: number;

  @Column({ type: 'integer', default: 0 })
  tz_code!: number;

  @Column({ type: 'real', default: 0 })
  latitude!: number;

  @Column({ type: 'real', default: 0 })
  longitude!: number;

  @Column({ type: 'boolean', default: false })
  show_list!: boolean;

  @Column({ type: 'boolean', default: false })
  user_edit!: boolean;

  @Column({ type: 'integer', default: 0 })
  af_country!: number;

  @Column({ type: 'text', default: '' })
  notes!: string;

  @Column({ type: 'text', default: '' })
  notes_user!: string;

  @Column({ type: 'integer', default: 0 })
  region_user!: number;

  @Column({ type: 'integer', default: 0 })
  elevation_ft!: number;
}
