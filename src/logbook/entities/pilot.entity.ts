import { Column, Entity, Index } from 'typeorm';
import { LogbookRecord } from './logbook-record';

@Entity('pilots')
@Index('UQ_pilots_guid', ['guid'], { unique: true })
export class Pilot extends LogbookRecord {
  @Column({ type: 'text', default: '' })
  notes!: string;

  @Column({ type: 'boolean', default: false })
  active!: boolean;

  @Column({ type: 'text', default: '' })
  company!: string;

  @Column({ type: 'boolean', default: false })
  fav_list!: boolean;

  @Column({ type: 'text', default: '' })
  user_api!: string;

  @Column({ type: 'text', default: '' })
  facebook!: string;

  @Column({ type: 'text', default: '' })
  linkedin!: string;

  @Column({ type: 'text', default: '' })
  pilot_ref!: string;

  @Column({ type: 'text', default: '' })
  pilot_code!: string;

  @Column({ type: 'text', default: '' })
  pilot_name!: string;

  @Column({ type: 'text', default: '' })
  pilot_email!: string;

  @Column({ type: 'text', default: '' })
  pilot_phone!: string;

  @Column({ type: 'text', default: '' })
  certificate!: string;

  @Column({ type: 'text', default: '' })
  phone_search!: string;

  @Column({ type: 'text', default: '' })
  pilot_search!: string;

  @Column({ type: 'text', default: '' })
  roster_alias!: string;
}
