import { Column, Entity, Index } from 'typeorm';
import { LogbookRecord } from './logbook-record';

@Entity('setting_configs')
@Index('UQ_setting_configs_guid', ['guid'], { unique: true })
export class SettingConfig extends LogbookRecord {
  @Column({ type: 'integer', default: 0 })
  @Index()
  config_code!: number;

  @Column({ type: 'text', default: '' })
  name!: string;

  @Column({ name: 'group_name', type: 'text', default: '' })
  group!: string;

  @Column({ type: 'text', default: '' })
  data!: string;
}
