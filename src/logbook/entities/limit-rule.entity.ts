import { Column, Entity, Index } from 'typeorm';
import { LogbookRecord } from './logbook-record';

@Entity('limit_rules')
@Index('UQ_limit_rules_owner_code', ['user_id', 'limit_code', 'platform'], {
  unique: true,
})
export class LimitRule extends LogbookRecord {
  @Column({ type: 'varchar', length: 36 })
  limit_code!: string;

  @Column({ type: 'date', nullable: true })
  l_from!: string | null;

  @Column({ type: 'date', nullable: true })
  l_to!: string | null;

  @Column({ type: 'integer', default: 0 })
  l_type!: number;

  @Column({ type: 'integer', default: 0 })
  l_zone!: number;

  @Column({ type: 'integer', default: 0 })
  l_minutes!: number;

  @Column({ type: 'integer', default: 0 })
  l_period_code!: number;
}
