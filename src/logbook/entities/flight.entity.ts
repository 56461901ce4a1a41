import { Column, Entity, Index, JoinColumn, ManyToOne } from 'typeorm';
import { decimalTransformer } from '../../common/utils/decimal.transformer';
import { LogbookRecord } from './logbook-record';
import { Aircraft } from './aircraft.entity';

const hours = () =>
  Column({
    type: 'decimal',
    precision: 10,
    scale: 2,
    nullable: true,
    transformer: decimalTransformer,
  });

const clock = () => Column({ type: 'integer', nullable: true });

const counter = () => Column({ type: 'integer', nullable: true });

@Entity('flights')
@Index('UQ_flights_guid', ['guid'], { unique: true })
export class Flight extends LogbookRecord {
  @ManyToOne(() => Aircraft, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'aircraft_id' })
  aircraft!: Aircraft | null;

  @Column({ type: 'date', nullable: true })
  date!: string | null; // YYYY-MM-DD

  @Column({ type: 'text', default: '' })
  from_airport!: string;

  @Column({ type: 'text', default: '' })
  to_airport!: string;

  @Column({ type: 'text', default: '' })
  route!: string;

  @clock()
  time_out!: number | null;

  @clock()
  time_off!: number | null;

  @clock()
  time_on!: number | null;

  @clock()
  time_in!: number | null;

  @clock()
  on_duty!: number | null;

  @clock()
  off_duty!: number | null;

  @hours()
  total_time!: number | null;

  @hours()
  pic!: number | null;

  @hours()
  sic!: number | null;

  @hours()
  night!: number | null;

  @hours()
  solo!: number | null;

  @hours()
  cross_country!: number | null;

  @hours()
  nvg!: number | null;

  @hours()
  nvg_ops!: number | null;

  @hours()
  distance!: number | null;

  @counter()
  day_takeoffs!: number | null;

  @counter()
  day_landings_full_stop!: number | null;

  @counter()
  night_takeoffs!: number | null;

  @counter()
  night_landings_full_stop!: number | null;

  @counter()
  all_landings!: number | null;

  @hours()
  actual_instrument!: number | null;

  @hours()
  simulated_instrument!: number | null;

  @hours()
  hobbs_start!: number | null;

  @hours()
  hobbs_end!: number | null;

  @hours()
  tach_start!: number | null;

  @hours()
  tach_end!: number | null;

  @counter()
  holds!: number | null;

  @Column({ type: 'text', default: '' })
  approach1!: string;

  @Column({ type: 'text', default: '' })
  approach2!: string;

  @Column({ type: 'text', default: '' })
  approach3!: string;

  @Column({ type: 'text', default: '' })
  approach4!: string;

  @Column({ type: 'text', default: '' })
  approach5!: string;

  @Column({ type: 'text', default: '' })
  approach6!: string;

  @hours()
  dual_given!: number | null;

  @hours()
  dual_received!: number | null;

  @hours()
  simulated_flight!: number | null;

  @hours()
  ground_training!: number | null;

  @Column({ type: 'text', default: '' })
  instructor_name!: string;

  @Column({ type: 'text', default: '' })
  instructor_comments!: string;

  @Column({ type: 'text', default: '' })
  pilot_comments!: string;

  @Column({ type: 'boolean', default: false })
  flight_review!: boolean;

  @Column({ type: 'boolean', default: false })
  checkride!: boolean;

  @Column({ type: 'boolean', default: false })
  ipc!: boolean;

  @Column({ type: 'boolean', default: false })
  nvg_proficiency!: boolean;
}
