import {
  Column,
  CreateDateColumn,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';

/**
 * Envelope shared by every table of a logbook backup: owner, identifier,
 * producing platform and revision stamp.
 */
export abstract class LogbookRecord {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'integer' })
  user_id!: number;

  @Column({ type: 'varchar', length: 36 })
  guid!: string;

  @Column({ type: 'integer' })
  platform!: number;

  @Column({ name: '_modified', type: 'integer', default: 0 })
  modified!: number; // revision stamp from the producing app

  @Column({ type: 'integer', default: 0 })
  record_modified!: number;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
