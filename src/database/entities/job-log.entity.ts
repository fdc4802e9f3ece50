import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { JobRun } from './job-run.entity';

@Entity('job_logs')
@Index(['job_run_id', 'timestamp'])
export class JobLog {
  @PrimaryGeneratedColumn({ type: 'bigint' })
  id!: string;

  @Column({ type: 'uuid' })
  job_run_id!: string;

  @ManyToOne(() => JobRun, (job) => job.logs, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'job_run_id' })
  job_run!: JobRun;

  @Column({ type: 'int', nullable: true })
  step_index!: number | null;

  /** stdout | stderr | system */
  @Column({ length: 20, default: 'stdout' })
  stream!: string;

  @Column('text')
  log_line!: string;

  @Column({ type: 'timestamptz', default: () => 'CURRENT_TIMESTAMP' })
  timestamp!: Date;
}
