import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  ManyToOne,
  JoinColumn,
  OneToMany,
  Index,
} from 'typeorm';
import { PipelineRun } from './pipeline-run.entity';
import { JobLog } from './job-log.entity';
import type { StepResult } from '../../engine/run-result';

export type StoredStepResult = Omit<StepResult, 'stdout' | 'stderr'>;

/**
 * One job of a pipeline run and its RunResult once it finished.
 * status: pending -> running -> success | failure | cancelled.
 */
@Entity('job_runs')
@Index(['pipeline_run_id', 'position'])
export class JobRun {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  pipeline_run_id!: string;

  @ManyToOne(() => PipelineRun, (run) => run.jobs, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'pipeline_run_id' })
  pipeline_run!: PipelineRun;

  /** Job id from the declaration */
  @Column({ length: 100 })
  job_key!: string;

  @Column({ length: 255 })
  name!: string;

  /** Declaration order */
  @Column({ type: 'int', default: 0 })
  position!: number;

  @Column({ length: 50, default: 'pending' })
  status!: string;

  @Column({ type: 'int', nullable: true })
  exit_code!: number | null;

  @Column({ type: 'int', nullable: true })
  failed_step_index!: number | null;

  @Column({ length: 255, nullable: true })
  failed_step_name!: string | null;

  @Column({ length: 50, nullable: true })
  error_kind!: string | null;

  @Column('text', { nullable: true })
  error_message!: string | null;

  @Column({ length: 50, nullable: true })
  cancel_reason!: string | null;

  @Column({ length: 512, nullable: true })
  cache_key!: string | null;

  @Column({ type: 'boolean', nullable: true })
  cache_hit!: boolean | null;

  @Column({ type: 'boolean', nullable: true })
  cache_saved!: boolean | null;

  @Column('jsonb', { default: () => "'[]'" })
  steps!: StoredStepResult[];

  @Column({ type: 'timestamptz', nullable: true })
  started_at!: Date | null;

  @Column({ type: 'timestamptz', nullable: true })
  completed_at!: Date | null;

  @CreateDateColumn({ type: 'timestamptz' })
  created_at!: Date;

  @OneToMany(() => JobLog, (log) => log.job_run)
  logs!: JobLog[];
}
