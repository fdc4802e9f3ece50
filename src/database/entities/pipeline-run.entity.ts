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
import { Pipeline } from './pipeline.entity';
import { JobRun } from './job-run.entity';

/**
 * One execution of a pipeline (git push, pull request or manual trigger).
 * status: pending -> running -> succeeded | failed.
 */
@Entity('pipeline_runs')
@Index(['pipeline_id', 'created_at'])
export class PipelineRun {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  pipeline_id!: string;

  @ManyToOne(() => Pipeline, (p) => p.runs, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'pipeline_id' })
  pipeline!: Pipeline;

  @Column({ length: 50 })
  trigger_type!: string;

  /** ref, commit, repository of the triggering event */
  @Column('jsonb', { nullable: true })
  trigger_metadata!: Record<string, unknown> | null;

  @Column({ length: 50, default: 'pending' })
  status!: string;

  @Column('jsonb', { default: () => "'[]'" })
  failed_jobs!: string[];

  @Column({ default: false })
  cancelled!: boolean;

  @Column({ type: 'timestamptz', nullable: true })
  started_at!: Date | null;

  @Column({ type: 'timestamptz', nullable: true })
  completed_at!: Date | null;

  @CreateDateColumn({ type: 'timestamptz' })
  created_at!: Date;

  @OneToMany(() => JobRun, (job) => job.pipeline_run)
  jobs!: JobRun[];
}
