import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  OneToMany,
  Index,
} from 'typeorm';
import { PipelineRun } from './pipeline-run.entity';

/**
 * Stored pipeline: one declaration per repository.
 * `repository` is what git webhooks are matched against; `declaration` is the YAML
 * document exactly as submitted (validated on write).
 */
@Entity('pipelines')
export class Pipeline {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ length: 255 })
  name!: string;

  @Index()
  @Column({ length: 500 })
  repository!: string;

  @Column('text')
  declaration!: string;

  @CreateDateColumn({ type: 'timestamptz' })
  created_at!: Date;

  @UpdateDateColumn({ type: 'timestamptz' })
  updated_at!: Date;

  @OneToMany(() => PipelineRun, (run) => run.pipeline)
  runs!: PipelineRun[];
}
