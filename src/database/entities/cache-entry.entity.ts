import { Entity, PrimaryColumn, Column, CreateDateColumn, UpdateDateColumn } from 'typeorm';

/**
 * Backing table of the postgres cache store. Declared here so synchronize creates it;
 * reads and writes go through PostgresCacheStore's raw pool.
 */
@Entity('cache_entries')
export class CacheEntry {
  @PrimaryColumn({ length: 512 })
  key!: string;

  @Column('bytea')
  data!: Buffer;

  @Column({ type: 'int', default: 0 })
  size_bytes!: number;

  @CreateDateColumn({ type: 'timestamptz' })
  created_at!: Date;

  @UpdateDateColumn({ type: 'timestamptz' })
  updated_at!: Date;
}
