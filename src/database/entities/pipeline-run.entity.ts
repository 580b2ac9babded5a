import { Entity, PrimaryColumn, Column, CreateDateColumn, OneToMany, Index } from 'typeorm';
import { JobExecutionRecord } from './job-execution.entity';

/**
 * One execution of a pipeline. The id is assigned by the scheduler at admission;
 * the row mirrors the in-memory run and outlives the process.
 */
@Entity('pipeline_runs')
@Index(['repository', 'branch', 'created_at'])
@Index(['status'])
export class PipelineRun {
  @PrimaryColumn('uuid')
  id!: string;

  @Column({ type: 'uuid', nullable: true })
  pipeline_id!: string | null;

  @Column({ length: 255 })
  pipeline_name!: string;

  @Column({ length: 500 })
  repository!: string;

  @Column({ length: 255 })
  branch!: string;

  @Column({ length: 64 })
  commit_sha!: string;

  @Column({ length: 50 })
  event_type!: string;

  /** sender, pull request number, base branch, commit message */
  @Column('jsonb', { default: {} })
  trigger_metadata!: Record<string, unknown>;

  @Column({ length: 50, default: 'queued' })
  status!: string;

  @Column({ type: 'varchar', length: 50, nullable: true })
  reason!: string | null;

  @CreateDateColumn({ type: 'timestamptz' })
  created_at!: Date;

  @Column({ type: 'timestamptz', nullable: true })
  started_at!: Date | null;

  @Column({ type: 'timestamptz', nullable: true })
  completed_at!: Date | null;

  @OneToMany(() => JobExecutionRecord, (job) => job.pipeline_run)
  jobs!: JobExecutionRecord[];
}
