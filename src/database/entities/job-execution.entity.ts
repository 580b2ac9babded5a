import { Entity, PrimaryColumn, Column, ManyToOne, JoinColumn, OneToMany, Index } from 'typeorm';
import { PipelineRun } from './pipeline-run.entity';
import { StepResultRecord } from './step-result.entity';

@Entity('job_executions')
@Index(['pipeline_run_id', 'job_order'])
export class JobExecutionRecord {
  @PrimaryColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  pipeline_run_id!: string;

  @ManyToOne(() => PipelineRun, (run) => run.jobs, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'pipeline_run_id' })
  pipeline_run!: PipelineRun;

  @Column({ length: 255 })
  job_key!: string;

  @Column({ length: 255 })
  job_name!: string;

  /** Declaration order of the job in its definition (0-based) */
  @Column({ type: 'int', default: 0 })
  job_order!: number;

  @Column({ length: 50, default: 'queued' })
  status!: string;

  @Column({ type: 'varchar', length: 50, nullable: true })
  reason!: string | null;

  @Column({ type: 'varchar', length: 100, nullable: true })
  runner_id!: string | null;

  @Column({ type: 'timestamptz', nullable: true })
  started_at!: Date | null;

  @Column({ type: 'timestamptz', nullable: true })
  completed_at!: Date | null;

  @OneToMany(() => StepResultRecord, (step) => step.job_execution)
  steps!: StepResultRecord[];
}
