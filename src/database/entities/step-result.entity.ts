import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, JoinColumn, Index } from 'typeorm';
import { JobExecutionRecord } from './job-execution.entity';

@Entity('step_results')
@Index(['job_execution_id', 'step_index'], { unique: true })
export class StepResultRecord {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  job_execution_id!: string;

  @ManyToOne(() => JobExecutionRecord, (job) => job.steps, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'job_execution_id' })
  job_execution!: JobExecutionRecord;

  @Column({ type: 'int' })
  step_index!: number;

  @Column({ length: 255 })
  step_name!: string;

  @Column({ length: 50 })
  status!: string;

  @Column({ type: 'varchar', length: 50, nullable: true })
  reason!: string | null;

  @Column({ type: 'int', nullable: true })
  exit_code!: number | null;

  @Column({ length: 255 })
  output_ref!: string;

  @Column('jsonb', { default: [] })
  output_tail!: string[];

  @Column({ type: 'int', default: 1 })
  attempts!: number;

  @Column({ type: 'int' })
  duration_ms!: number;

  @Column({ type: 'timestamptz' })
  started_at!: Date;

  @Column({ type: 'timestamptz' })
  completed_at!: Date;
}
