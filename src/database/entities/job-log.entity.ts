import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { JobExecutionRecord } from './job-execution.entity';

@Entity('job_logs')
@Index(['job_execution_id', 'step_index', 'id'])
export class JobLog {
  @PrimaryGeneratedColumn({ type: 'bigint' })
  id!: string;

  @Column({ type: 'uuid' })
  job_execution_id!: string;

  @ManyToOne(() => JobExecutionRecord, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'job_execution_id' })
  job_execution!: JobExecutionRecord;

  @Column({ type: 'int' })
  step_index!: number;

  @Column({ length: 255 })
  step_name!: string;

  /** stdout, stderr, or system (orchestrator notes) */
  @Column({ length: 20, default: 'stdout' })
  stream!: string;

  @Column('text')
  log_line!: string;

  @Column({ type: 'timestamptz', default: () => 'CURRENT_TIMESTAMP' })
  timestamp!: Date;
}
