import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';

/**
 * Registered pipeline: one declarative definition bound to a repository.
 * The definition is stored as authored (YAML or JSON text) and validated on write.
 */
@Entity('pipelines')
@Index(['repository'])
export class Pipeline {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ length: 255 })
  name!: string;

  /** Matched against the repository of incoming events (e.g. owner/repo) */
  @Column({ length: 500 })
  repository!: string;

  @Column('text')
  definition!: string;

  @CreateDateColumn({ type: 'timestamptz' })
  created_at!: Date;

  @UpdateDateColumn({ type: 'timestamptz' })
  updated_at!: Date;
}
