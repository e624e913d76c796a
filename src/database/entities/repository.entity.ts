import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { Project } from './project.entity';
import { GIT_PROVIDERS, GitProvider } from './git-provider';

/**
 * Repository → project mapping used to route incoming push webhooks.
 * repository_url is stored normalized (lower-cased, no trailing slash or .git).
 */
@Entity('repositories')
@Index(['project_id', 'is_active'])
export class Repository {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'int' })
  project_id!: number;

  @ManyToOne(() => Project, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'project_id' })
  project!: Project;

  @Column({ type: 'varchar', length: 500, unique: true })
  repository_url!: string;

  @Column({ type: 'varchar', length: 255 })
  repository_name!: string;

  @Column({ type: 'enum', enum: [...GIT_PROVIDERS], enumName: 'git_provider' })
  provider!: GitProvider;

  @Column({ type: 'boolean', default: true })
  is_active!: boolean;

  @CreateDateColumn({ type: 'timestamptz' })
  created_at!: Date;

  @UpdateDateColumn({ type: 'timestamptz' })
  updated_at!: Date;
}
