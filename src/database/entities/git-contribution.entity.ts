import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  ManyToOne,
  JoinColumn,
  Index,
  Unique,
} from 'typeorm';
import { User } from './user.entity';
import { Project } from './project.entity';
import { Task } from './task.entity';
import { GIT_PROVIDERS, GitProvider } from './git-provider';

/**
 * One commit attributed to a user within a project.
 * (project_id, commit_hash) is unique: redelivered webhooks insert nothing new.
 */
@Entity('git_contributions')
@Unique('uq_git_contributions_project_commit', ['project_id', 'commit_hash'])
@Index(['user_id'])
@Index(['task_id'])
export class GitContribution {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'int', nullable: true })
  user_id!: number | null;

  @ManyToOne(() => User, { onDelete: 'SET NULL', nullable: true })
  @JoinColumn({ name: 'user_id' })
  user!: User | null;

  @Column({ type: 'int' })
  project_id!: number;

  @ManyToOne(() => Project, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'project_id' })
  project!: Project;

  @Column({ type: 'int', nullable: true })
  task_id!: number | null;

  @ManyToOne(() => Task, { onDelete: 'SET NULL', nullable: true })
  @JoinColumn({ name: 'task_id' })
  task!: Task | null;

  // Unbounded: git puts no limit on ref names, and providers none on URLs.
  @Column({ type: 'text' })
  commit_hash!: string;

  @Column({ type: 'text', nullable: true })
  branch!: string | null;

  @Column({ type: 'text', nullable: true })
  commit_message!: string | null;

  @Column({ type: 'enum', enum: [...GIT_PROVIDERS], enumName: 'git_provider' })
  provider!: GitProvider;

  @Column({ type: 'text', nullable: true })
  commit_url!: string | null;

  /** Author timestamp as delivered by the provider. */
  @Column({ type: 'timestamptz', nullable: true })
  committed_at!: Date | null;

  @CreateDateColumn({ type: 'timestamptz' })
  created_at!: Date;
}
