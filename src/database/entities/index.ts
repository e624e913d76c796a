/**
 * Database entities: users, projects, tasks, repositories, git_contributions.
 */
export { User } from './user.entity';
export { Project } from './project.entity';
export { Task } from './task.entity';
export { Repository } from './repository.entity';
export { GitContribution } from './git-contribution.entity';
export { GIT_PROVIDERS } from './git-provider';
export type { GitProvider } from './git-provider';
