import { BadRequestException, Injectable, NotFoundException } from '@nestjs/common';
import { DataSource, FindOptionsWhere } from 'typeorm';
import { GIT_PROVIDERS, GitContribution, GitProvider, Task } from '../../database/entities';

export interface ContributionFilters {
  projectId?: number;
  userId?: number;
  provider?: string;
}

function isGitProvider(value: string): value is GitProvider {
  return GIT_PROVIDERS.some((provider) => provider === value);
}

@Injectable()
export class ContributionsService {
  constructor(private readonly dataSource: DataSource) {}

  private get repo() {
    return this.dataSource.getRepository(GitContribution);
  }

  async findAll(filters: ContributionFilters): Promise<GitContribution[]> {
    const where: FindOptionsWhere<GitContribution> = {};
    if (filters.projectId !== undefined) where.project_id = filters.projectId;
    if (filters.userId !== undefined) where.user_id = filters.userId;
    if (filters.provider !== undefined) {
      const provider = filters.provider.trim().toLowerCase();
      if (!isGitProvider(provider)) {
        throw new BadRequestException(`provider must be one of ${GIT_PROVIDERS.join(', ')}`);
      }
      where.provider = provider;
    }
    return this.repo.find({ where, order: { created_at: 'DESC', id: 'DESC' } });
  }

  async findOne(id: number): Promise<GitContribution | null> {
    return this.repo.findOne({ where: { id } });
  }

  /** Sets or clears (taskId null) the task a contribution is attributed to. */
  async linkTask(id: number, taskId: number | null): Promise<GitContribution> {
    const contribution = await this.findOne(id);
    if (!contribution) throw new NotFoundException('Contribution not found');

    if (taskId !== null) {
      const task = await this.dataSource.getRepository(Task).findOne({ where: { id: taskId } });
      if (!task || task.project_id !== contribution.project_id) {
        throw new BadRequestException('Task does not belong to the contribution project');
      }
    }

    contribution.task_id = taskId;
    return this.repo.save(contribution);
  }
}
