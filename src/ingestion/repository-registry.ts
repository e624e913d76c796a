import { Injectable } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { GitProvider, Repository as RepositoryMapping } from '../database/entities';

export const REPOSITORY_REGISTRY = Symbol('REPOSITORY_REGISTRY');

export interface RepositoryRecord {
  id: number;
  projectId: number;
  repositoryUrl: string;
  repositoryName: string;
}

/** Read side of the repository mappings, as the pipeline sees it. Active mappings only. */
export interface RepositoryRegistry {
  findActiveByUrl(normalizedUrl: string): Promise<RepositoryRecord | null>;
  /** Exact name among the provider's own mappings. */
  findActiveByName(name: string, provider: GitProvider): Promise<RepositoryRecord | null>;
}

function toRecord(mapping: RepositoryMapping): RepositoryRecord {
  return {
    id: mapping.id,
    projectId: mapping.project_id,
    repositoryUrl: mapping.repository_url,
    repositoryName: mapping.repository_name,
  };
}

@Injectable()
export class TypeOrmRepositoryRegistry implements RepositoryRegistry {
  constructor(private readonly dataSource: DataSource) {}

  private get repo() {
    return this.dataSource.getRepository(RepositoryMapping);
  }

  async findActiveByUrl(normalizedUrl: string): Promise<RepositoryRecord | null> {
    const mapping = await this.repo.findOne({
      where: { repository_url: normalizedUrl, is_active: true },
    });
    return mapping ? toRecord(mapping) : null;
  }

  async findActiveByName(name: string, provider: GitProvider): Promise<RepositoryRecord | null> {
    const mapping = await this.repo.findOne({
      where: { repository_name: name, provider, is_active: true },
      order: { id: 'ASC' },
    });
    return mapping ? toRecord(mapping) : null;
  }
}
