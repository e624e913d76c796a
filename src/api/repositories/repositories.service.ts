import { ConflictException, Injectable, NotFoundException } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { Project, Repository as RepositoryMapping } from '../../database/entities';
import { normalizeRepositoryUrl } from '../../ingestion/repository-url';
import type { LinkRepositoryDto } from '../../dto/link-repository.dto';
import type { UpdateRepositoryDto } from '../../dto/update-repository.dto';

@Injectable()
export class RepositoriesService {
  constructor(private readonly dataSource: DataSource) {}

  private get repo() {
    return this.dataSource.getRepository(RepositoryMapping);
  }

  async link(projectId: number, dto: LinkRepositoryDto): Promise<RepositoryMapping> {
    const project = await this.dataSource.getRepository(Project).findOne({ where: { id: projectId } });
    if (!project) throw new NotFoundException('Project not found');

    const repositoryUrl = normalizeRepositoryUrl(dto.repository_url);
    const existing = await this.repo.findOne({ where: { repository_url: repositoryUrl } });
    if (existing) {
      throw new ConflictException(
        `Repository already linked to project ${existing.project_id}`,
      );
    }

    const mapping = this.repo.create({
      project_id: projectId,
      repository_url: repositoryUrl,
      repository_name: dto.repository_name.trim(),
      provider: dto.provider,
      is_active: dto.is_active ?? true,
    });
    return this.repo.save(mapping);
  }

  async findActiveForProject(projectId: number): Promise<RepositoryMapping[]> {
    return this.repo.find({
      where: { project_id: projectId, is_active: true },
      order: { created_at: 'DESC' },
    });
  }

  async update(id: number, dto: UpdateRepositoryDto): Promise<RepositoryMapping> {
    const mapping = await this.repo.findOne({ where: { id } });
    if (!mapping) throw new NotFoundException('Repository mapping not found');
    if (dto.is_active !== undefined) mapping.is_active = dto.is_active;
    if (dto.repository_name !== undefined) mapping.repository_name = dto.repository_name;
    return this.repo.save(mapping);
  }

  async unlink(id: number): Promise<void> {
    const result = await this.repo.delete(id);
    if (result.affected === 0) throw new NotFoundException('Repository mapping not found');
  }
}
