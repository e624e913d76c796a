import { Inject, Injectable, Logger } from '@nestjs/common';
import type { GitProvider } from '../database/entities';
import { REPOSITORY_REGISTRY, RepositoryRegistry } from './repository-registry';
import { normalizeRepositoryUrl, stripRepositoryUrl } from './repository-url';

export interface ResolvedRepository {
  projectId: number;
  repositoryId: number;
  /** Base for derived commit links: the incoming URL as delivered, else the stored one. */
  repositoryUrl: string;
}

@Injectable()
export class RepositoryResolverService {
  private readonly logger = new Logger(RepositoryResolverService.name);

  constructor(@Inject(REPOSITORY_REGISTRY) private readonly registry: RepositoryRegistry) {}

  /**
   * Normalized URL first, then the exact trimmed name among mappings of the
   * same provider. Inactive mappings are invisible. No fuzzy matching.
   */
  async resolve(
    provider: GitProvider,
    repositoryUrl: string | null,
    repositoryName: string | null,
  ): Promise<ResolvedRepository | null> {
    const url = repositoryUrl?.trim();
    if (url) {
      const record = await this.registry.findActiveByUrl(normalizeRepositoryUrl(url));
      if (record) {
        return {
          projectId: record.projectId,
          repositoryId: record.id,
          repositoryUrl: stripRepositoryUrl(url),
        };
      }
    }

    const name = repositoryName?.trim();
    if (name) {
      const record = await this.registry.findActiveByName(name, provider);
      if (record) {
        return {
          projectId: record.projectId,
          repositoryId: record.id,
          repositoryUrl: url ? stripRepositoryUrl(url) : record.repositoryUrl,
        };
      }
    }

    this.logger.debug(`No active ${provider} mapping for repository url=${url ?? '-'} name=${name ?? '-'}`);
    return null;
  }
}
