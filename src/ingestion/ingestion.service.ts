import { Inject, Injectable, Logger } from '@nestjs/common';
import type { GitProvider } from '../database/entities';
import { CommitInfo, shortHash } from './commit-info';
import { buildCommitUrl } from './commit-url';
import { CONTRIBUTION_STORE, ContributionStore, NewContribution } from './contribution-store';
import { ContributorResolverService } from './contributor-resolver.service';

export interface IngestionTarget {
  projectId: number;
  provider: GitProvider;
  repositoryUrl: string | null;
}

export interface IngestionStats {
  created: number;
  skipped_duplicates: number;
  skipped_no_user: number;
  skipped_no_reply: number;
  total_processed: number;
}

/** The batch transaction failed; nothing from the delivery was written. */
export class PersistenceFailure extends Error {
  constructor(options?: { cause?: unknown }) {
    super('Failed to persist contributions', options);
    this.name = 'PersistenceFailure';
  }
}

@Injectable()
export class IngestionService {
  private readonly logger = new Logger(IngestionService.name);

  constructor(
    private readonly contributors: ContributorResolverService,
    @Inject(CONTRIBUTION_STORE) private readonly store: ContributionStore,
  ) {}

  /**
   * Resolves, deduplicates and persists the commits of one delivery. A commit
   * that fails unexpectedly is logged and counted only in total_processed;
   * the rest of the batch goes on.
   */
  async ingest(commits: CommitInfo[], target: IngestionTarget): Promise<IngestionStats> {
    const stats: IngestionStats = {
      created: 0,
      skipped_duplicates: 0,
      skipped_no_user: 0,
      skipped_no_reply: 0,
      total_processed: commits.length,
    };
    const staged = new Map<string, NewContribution>();

    for (const commit of commits) {
      try {
        const contributor = await this.contributors.resolve(commit.authorEmail);
        if (contributor.kind === 'no_reply') {
          this.logger.debug(`Skipping ${shortHash(commit.hash)}: no-reply author`);
          stats.skipped_no_reply += 1;
          continue;
        }
        if (contributor.kind === 'no_match') {
          this.logger.debug(`Skipping ${shortHash(commit.hash)}: no user for ${commit.authorEmail}`);
          stats.skipped_no_user += 1;
          continue;
        }

        if (staged.has(commit.hash) || (await this.store.exists(target.projectId, commit.hash))) {
          stats.skipped_duplicates += 1;
          continue;
        }

        staged.set(commit.hash, {
          userId: contributor.user.id,
          projectId: target.projectId,
          commitHash: commit.hash,
          branch: commit.branch,
          commitMessage: commit.message,
          provider: target.provider,
          commitUrl: commit.url ?? buildCommitUrl(target.provider, target.repositoryUrl, commit.hash),
          committedAt: commit.timestamp,
        });
      } catch (error) {
        this.logger.error(
          `Failed to process ${target.provider} commit ${shortHash(commit.hash)}`,
          error instanceof Error ? error.stack : String(error),
        );
      }
    }

    const rows = [...staged.values()];
    let inserted: string[];
    try {
      inserted = await this.store.insertBatch(rows);
    } catch (error) {
      this.logger.error(
        `Rolled back ${rows.length} contribution(s) for project ${target.projectId}`,
        error instanceof Error ? error.stack : String(error),
      );
      throw new PersistenceFailure({ cause: error });
    }

    stats.created = inserted.length;
    // Lost a race against a concurrent delivery of the same commits.
    stats.skipped_duplicates += rows.length - inserted.length;
    return stats;
  }
}
