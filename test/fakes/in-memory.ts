import type { GitProvider } from '../../src/database/entities';
import { ContributionStore, NewContribution } from '../../src/ingestion/contribution-store';
import { RepositoryRecord, RepositoryRegistry } from '../../src/ingestion/repository-registry';
import { ContributorUser, UserDirectory } from '../../src/ingestion/user-directory';

export class InMemoryContributionStore implements ContributionStore {
  rows: NewContribution[] = [];
  /** Makes the next insertBatch fail without writing anything. */
  failNextInsert = false;
  /** Runs right before a batch is written, e.g. to let a concurrent delivery win. */
  beforeInsert?: (store: InMemoryContributionStore) => void;

  async exists(projectId: number, commitHash: string): Promise<boolean> {
    return this.rows.some((row) => row.projectId === projectId && row.commitHash === commitHash);
  }

  async insertBatch(rows: NewContribution[]): Promise<string[]> {
    if (this.failNextInsert) {
      this.failNextInsert = false;
      throw new Error('connection terminated');
    }
    this.beforeInsert?.(this);

    const inserted: string[] = [];
    for (const row of rows) {
      if (await this.exists(row.projectId, row.commitHash)) continue;
      this.rows.push(row);
      inserted.push(row.commitHash);
    }
    return inserted;
  }
}

export class InMemoryUserDirectory implements UserDirectory {
  /** Lookups for these emails throw, standing in for an unexpected per-commit failure. */
  readonly failing = new Set<string>();

  constructor(private readonly users: ContributorUser[] = []) {}

  async findByEmail(email: string): Promise<ContributorUser | null> {
    const wanted = email.toLowerCase();
    if (this.failing.has(wanted)) throw new Error(`lookup failed for ${email}`);
    return this.users.find((user) => user.email.toLowerCase() === wanted) ?? null;
  }
}

export interface StoredMapping extends RepositoryRecord {
  provider: GitProvider;
  isActive: boolean;
}

export class InMemoryRepositoryRegistry implements RepositoryRegistry {
  /** Makes every lookup fail, as with the database unreachable. */
  unavailable = false;

  constructor(private readonly mappings: StoredMapping[] = []) {}

  async findActiveByUrl(normalizedUrl: string): Promise<RepositoryRecord | null> {
    if (this.unavailable) throw new Error('connection refused');
    return this.active().find((mapping) => mapping.repositoryUrl === normalizedUrl) ?? null;
  }

  async findActiveByName(name: string, provider: GitProvider): Promise<RepositoryRecord | null> {
    if (this.unavailable) throw new Error('connection refused');
    return (
      this.active().find(
        (mapping) => mapping.repositoryName === name && mapping.provider === provider,
      ) ?? null
    );
  }

  private active(): StoredMapping[] {
    return this.mappings.filter((mapping) => mapping.isActive);
  }
}
