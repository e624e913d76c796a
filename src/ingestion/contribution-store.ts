import { Injectable } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { GitContribution, GitProvider } from '../database/entities';

export const CONTRIBUTION_STORE = Symbol('CONTRIBUTION_STORE');

export interface NewContribution {
  userId: number;
  projectId: number;
  commitHash: string;
  branch: string;
  commitMessage: string;
  provider: GitProvider;
  commitUrl: string | null;
  committedAt: Date;
}

export interface ContributionStore {
  exists(projectId: number, commitHash: string): Promise<boolean>;
  /**
   * Inserts all rows in one transaction, skipping those whose
   * (project_id, commit_hash) already exists. Resolves to the hashes actually
   * inserted; rejects (with nothing written) when the transaction fails.
   */
  insertBatch(rows: NewContribution[]): Promise<string[]>;
}

@Injectable()
export class TypeOrmContributionStore implements ContributionStore {
  constructor(private readonly dataSource: DataSource) {}

  async exists(projectId: number, commitHash: string): Promise<boolean> {
    const count = await this.dataSource
      .getRepository(GitContribution)
      .count({ where: { project_id: projectId, commit_hash: commitHash } });
    return count > 0;
  }

  async insertBatch(rows: NewContribution[]): Promise<string[]> {
    if (rows.length === 0) return [];

    return this.dataSource.transaction(async (manager) => {
      const inserted: string[] = [];
      for (const row of rows) {
        const result = await manager.query<Array<{ commit_hash: string }>>(
          `
          INSERT INTO git_contributions
            (user_id, project_id, commit_hash, branch, commit_message, provider, commit_url, committed_at)
          VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
          ON CONFLICT (project_id, commit_hash) DO NOTHING
          RETURNING commit_hash
          `,
          [
            row.userId,
            row.projectId,
            row.commitHash,
            row.branch,
            row.commitMessage,
            row.provider,
            row.commitUrl,
            row.committedAt,
          ],
        );
        if (result.length > 0) inserted.push(result[0].commit_hash);
      }
      return inserted;
    });
  }
}
