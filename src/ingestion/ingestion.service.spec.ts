import { InMemoryContributionStore, InMemoryUserDirectory } from '../../test/fakes/in-memory';
import { CommitInfo } from './commit-info';
import { ContributorResolverService } from './contributor-resolver.service';
import { IngestionService, IngestionTarget, PersistenceFailure } from './ingestion.service';

function commit(hash: string, authorEmail: string, overrides: Partial<CommitInfo> = {}): CommitInfo {
  return {
    hash,
    message: `commit ${hash}`,
    branch: 'main',
    timestamp: new Date('2024-03-04T10:15:30Z'),
    authorEmail,
    authorName: authorEmail.split('@')[0],
    ...overrides,
  };
}

const target: IngestionTarget = {
  projectId: 7,
  provider: 'github',
  repositoryUrl: 'https://github.com/acme/storefront',
};

describe('IngestionService', () => {
  let store: InMemoryContributionStore;
  let users: InMemoryUserDirectory;
  let service: IngestionService;

  beforeEach(() => {
    store = new InMemoryContributionStore();
    users = new InMemoryUserDirectory([
      { id: 1, email: 'alice@example.com' },
      { id: 2, email: 'bob@example.com' },
    ]);
    service = new IngestionService(new ContributorResolverService(users), store);
  });

  it('counts each commit under exactly one outcome', async () => {
    const stats = await service.ingest(
      [
        commit('aaa111', 'alice@example.com'),
        commit('bbb222', 'noreply@github.com'),
        commit('ccc333', 'stranger@example.com'),
        commit('ddd444', 'BOB@example.com'),
      ],
      target,
    );

    expect(stats).toEqual({
      created: 2,
      skipped_duplicates: 0,
      skipped_no_user: 1,
      skipped_no_reply: 1,
      total_processed: 4,
    });
    expect(store.rows.map((row) => [row.commitHash, row.userId])).toEqual([
      ['aaa111', 1],
      ['ddd444', 2],
    ]);
  });

  it('stores the normalized commit and derives a missing URL', async () => {
    await service.ingest(
      [
        commit('aaa111', 'alice@example.com'),
        commit('bbb222', 'bob@example.com', { url: 'https://example.com/custom/bbb222' }),
      ],
      target,
    );

    expect(store.rows).toEqual([
      {
        userId: 1,
        projectId: 7,
        commitHash: 'aaa111',
        branch: 'main',
        commitMessage: 'commit aaa111',
        provider: 'github',
        commitUrl: 'https://github.com/acme/storefront/commit/aaa111',
        committedAt: new Date('2024-03-04T10:15:30Z'),
      },
      expect.objectContaining({ commitHash: 'bbb222', commitUrl: 'https://example.com/custom/bbb222' }),
    ]);
  });

  it('leaves commit_url empty without an http repository URL', async () => {
    await service.ingest([commit('aaa111', 'alice@example.com')], {
      ...target,
      repositoryUrl: 'git@github.com:acme/storefront.git',
    });
    expect(store.rows[0].commitUrl).toBeNull();
  });

  it('skips commits already stored or repeated in the same delivery', async () => {
    await service.ingest([commit('aaa111', 'alice@example.com')], target);

    const stats = await service.ingest(
      [
        commit('aaa111', 'alice@example.com'),
        commit('bbb222', 'bob@example.com'),
        commit('bbb222', 'bob@example.com'),
      ],
      target,
    );

    expect(stats).toEqual({
      created: 1,
      skipped_duplicates: 2,
      skipped_no_user: 0,
      skipped_no_reply: 0,
      total_processed: 3,
    });
    expect(store.rows).toHaveLength(2);
  });

  it('stores long branch names and URLs unchanged next to ordinary commits', async () => {
    const branch = `feature/${'x'.repeat(300)}`;
    const url = `https://github.com/acme/storefront/commit/aaa111?${'q'.repeat(1200)}`;

    const stats = await service.ingest(
      [commit('aaa111', 'alice@example.com', { branch, url }), commit('bbb222', 'bob@example.com')],
      target,
    );

    expect(stats.created).toBe(2);
    expect(store.rows[0]).toEqual(expect.objectContaining({ branch, commitUrl: url }));
    expect(store.rows[1].branch).toBe('main');
  });

  it('deduplicates per project', async () => {
    await service.ingest([commit('aaa111', 'alice@example.com')], target);
    const stats = await service.ingest([commit('aaa111', 'alice@example.com')], {
      ...target,
      projectId: 8,
    });
    expect(stats.created).toBe(1);
  });

  it('counts rows lost to a concurrent delivery as duplicates', async () => {
    store.beforeInsert = (concurrent) => {
      concurrent.rows.push({
        userId: 1,
        projectId: 7,
        commitHash: 'aaa111',
        branch: 'main',
        commitMessage: 'commit aaa111',
        provider: 'github',
        commitUrl: null,
        committedAt: new Date('2024-03-04T10:15:30Z'),
      });
    };

    const stats = await service.ingest(
      [commit('aaa111', 'alice@example.com'), commit('bbb222', 'bob@example.com')],
      target,
    );

    expect(stats).toEqual({
      created: 1,
      skipped_duplicates: 1,
      skipped_no_user: 0,
      skipped_no_reply: 0,
      total_processed: 2,
    });
  });

  it('keeps going when one commit fails unexpectedly', async () => {
    users.failing.add('carol@example.com');

    const stats = await service.ingest(
      [
        commit('aaa111', 'alice@example.com'),
        commit('ccc333', 'carol@example.com'),
        commit('bbb222', 'bob@example.com'),
      ],
      target,
    );

    expect(stats).toEqual({
      created: 2,
      skipped_duplicates: 0,
      skipped_no_user: 0,
      skipped_no_reply: 0,
      total_processed: 3,
    });
  });

  it('raises PersistenceFailure and writes nothing when the batch fails', async () => {
    store.failNextInsert = true;

    await expect(
      service.ingest([commit('aaa111', 'alice@example.com')], target),
    ).rejects.toBeInstanceOf(PersistenceFailure);
    expect(store.rows).toEqual([]);
  });

  it('returns zero counts for an empty delivery', async () => {
    await expect(service.ingest([], target)).resolves.toEqual({
      created: 0,
      skipped_duplicates: 0,
      skipped_no_user: 0,
      skipped_no_reply: 0,
      total_processed: 0,
    });
  });
});
