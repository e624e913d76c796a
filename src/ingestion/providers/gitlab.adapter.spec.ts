import { gitlabAdapter } from './gitlab.adapter';

function parsePush(value: unknown) {
  const result = gitlabAdapter.parse(Buffer.from(JSON.stringify(value)));
  if (!result.ok) throw new Error(`unexpected parse error: ${result.error.reason}`);
  return result.value;
}

describe('gitlabAdapter', () => {
  it('verifies the static token', () => {
    const body = Buffer.from('{}');
    expect(gitlabAdapter.verify(body, 'test-token', 'test-token')).toBe(true);
    expect(gitlabAdapter.verify(body, 'wrong', 'test-token')).toBe(false);
  });

  it('reports a missing commits array', () => {
    const result = gitlabAdapter.parse(Buffer.from(JSON.stringify({ ref: 'refs/heads/main' })));
    expect(result).toEqual({ ok: false, error: { reason: 'commits: Required' } });
  });

  it('reads nested and flat author forms', () => {
    const push = parsePush({
      ref: 'refs/heads/release/2.0',
      commits: [
        {
          id: 'd4e5f6a7b8c9',
          message: 'Bump version',
          timestamp: '2024-03-04T10:15:30Z',
          author: { name: 'Carol', email: 'carol@example.com' },
        },
        {
          id: 'e5f6a7b8c9d0',
          message: 'Changelog',
          timestamp: '2024-03-04T11:00:00Z',
          author_name: 'Dan',
          author_email: 'dan@example.com',
        },
      ],
    });

    const commits = gitlabAdapter.normalize(push);
    expect(commits.map(({ hash, branch, authorName, authorEmail }) => ({
      hash,
      branch,
      authorName,
      authorEmail,
    }))).toEqual([
      { hash: 'd4e5f6a7b8c9', branch: 'release/2.0', authorName: 'Carol', authorEmail: 'carol@example.com' },
      { hash: 'e5f6a7b8c9d0', branch: 'release/2.0', authorName: 'Dan', authorEmail: 'dan@example.com' },
    ]);
    expect(commits[1].timestamp).toEqual(new Date('2024-03-04T11:00:00Z'));
  });

  it('prefers the repository git URL and the project path', () => {
    const push = parsePush({
      ref: 'refs/heads/main',
      commits: [],
      project: {
        path_with_namespace: 'acme/platform',
        name: 'platform',
        web_url: 'https://gitlab.com/acme/platform',
      },
      repository: { git_http_url: 'https://gitlab.com/acme/platform.git' },
    });
    expect(gitlabAdapter.repository(push)).toEqual({
      url: 'https://gitlab.com/acme/platform.git',
      name: 'acme/platform',
    });
  });

  it('falls back to the project web URL', () => {
    const push = parsePush({
      ref: 'refs/heads/main',
      commits: [],
      project: { name: 'platform', web_url: 'https://gitlab.com/acme/platform' },
    });
    expect(gitlabAdapter.repository(push)).toEqual({
      url: 'https://gitlab.com/acme/platform',
      name: 'platform',
    });
  });
});
