import { InMemoryUserDirectory } from '../../test/fakes/in-memory';
import { ContributorResolverService, isNoReplyEmail } from './contributor-resolver.service';

describe('isNoReplyEmail', () => {
  it.each([
    '',
    '   ',
    'noreply@example.com',
    'No-Reply@example.com',
    '123+bot@users.noreply.github.com',
    'jane@users.noreply.gitlab.com',
    'pipelines@bitbucket.org',
  ])('treats %p as no-reply', (email) => {
    expect(isNoReplyEmail(email)).toBe(true);
  });

  it('treats missing emails as no-reply', () => {
    expect(isNoReplyEmail(undefined)).toBe(true);
    expect(isNoReplyEmail(null)).toBe(true);
  });

  it.each(['alice@example.com', 'noreply.fan@example.com', 'dev@bitbucket.org.example.com'])(
    'treats %p as a person',
    (email) => {
      expect(isNoReplyEmail(email)).toBe(false);
    },
  );
});

describe('ContributorResolverService', () => {
  const directory = new InMemoryUserDirectory([{ id: 1, email: 'alice@example.com' }]);
  const resolver = new ContributorResolverService(directory);

  it('matches emails case-insensitively after trimming', async () => {
    await expect(resolver.resolve('  Alice@Example.COM ')).resolves.toEqual({
      kind: 'user',
      user: { id: 1, email: 'alice@example.com' },
    });
  });

  it('reports unknown authors', async () => {
    await expect(resolver.resolve('mallory@example.com')).resolves.toEqual({ kind: 'no_match' });
  });

  it('never looks up no-reply addresses', async () => {
    const lookup = jest.spyOn(directory, 'findByEmail');
    await expect(resolver.resolve('noreply@github.com')).resolves.toEqual({ kind: 'no_reply' });
    expect(lookup).not.toHaveBeenCalled();
    lookup.mockRestore();
  });
});
