import { createHmac } from 'node:crypto';
import { bitbucketAdapter } from './bitbucket.adapter';

function parsePush(value: unknown) {
  const result = bitbucketAdapter.parse(Buffer.from(JSON.stringify(value)));
  if (!result.ok) throw new Error(`unexpected parse error: ${result.error.reason}`);
  return result.value;
}

describe('bitbucketAdapter', () => {
  it('verifies the bare hex signature', () => {
    const body = Buffer.from('{"push":{"changes":[]}}');
    const digest = createHmac('sha256', 'test-secret').update(body).digest('hex');
    expect(bitbucketAdapter.verify(body, digest, 'test-secret')).toBe(true);
    expect(bitbucketAdapter.verify(body, `sha256=${digest}`, 'test-secret')).toBe(false);
  });

  it('requires push.changes', () => {
    expect(bitbucketAdapter.parse(Buffer.from('{"push":{}}'))).toEqual({
      ok: false,
      error: { reason: 'push.changes: Required' },
    });
  });

  it('collects commits of every change under the first branch name', () => {
    const push = parsePush({
      push: {
        changes: [
          {
            new: {
              name: 'develop',
              commits: [
                {
                  hash: 'f00dfeed1234',
                  message: 'Fix cart total',
                  date: '2024-03-04T10:15:30+00:00',
                  author: { raw: 'Erin Example <erin@example.com>' },
                  links: { html: { href: 'https://bitbucket.org/acme/shop/commits/f00dfeed1234' } },
                },
              ],
            },
          },
          {
            new: {
              name: 'hotfix',
              commits: [
                {
                  hash: 'beadfeed5678',
                  message: 'Guard null',
                  date: '2024-03-04T12:00:00+00:00',
                  author: {
                    raw: 'Frank',
                    user: { display_name: 'Frank F.', email_address: 'frank@example.com' },
                  },
                },
              ],
            },
          },
        ],
      },
    });

    expect(bitbucketAdapter.normalize(push)).toEqual([
      {
        hash: 'f00dfeed1234',
        message: 'Fix cart total',
        branch: 'develop',
        timestamp: new Date('2024-03-04T10:15:30Z'),
        authorEmail: 'erin@example.com',
        authorName: 'Erin Example',
        url: 'https://bitbucket.org/acme/shop/commits/f00dfeed1234',
      },
      {
        hash: 'beadfeed5678',
        message: 'Guard null',
        branch: 'develop',
        timestamp: new Date('2024-03-04T12:00:00Z'),
        authorEmail: 'frank@example.com',
        authorName: 'Frank',
        url: undefined,
      },
    ]);
  });

  it('yields no commits when the branch is missing', () => {
    const push = parsePush({
      push: { changes: [{ new: null }, { new: { name: 'main', commits: [{ hash: 'abc' }] } }] },
    });
    expect(bitbucketAdapter.normalize(push)).toEqual([]);
  });

  it('reads the repository link and full name', () => {
    const push = parsePush({
      push: { changes: [] },
      repository: {
        full_name: 'acme/shop',
        name: 'shop',
        links: { html: { href: 'https://bitbucket.org/acme/shop' } },
      },
    });
    expect(bitbucketAdapter.repository(push)).toEqual({
      url: 'https://bitbucket.org/acme/shop',
      name: 'acme/shop',
    });
  });
});
