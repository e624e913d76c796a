import { Logger } from '@nestjs/common';
import { BitbucketCommit, BitbucketPushPayload, bitbucketPushSchema } from '../dto';
import type { CommitInfo } from '../commit-info';
import {
  AuthorIdentity,
  parseRawAuthor,
  resolveCommitTimestamp,
  skipCommitWithoutHash,
} from '../normalize';
import { verifyHmacSignature } from '../signature';
import { ProviderAdapter, decodePayload, firstText } from './provider-adapter';

const logger = new Logger('BitbucketAdapter');

/** Branch of a push: the `new` side of its first change. */
export function bitbucketBranch(push: BitbucketPushPayload): string | null {
  return firstText(push.push.changes[0]?.new?.name);
}

function bitbucketAuthor(commit: BitbucketCommit): AuthorIdentity {
  const fromRaw = commit.author?.raw ? parseRawAuthor(commit.author.raw) : { name: '', email: '' };
  if (fromRaw.email) return fromRaw;

  const user = commit.author?.user;
  return {
    name: firstText(fromRaw.name, user?.display_name) ?? '',
    email: firstText(user?.email_address, user?.email) ?? '',
  };
}

/**
 * Bitbucket nests commits under push.changes[].new.commits[] and carries the
 * branch on the change rather than a ref. Signature is the bare hex HMAC.
 */
export const bitbucketAdapter: ProviderAdapter<BitbucketPushPayload> = {
  provider: 'bitbucket',
  eventHeader: 'x-event-key',
  pushEvent: 'repo:push',
  credentialHeader: 'x-hub-signature',
  authFailureDetail: 'Invalid signature',

  verify(rawBody, credential, secret) {
    return verifyHmacSignature(rawBody, credential, secret);
  },

  parse(rawBody) {
    return decodePayload(rawBody, bitbucketPushSchema);
  },

  normalize(push) {
    const branch = bitbucketBranch(push);
    if (!branch) {
      logger.warn('Could not extract branch from Bitbucket payload; nothing to ingest');
      return [];
    }

    const delivered = push.push.changes.flatMap((change) => change?.new?.commits ?? []);
    const commits: CommitInfo[] = [];

    delivered.forEach((commit, index) => {
      const hash = firstText(commit?.hash);
      if (!commit || !hash) {
        skipCommitWithoutHash('bitbucket', index);
        return;
      }

      const author = bitbucketAuthor(commit);
      commits.push({
        hash,
        message: commit.message ?? '',
        branch,
        timestamp: resolveCommitTimestamp(firstText(commit.date, commit.timestamp), 'bitbucket', hash),
        authorEmail: author.email,
        authorName: author.name,
        url: firstText(commit.links?.html?.href) ?? undefined,
      });
    });

    return commits;
  },

  repository(push) {
    return {
      url: firstText(push.repository?.links?.html?.href),
      name: firstText(push.repository?.full_name, push.repository?.name),
    };
  },
};
