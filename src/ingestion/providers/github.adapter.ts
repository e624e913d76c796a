import { GitHubPushPayload, githubPushSchema } from '../dto';
import type { CommitInfo } from '../commit-info';
import { extractBranch, resolveCommitTimestamp, skipCommitWithoutHash } from '../normalize';
import { verifyHmacSignature } from '../signature';
import { ProviderAdapter, decodePayload, firstText } from './provider-adapter';

export const githubAdapter: ProviderAdapter<GitHubPushPayload> = {
  provider: 'github',
  eventHeader: 'x-github-event',
  pushEvent: 'push',
  credentialHeader: 'x-hub-signature-256',
  authFailureDetail: 'Invalid signature',

  verify(rawBody, credential, secret) {
    return verifyHmacSignature(rawBody, credential, secret, 'sha256=');
  },

  parse(rawBody) {
    return decodePayload(rawBody, githubPushSchema);
  },

  normalize(push) {
    const branch = extractBranch(push.ref);
    const commits: CommitInfo[] = [];

    push.commits.forEach((commit, index) => {
      const hash = firstText(commit?.id, commit?.sha);
      if (!commit || !hash) {
        skipCommitWithoutHash('github', index);
        return;
      }

      // Author block first; the committer only stands in when the author has no email.
      const identity =
        [commit.author, commit.committer].find((candidate) => firstText(candidate?.email)) ??
        commit.author ??
        commit.committer;

      commits.push({
        hash,
        message: commit.message ?? '',
        branch,
        timestamp: resolveCommitTimestamp(
          firstText(commit.timestamp, commit.author?.date, commit.committer?.date),
          'github',
          hash,
        ),
        authorEmail: firstText(identity?.email) ?? '',
        authorName: firstText(identity?.name) ?? '',
        url: firstText(commit.url) ?? undefined,
      });
    });

    return commits;
  },

  repository(push) {
    const repo = push.repository;
    return {
      url: firstText(repo?.clone_url, repo?.html_url, repo?.url),
      name: firstText(repo?.full_name, repo?.name),
    };
  },
};
