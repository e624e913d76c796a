import { GitLabPushPayload, gitlabPushSchema } from '../dto';
import type { CommitInfo } from '../commit-info';
import { extractBranch, resolveCommitTimestamp, skipCommitWithoutHash } from '../normalize';
import { verifyToken } from '../signature';
import { ProviderAdapter, decodePayload, firstText } from './provider-adapter';

/** GitLab authenticates with a static token, not an HMAC. */
export const gitlabAdapter: ProviderAdapter<GitLabPushPayload> = {
  provider: 'gitlab',
  eventHeader: 'x-gitlab-event',
  pushEvent: 'Push Hook',
  credentialHeader: 'x-gitlab-token',
  authFailureDetail: 'Invalid token',

  verify(_rawBody, credential, secret) {
    return verifyToken(credential, secret);
  },

  parse(rawBody) {
    return decodePayload(rawBody, gitlabPushSchema);
  },

  normalize(push) {
    const branch = extractBranch(push.ref);
    const commits: CommitInfo[] = [];

    push.commits.forEach((commit, index) => {
      const hash = firstText(commit?.id);
      if (!commit || !hash) {
        skipCommitWithoutHash('gitlab', index);
        return;
      }

      commits.push({
        hash,
        message: commit.message ?? '',
        branch,
        timestamp: resolveCommitTimestamp(commit.timestamp, 'gitlab', hash),
        authorEmail: firstText(commit.author?.email, commit.author_email) ?? '',
        authorName: firstText(commit.author?.name, commit.author_name) ?? '',
        url: firstText(commit.url) ?? undefined,
      });
    });

    return commits;
  },

  repository(push) {
    return {
      url: firstText(push.repository?.git_http_url, push.repository?.url, push.project?.web_url),
      name: firstText(push.project?.path_with_namespace, push.project?.name),
    };
  },
};
