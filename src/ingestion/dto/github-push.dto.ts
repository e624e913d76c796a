import { z } from 'zod';

// Anything not needed to build a CommitInfo is dropped; a malformed optional
// field degrades to undefined/null instead of rejecting the delivery.
const optionalText = z.string().nullish().catch(undefined);

const githubIdentitySchema = z
  .object({
    name: optionalText,
    email: optionalText,
    date: optionalText,
  })
  .nullish()
  .catch(null);

export const githubCommitSchema = z.object({
  id: optionalText,
  sha: optionalText,
  message: optionalText,
  timestamp: optionalText,
  url: optionalText,
  author: githubIdentitySchema,
  committer: githubIdentitySchema,
});

export const githubPushSchema = z.object({
  ref: z.string().min(1, 'ref is required'),
  commits: z.array(githubCommitSchema.nullable().catch(null)),
  repository: z
    .object({
      clone_url: optionalText,
      html_url: optionalText,
      url: optionalText,
      full_name: optionalText,
      name: optionalText,
    })
    .nullish()
    .catch(null),
});

export type GitHubCommit = z.infer<typeof githubCommitSchema>;
export type GitHubPushPayload = z.infer<typeof githubPushSchema>;
