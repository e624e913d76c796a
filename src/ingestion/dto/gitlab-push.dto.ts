import { z } from 'zod';

const optionalText = z.string().nullish().catch(undefined);

export const gitlabCommitSchema = z.object({
  id: optionalText,
  message: optionalText,
  timestamp: optionalText,
  url: optionalText,
  author: z
    .object({
      name: optionalText,
      email: optionalText,
    })
    .nullish()
    .catch(null),
  // Flat form used by older GitLab releases and some self-hosted proxies.
  author_name: optionalText,
  author_email: optionalText,
});

export const gitlabPushSchema = z.object({
  ref: z.string().min(1, 'ref is required'),
  commits: z.array(gitlabCommitSchema.nullable().catch(null)),
  project: z
    .object({
      path_with_namespace: optionalText,
      name: optionalText,
      web_url: optionalText,
    })
    .nullish()
    .catch(null),
  repository: z
    .object({
      git_http_url: optionalText,
      url: optionalText,
    })
    .nullish()
    .catch(null),
});

export type GitLabCommit = z.infer<typeof gitlabCommitSchema>;
export type GitLabPushPayload = z.infer<typeof gitlabPushSchema>;
