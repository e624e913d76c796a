import { z } from 'zod';

const optionalText = z.string().nullish().catch(undefined);

const bitbucketAuthorSchema = z
  .object({
    /** `Name <email>` as recorded in the commit. */
    raw: optionalText,
    user: z
      .object({
        display_name: optionalText,
        email_address: optionalText,
        email: optionalText,
      })
      .nullish()
      .catch(null),
  })
  .nullish()
  .catch(null);

export const bitbucketCommitSchema = z.object({
  hash: optionalText,
  message: optionalText,
  date: optionalText,
  timestamp: optionalText,
  author: bitbucketAuthorSchema,
  links: z
    .object({
      html: z.object({ href: optionalText }).nullish().catch(null),
    })
    .nullish()
    .catch(null),
});

const bitbucketChangeSchema = z.object({
  new: z
    .object({
      /** Branch name. */
      name: optionalText,
      commits: z.array(bitbucketCommitSchema.nullable().catch(null)).nullish().catch(null),
    })
    .nullish()
    .catch(null),
});

export const bitbucketPushSchema = z.object({
  push: z.object({
    changes: z.array(bitbucketChangeSchema.nullable().catch(null)),
  }),
  repository: z
    .object({
      full_name: optionalText,
      name: optionalText,
      links: z
        .object({
          html: z.object({ href: optionalText }).nullish().catch(null),
        })
        .nullish()
        .catch(null),
    })
    .nullish()
    .catch(null),
});

export type BitbucketCommit = z.infer<typeof bitbucketCommitSchema>;
export type BitbucketPushPayload = z.infer<typeof bitbucketPushSchema>;
