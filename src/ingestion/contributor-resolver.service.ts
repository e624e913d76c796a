import { Inject, Injectable } from '@nestjs/common';
import { ContributorUser, USER_DIRECTORY, UserDirectory } from './user-directory';

const NO_REPLY_PATTERNS: readonly RegExp[] = [
  /^noreply@/,
  /^no-reply@/,
  /@users\.noreply\.github\.com$/,
  /@users\.noreply\.gitlab\.com$/,
  /@bitbucket\.org$/,
];

export type ContributorResolution =
  | { kind: 'user'; user: ContributorUser }
  | { kind: 'no_reply' }
  | { kind: 'no_match' };

/** Empty emails and provider-generated placeholder addresses never map to a person. */
export function isNoReplyEmail(email: string | null | undefined): boolean {
  const normalized = email?.trim().toLowerCase();
  if (!normalized) return true;
  return NO_REPLY_PATTERNS.some((pattern) => pattern.test(normalized));
}

@Injectable()
export class ContributorResolverService {
  constructor(@Inject(USER_DIRECTORY) private readonly users: UserDirectory) {}

  async resolve(email: string | null | undefined): Promise<ContributorResolution> {
    if (isNoReplyEmail(email)) return { kind: 'no_reply' };

    const user = await this.users.findByEmail((email ?? '').trim());
    return user ? { kind: 'user', user } : { kind: 'no_match' };
  }
}
