import type { GitProvider } from '../database/entities';
import { stripRepositoryUrl } from './repository-url';

const COMMIT_URL_TEMPLATES: Record<GitProvider, (repositoryUrl: string, hash: string) => string> = {
  github: (repositoryUrl, hash) => `${repositoryUrl}/commit/${hash}`,
  gitlab: (repositoryUrl, hash) => `${repositoryUrl}/-/commit/${hash}`,
  bitbucket: (repositoryUrl, hash) => `${repositoryUrl}/commits/${hash}`,
};

/**
 * Browsable commit link for providers that omit one. Only http(s) repository
 * URLs qualify; an SSH remote yields null.
 */
export function buildCommitUrl(
  provider: GitProvider,
  repositoryUrl: string | null,
  hash: string,
): string | null {
  if (!repositoryUrl) return null;
  const base = stripRepositoryUrl(repositoryUrl);
  if (!/^https?:\/\//i.test(base)) return null;
  return COMMIT_URL_TEMPLATES[provider](base, hash);
}
