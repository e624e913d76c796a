/**
 * Provider-agnostic commit produced by a provider adapter. Lives only for the
 * duration of one delivery; never persisted as-is.
 */
export interface CommitInfo {
  /** Provider-native SHA, never empty. */
  hash: string;
  message: string;
  branch: string;
  timestamp: Date;
  authorEmail: string;
  authorName: string;
  url?: string;
}

export function shortHash(hash: string): string {
  return hash.slice(0, 8);
}
