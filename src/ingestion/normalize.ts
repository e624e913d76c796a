import { Logger } from '@nestjs/common';
import type { GitProvider } from '../database/entities';
import { parseCommitTimestamp } from './timestamp';
import { shortHash } from './commit-info';

const logger = new Logger('CommitNormalizer');

/** `refs/heads/release/2.0` → `release/2.0`; other `refs/` kinds lose only the `refs/` prefix. */
export function extractBranch(ref: string): string {
  if (ref.startsWith('refs/heads/')) return ref.slice('refs/heads/'.length);
  if (ref.startsWith('refs/')) return ref.slice('refs/'.length);
  return ref;
}

export interface AuthorIdentity {
  name: string;
  email: string;
}

/** Parses git's `Name <email>` form. Without angle brackets the whole string is the name. */
export function parseRawAuthor(raw: string): AuthorIdentity {
  const trimmed = raw.trim();
  const match = /^(.*?)\s*<([^<>]*)>$/.exec(trimmed);
  if (!match) return { name: trimmed, email: '' };
  return { name: match[1].trim(), email: match[2].trim() };
}

/**
 * Commit time as an instant. Never throws: an unreadable value becomes the
 * current time and is reported, so one bad timestamp cannot drop the commit.
 */
export function resolveCommitTimestamp(
  value: string | null | undefined,
  provider: GitProvider,
  hash: string,
): Date {
  const { timestamp, fallback } = parseCommitTimestamp(value);
  if (fallback) {
    logger.warn(
      `Could not parse timestamp ${JSON.stringify(value ?? null)} of ${provider} commit ${shortHash(hash)}; using current time`,
    );
  }
  return timestamp;
}

export function skipCommitWithoutHash(provider: GitProvider, index: number): void {
  logger.warn(`Skipping ${provider} commit #${index} without a hash`);
}
