import { z } from 'zod';
import type { GitProvider } from '../../database/entities';
import { Result, err, ok } from '../../common/result';
import { formatZodIssues } from '../../common/zod-validation.pipe';
import type { CommitInfo } from '../commit-info';

export interface ParseError {
  reason: string;
}

/** Where a push came from, as the provider names it. Either part may be missing. */
export interface RepositoryIdentity {
  url: string | null;
  name: string | null;
}

/**
 * Everything that differs between GitHub, GitLab and Bitbucket deliveries.
 * One adapter per provider is picked by the endpoint; the ingestion engine
 * never branches on the provider itself.
 */
export interface ProviderAdapter<P> {
  readonly provider: GitProvider;
  /** Header carrying the event type, and the value that means "push". */
  readonly eventHeader: string;
  readonly pushEvent: string;
  /** Header carrying the signature or token. */
  readonly credentialHeader: string;
  /** `detail` returned with 401. */
  readonly authFailureDetail: string;

  verify(rawBody: Buffer, credential: string | undefined, secret: string): boolean;
  parse(rawBody: Buffer): Result<P, ParseError>;
  normalize(push: P): CommitInfo[];
  repository(push: P): RepositoryIdentity;
}

/** JSON-decode the raw body and validate it. Never throws. */
export function decodePayload<S extends z.ZodTypeAny>(
  rawBody: Buffer,
  schema: S,
): Result<z.infer<S>, ParseError> {
  let json: unknown;
  try {
    json = JSON.parse(rawBody.toString('utf8'));
  } catch {
    return err({ reason: 'body is not valid JSON' });
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    return err({ reason: formatZodIssues(parsed.error) });
  }
  return ok(parsed.data);
}

/** First non-empty, trimmed candidate. */
export function firstText(...candidates: Array<string | null | undefined>): string | null {
  for (const candidate of candidates) {
    const trimmed = candidate?.trim();
    if (trimmed) return trimmed;
  }
  return null;
}
