import { Inject, Injectable, Logger } from '@nestjs/common';
import { WEBHOOK_SECRETS, WebhookSecrets } from '../config/webhook-secrets.provider';
import { IngestionService, IngestionStats, PersistenceFailure } from './ingestion.service';
import type { ProviderAdapter } from './providers';
import { RepositoryResolverService, ResolvedRepository } from './repository-resolver.service';

export interface WebhookDelivery {
  rawBody: Buffer;
  event: string | undefined;
  credential: string | undefined;
}

export const PERSISTENCE_FAILURE_DETAIL = 'Failed to persist contributions';
export const LOOKUP_FAILURE_DETAIL = 'Failed to resolve repository mapping';

export type DeliveryOutcome =
  | { kind: 'ignored'; event: string | undefined }
  | { kind: 'unauthorized'; detail: string }
  | { kind: 'malformed'; reason: string }
  | { kind: 'unmapped' }
  | { kind: 'failed'; detail: string }
  | { kind: 'ingested'; stats: IngestionStats };

/**
 * One delivery end to end: event filter, authenticity check, parse,
 * repository resolution, ingestion. Each stage short-circuits into an outcome.
 */
@Injectable()
export class WebhookIngestionService {
  private readonly logger = new Logger(WebhookIngestionService.name);

  constructor(
    @Inject(WEBHOOK_SECRETS) private readonly secrets: WebhookSecrets,
    private readonly repositories: RepositoryResolverService,
    private readonly ingestion: IngestionService,
  ) {}

  async handleDelivery<P>(
    adapter: ProviderAdapter<P>,
    delivery: WebhookDelivery,
  ): Promise<DeliveryOutcome> {
    const { provider } = adapter;

    if (delivery.event !== adapter.pushEvent) {
      this.logger.debug(`Ignoring ${provider} event ${delivery.event ?? '(none)'}`);
      return { kind: 'ignored', event: delivery.event };
    }

    const secret = this.secrets[provider];
    if (!secret) {
      this.logger.error(`No webhook secret configured for ${provider}; rejecting delivery`);
      return { kind: 'unauthorized', detail: adapter.authFailureDetail };
    }
    if (!adapter.verify(delivery.rawBody, delivery.credential, secret)) {
      this.logger.warn(
        `Rejected ${provider} delivery: ${delivery.credential ? 'credential mismatch' : 'missing credential'}`,
      );
      return { kind: 'unauthorized', detail: adapter.authFailureDetail };
    }

    const parsed = adapter.parse(delivery.rawBody);
    if (!parsed.ok) {
      this.logger.warn(`Malformed ${provider} payload: ${parsed.error.reason}`);
      return { kind: 'malformed', reason: parsed.error.reason };
    }

    const commits = adapter.normalize(parsed.value);
    const identity = adapter.repository(parsed.value);
    let repository: ResolvedRepository | null;
    try {
      repository = await this.repositories.resolve(provider, identity.url, identity.name);
    } catch (error) {
      this.logger.error(
        `Repository lookup failed for ${provider} delivery`,
        error instanceof Error ? error.stack : String(error),
      );
      return { kind: 'failed', detail: LOOKUP_FAILURE_DETAIL };
    }
    if (!repository) {
      this.logger.warn(
        `Unmapped ${provider} repository url=${identity.url ?? '-'} name=${identity.name ?? '-'}`,
      );
      return { kind: 'unmapped' };
    }

    try {
      const stats = await this.ingestion.ingest(commits, {
        projectId: repository.projectId,
        provider,
        repositoryUrl: repository.repositoryUrl,
      });
      this.logger.log(
        `Ingested ${provider} push into project ${repository.projectId}: ${JSON.stringify(stats)}`,
      );
      return { kind: 'ingested', stats };
    } catch (error) {
      if (error instanceof PersistenceFailure) {
        return { kind: 'failed', detail: PERSISTENCE_FAILURE_DETAIL };
      }
      throw error;
    }
  }
}
