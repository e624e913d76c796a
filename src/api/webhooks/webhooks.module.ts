import { Module } from '@nestjs/common';
import { GitWebhookController } from './git-webhook.controller';
import { webhookSecretsProvider } from '../../config/webhook-secrets.provider';
import { ContributorResolverService } from '../../ingestion/contributor-resolver.service';
import { CONTRIBUTION_STORE, TypeOrmContributionStore } from '../../ingestion/contribution-store';
import { IngestionService } from '../../ingestion/ingestion.service';
import { REPOSITORY_REGISTRY, TypeOrmRepositoryRegistry } from '../../ingestion/repository-registry';
import { RepositoryResolverService } from '../../ingestion/repository-resolver.service';
import { TypeOrmUserDirectory, USER_DIRECTORY } from '../../ingestion/user-directory';
import { WebhookIngestionService } from '../../ingestion/webhook-ingestion.service';

@Module({
  controllers: [GitWebhookController],
  providers: [
    webhookSecretsProvider,
    { provide: USER_DIRECTORY, useClass: TypeOrmUserDirectory },
    { provide: REPOSITORY_REGISTRY, useClass: TypeOrmRepositoryRegistry },
    { provide: CONTRIBUTION_STORE, useClass: TypeOrmContributionStore },
    ContributorResolverService,
    RepositoryResolverService,
    IngestionService,
    WebhookIngestionService,
  ],
})
export class WebhooksModule {}
