import { Provider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { GitProvider } from '../database/entities';

export const WEBHOOK_SECRETS = Symbol('WEBHOOK_SECRETS');

/** Shared secret (GitHub, Bitbucket) or static token (GitLab) per provider; '' when unset. */
export type WebhookSecrets = Record<GitProvider, string>;

export const webhookSecretsProvider: Provider = {
  provide: WEBHOOK_SECRETS,
  inject: [ConfigService],
  useFactory: (config: ConfigService): WebhookSecrets => ({
    github: config.get<string>('GITHUB_WEBHOOK_SECRET') ?? '',
    gitlab: config.get<string>('GITLAB_WEBHOOK_TOKEN') ?? '',
    bitbucket: config.get<string>('BITBUCKET_WEBHOOK_SECRET') ?? '',
  }),
};
