import {
  Body,
  Controller,
  Headers,
  HttpCode,
  HttpException,
  HttpStatus,
  Post,
} from '@nestjs/common';
import { ApiBody, ApiHeader, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { bitbucketAdapter, githubAdapter, gitlabAdapter, ProviderAdapter } from '../../ingestion/providers';
import { IngestionStats } from '../../ingestion/ingestion.service';
import { WebhookIngestionService } from '../../ingestion/webhook-ingestion.service';
import { IngestionStatsDto } from '../../dto/ingestion-stats.dto';

export const IGNORED_EVENT_MESSAGE = 'Event ignored (not a push event)';
export const UNMAPPED_REPOSITORY_DETAIL =
  'Project mapping required. Repository not linked to a project.';

type HeaderValue = string | string[] | undefined;

function headerValue(value: HeaderValue): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

function rejectWith(status: HttpStatus, detail: string): HttpException {
  return new HttpException({ detail }, status);
}

const pushPayloadBody = {
  description: 'Provider push payload, read as raw bytes for signature verification.',
  schema: { type: 'object', additionalProperties: true },
} as const;

/**
 * Push webhooks from GitHub, GitLab and Bitbucket. Bodies arrive as Buffers
 * (see configureApp) so signatures are checked over the exact bytes sent.
 */
@Controller('webhooks')
@ApiTags('webhooks')
export class GitWebhookController {
  constructor(private readonly webhooks: WebhookIngestionService) {}

  @Post('github')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Receive a GitHub push webhook' })
  @ApiHeader({ name: 'X-GitHub-Event', required: true })
  @ApiHeader({ name: 'X-Hub-Signature-256', required: true, description: 'sha256=<hex HMAC>' })
  @ApiBody(pushPayloadBody)
  @ApiResponse({ status: 200, type: IngestionStatsDto })
  async github(@Body() body: unknown, @Headers() headers: Record<string, HeaderValue>) {
    return this.receive(githubAdapter, body, headers);
  }

  @Post('gitlab')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Receive a GitLab push webhook' })
  @ApiHeader({ name: 'X-Gitlab-Event', required: true })
  @ApiHeader({ name: 'X-Gitlab-Token', required: true })
  @ApiBody(pushPayloadBody)
  @ApiResponse({ status: 200, type: IngestionStatsDto })
  async gitlab(@Body() body: unknown, @Headers() headers: Record<string, HeaderValue>) {
    return this.receive(gitlabAdapter, body, headers);
  }

  @Post('bitbucket')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Receive a Bitbucket push webhook' })
  @ApiHeader({ name: 'X-Event-Key', required: true })
  @ApiHeader({ name: 'X-Hub-Signature', required: true, description: '<hex HMAC>' })
  @ApiBody(pushPayloadBody)
  @ApiResponse({ status: 200, type: IngestionStatsDto })
  async bitbucket(@Body() body: unknown, @Headers() headers: Record<string, HeaderValue>) {
    return this.receive(bitbucketAdapter, body, headers);
  }

  private async receive<P>(
    adapter: ProviderAdapter<P>,
    body: unknown,
    headers: Record<string, HeaderValue>,
  ): Promise<IngestionStats | { message: string }> {
    // Empty requests leave no Buffer behind the raw parser.
    const rawBody = Buffer.isBuffer(body) ? body : Buffer.alloc(0);

    const outcome = await this.webhooks.handleDelivery(adapter, {
      rawBody,
      event: headerValue(headers[adapter.eventHeader]),
      credential: headerValue(headers[adapter.credentialHeader]),
    });

    switch (outcome.kind) {
      case 'ignored':
        return { message: IGNORED_EVENT_MESSAGE };
      case 'unauthorized':
        throw rejectWith(HttpStatus.UNAUTHORIZED, outcome.detail);
      case 'malformed':
        throw rejectWith(HttpStatus.BAD_REQUEST, `Invalid payload structure: ${outcome.reason}`);
      case 'unmapped':
        throw rejectWith(HttpStatus.BAD_REQUEST, UNMAPPED_REPOSITORY_DETAIL);
      case 'failed':
        throw rejectWith(HttpStatus.INTERNAL_SERVER_ERROR, outcome.detail);
      case 'ingested':
        return outcome.stats;
    }
  }
}
