import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { z } from 'zod';
import { GIT_PROVIDERS, GitProvider } from '../database/entities';

export const linkRepositorySchema = z.object({
  repository_url: z.string().trim().min(1, 'repository_url is required').max(500),
  repository_name: z.string().trim().min(1, 'repository_name is required').max(255),
  provider: z.enum(GIT_PROVIDERS),
  is_active: z.boolean().optional(),
});

export class LinkRepositoryDto {
  @ApiProperty({
    example: 'https://github.com/acme/storefront.git',
    description: 'Stored normalized: lower-cased, without trailing slash or .git',
  })
  repository_url!: string;

  @ApiProperty({ example: 'acme/storefront', description: 'Fallback match when the URL is unknown' })
  repository_name!: string;

  @ApiProperty({ enum: [...GIT_PROVIDERS], example: 'github' })
  provider!: GitProvider;

  @ApiPropertyOptional({ default: true })
  is_active?: boolean;
}
