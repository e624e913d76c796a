import { ApiPropertyOptional } from '@nestjs/swagger';
import { z } from 'zod';

export const updateRepositorySchema = z
  .object({
    is_active: z.boolean().optional(),
    repository_name: z.string().trim().min(1).max(255).optional(),
  })
  .strict();

export class UpdateRepositoryDto {
  @ApiPropertyOptional({ example: false, description: 'Inactive mappings no longer route webhooks' })
  is_active?: boolean;

  @ApiPropertyOptional({ example: 'acme/storefront' })
  repository_name?: string;
}
