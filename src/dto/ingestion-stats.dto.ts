import { ApiProperty } from '@nestjs/swagger';

export class IngestionStatsDto {
  @ApiProperty({ example: 2, description: 'Rows inserted by this delivery' })
  created!: number;

  @ApiProperty({ example: 0, description: 'Already stored, repeated in the payload, or lost to a concurrent delivery' })
  skipped_duplicates!: number;

  @ApiProperty({ example: 0, description: 'Author email did not match any user' })
  skipped_no_user!: number;

  @ApiProperty({ example: 0, description: 'Empty or provider no-reply author email' })
  skipped_no_reply!: number;

  @ApiProperty({ example: 2, description: 'Commits normalized from the payload' })
  total_processed!: number;
}
