import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class TriggerRunDto {
  @ApiProperty({ description: 'Pipeline id to run' })
  pipelineId!: string;

  @ApiPropertyOptional({
    description: "Event kind (default: 'manual')",
    enum: ['push', 'pull_request', 'manual'],
    example: 'manual',
  })
  kind?: 'push' | 'pull_request' | 'manual';

  @ApiPropertyOptional({ example: 'refs/heads/main' })
  ref?: string;

  @ApiPropertyOptional({ example: 'abc123' })
  commit?: string;

  @ApiPropertyOptional({
    description: 'Job ids to run; every job when omitted',
    type: [String],
    example: ['test', 'fmt'],
  })
  jobs?: string[];
}
