import { ApiPropertyOptional } from '@nestjs/swagger';

export class UpdatePipelineDto {
  @ApiPropertyOptional({ example: 'rust-library' })
  name?: string;

  @ApiPropertyOptional({ example: 'example/rust-library' })
  repository?: string;

  @ApiPropertyOptional({ description: 'Pipeline declaration (YAML). Validated before it is stored.' })
  declaration?: string;
}
