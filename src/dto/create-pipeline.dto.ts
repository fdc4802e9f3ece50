import { ApiProperty } from '@nestjs/swagger';

const EXAMPLE_DECLARATION = `name: CI
on: [push, pull_request]
jobs:
  test:
    runs-on: ubuntu-latest
    steps:
      - uses: actions/checkout@v3
      - run: cargo test --all-features
`;

export class CreatePipelineDto {
  @ApiProperty({ example: 'rust-library' })
  name!: string;

  @ApiProperty({
    example: 'example/rust-library',
    description: 'Must match what your git webhook sends',
  })
  repository!: string;

  @ApiProperty({
    description: 'Pipeline declaration (YAML). Validated before it is stored.',
    example: EXAMPLE_DECLARATION,
  })
  declaration!: string;
}
