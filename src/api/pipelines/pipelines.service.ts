import { Injectable } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { Pipeline } from '../../database/entities/pipeline.entity';
import { DeclarationService } from '../../declaration/declaration.service';
import type { PipelineDeclaration } from '../../declaration/declaration.types';

export interface PipelineInput {
  name: string;
  repository: string;
  declaration: string;
}

@Injectable()
export class PipelinesService {
  constructor(
    private readonly dataSource: DataSource,
    private readonly declarations: DeclarationService,
  ) {}

  private get repo() {
    return this.dataSource.getRepository(Pipeline);
  }

  async findAll(): Promise<Pipeline[]> {
    return this.repo.find({ order: { created_at: 'DESC' } });
  }

  async findOne(id: string): Promise<Pipeline | null> {
    return this.repo.findOne({ where: { id } });
  }

  async findByRepository(repo: string): Promise<Pipeline | null> {
    return this.repo.findOne({ where: { repository: repo } });
  }

  /** Throws DeclarationError when the declaration does not parse. */
  async create(input: PipelineInput): Promise<Pipeline> {
    this.declarations.parse(input.declaration, input.name);
    const pipeline = this.repo.create(input);
    return this.repo.save(pipeline);
  }

  async update(id: string, input: Partial<PipelineInput>): Promise<Pipeline> {
    const pipeline = await this.repo.findOne({ where: { id } });
    if (!pipeline) throw new Error('Pipeline not found');
    if (input.declaration !== undefined) {
      this.declarations.parse(input.declaration, input.name ?? pipeline.name);
    }
    Object.assign(pipeline, input);
    return this.repo.save(pipeline);
  }

  async remove(id: string): Promise<void> {
    const result = await this.repo.delete(id);
    if (result.affected === 0) throw new Error('Pipeline not found');
  }

  declarationOf(pipeline: Pipeline): PipelineDeclaration {
    return this.declarations.parse(pipeline.declaration, pipeline.name);
  }
}
