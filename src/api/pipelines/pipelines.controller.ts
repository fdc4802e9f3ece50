import {
  Controller,
  Get,
  Post,
  Patch,
  Delete,
  Body,
  Param,
  HttpCode,
  HttpStatus,
  BadRequestException,
  NotFoundException,
} from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { PipelinesService } from './pipelines.service';
import { CreatePipelineDto } from '../../dto/create-pipeline.dto';
import { UpdatePipelineDto } from '../../dto/update-pipeline.dto';
import { DeclarationError } from '../../engine/errors';

/** Maps a rejected declaration to 400 with the individual issues. */
export function rethrowDeclarationError(err: unknown): never {
  if (err instanceof DeclarationError) {
    throw new BadRequestException({ message: err.message, issues: err.issues });
  }
  throw err;
}

@ApiTags('pipelines')
@Controller('pipelines')
export class PipelinesController {
  constructor(private readonly pipelinesService: PipelinesService) {}

  @Get()
  @ApiOperation({ summary: 'List pipelines' })
  async findAll() {
    return this.pipelinesService.findAll();
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get one pipeline' })
  async findOne(@Param('id') id: string) {
    const pipeline = await this.pipelinesService.findOne(id);
    if (!pipeline) throw new NotFoundException('Pipeline not found');
    return pipeline;
  }

  // parsed form of the stored declaration
  @Get(':id/declaration')
  @ApiOperation({ summary: 'Get the parsed declaration of a pipeline' })
  async getDeclaration(@Param('id') id: string) {
    const pipeline = await this.pipelinesService.findOne(id);
    if (!pipeline) throw new NotFoundException('Pipeline not found');
    try {
      return this.pipelinesService.declarationOf(pipeline);
    } catch (err) {
      return rethrowDeclarationError(err);
    }
  }

  @Post()
  @ApiOperation({ summary: 'Create a pipeline' })
  async create(@Body() dto: CreatePipelineDto) {
    try {
      return await this.pipelinesService.create(dto);
    } catch (err) {
      return rethrowDeclarationError(err);
    }
  }

  @Patch(':id')
  @ApiOperation({ summary: 'Update a pipeline' })
  async update(@Param('id') id: string, @Body() dto: UpdatePipelineDto) {
    const pipeline = await this.pipelinesService.findOne(id);
    if (!pipeline) throw new NotFoundException('Pipeline not found');
    try {
      return await this.pipelinesService.update(id, dto);
    } catch (err) {
      return rethrowDeclarationError(err);
    }
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete a pipeline' })
  async remove(@Param('id') id: string) {
    try {
      await this.pipelinesService.remove(id);
    } catch {
      throw new NotFoundException('Pipeline not found');
    }
  }
}
