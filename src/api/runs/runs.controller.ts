import {
  Controller,
  Get,
  Post,
  Body,
  Param,
  Query,
  HttpCode,
  HttpStatus,
  ConflictException,
  NotFoundException,
} from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { RunsService } from './runs.service';
import { TriggerRunDto } from '../../dto/trigger-run.dto';
import { rethrowDeclarationError } from '../pipelines/pipelines.controller';

@ApiTags('runs')
@Controller('runs')
export class RunsController {
  constructor(private readonly runsService: RunsService) {}

  @Get()
  @ApiOperation({ summary: 'List runs (optionally filtered by pipelineId)' })
  async findAll(@Query('pipelineId') pipelineId?: string) {
    return this.runsService.findAll(pipelineId);
  }

  // Logs for a job (must be before :id routes)
  @Get(':runId/jobs/:jobId/logs')
  @ApiOperation({ summary: 'Get log lines for a job' })
  async getJobLogs(@Param('runId') _runId: string, @Param('jobId') jobId: string) {
    return this.runsService.getJobLogs(jobId);
  }

  @Get(':id/jobs')
  @ApiOperation({ summary: 'Get a run with its jobs (status view)' })
  async findOneWithJobs(@Param('id') id: string) {
    const result = await this.runsService.findOneWithJobs(id);
    if (!result) throw new NotFoundException('Run not found');
    return result;
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get one run' })
  async findOne(@Param('id') id: string) {
    const run = await this.runsService.findOne(id);
    if (!run) throw new NotFoundException('Run not found');
    return run;
  }

  @Post()
  @ApiOperation({ summary: 'Trigger a pipeline run (manual by default)' })
  async trigger(@Body() body: TriggerRunDto) {
    try {
      return await this.runsService.triggerRun(
        body.pipelineId,
        { kind: body.kind ?? 'manual', ref: body.ref ?? '', commit: body.commit ?? '' },
        body.jobs ?? [],
      );
    } catch (err) {
      return rethrowDeclarationError(err);
    }
  }

  @Post(':id/cancel')
  @HttpCode(HttpStatus.ACCEPTED)
  @ApiOperation({ summary: 'Cancel a running pipeline run' })
  async cancel(@Param('id') id: string) {
    if (this.runsService.cancelRun(id)) return { runId: id, cancelling: true };
    const run = await this.runsService.findOne(id);
    if (!run) throw new NotFoundException('Run not found');
    throw new ConflictException(`Run is not executing (status: ${run.status})`);
  }
}
