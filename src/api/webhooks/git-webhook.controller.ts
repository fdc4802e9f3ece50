import {
  Controller,
  Post,
  Body,
  Headers,
  BadRequestException,
  NotFoundException,
  Logger,
} from '@nestjs/common';
import { ApiBody, ApiOperation, ApiTags } from '@nestjs/swagger';
import { PipelinesService } from '../pipelines/pipelines.service';
import { RunsService } from '../runs/runs.service';
import { DeclarationService } from '../../declaration/declaration.service';
import { rethrowDeclarationError } from '../pipelines/pipelines.controller';
import { getEventFromPayload, getRepoFromPayload, readWebhookPayload } from './webhook-payload';

@Controller('webhooks/git')
@ApiTags('webhooks')
export class GitWebhookController {
  private readonly logger = new Logger(GitWebhookController.name);

  constructor(
    private readonly pipelinesService: PipelinesService,
    private readonly runsService: RunsService,
    private readonly declarations: DeclarationService,
  ) {}

  /**
   * Receive a Git push or pull request webhook (GitHub, GitLab, or any POST with
   * repo/repository). Resolves the pipeline by repository and triggers a run, unless the
   * pipeline's `on:` does not name the event.
   */
  @Post('push')
  @ApiOperation({ summary: 'Receive a git webhook and trigger a run' })
  @ApiBody({
    description:
      'GitHub/GitLab push or pull request payload. The repo comes from repo/repository/project fields; ref and commit from ref/after or the pull request head.',
    schema: { type: 'object', additionalProperties: true },
  })
  async handlePush(
    @Body() body: Record<string, unknown>,
    @Headers('x-github-event') githubEvent?: string,
    @Headers('x-gitlab-event') gitlabEvent?: string,
  ) {
    const payload = readWebhookPayload(body);
    const repo = getRepoFromPayload(payload);
    if (!repo) {
      throw new BadRequestException(
        'Missing repo. Send repo, repository.full_name, repository.clone_url, or project.path_with_namespace',
      );
    }

    const pipeline = await this.pipelinesService.findByRepository(repo);
    if (!pipeline) {
      throw new NotFoundException(`No pipeline found for repository: ${repo}`);
    }

    const event = getEventFromPayload(payload, repo, githubEvent ?? gitlabEvent);
    try {
      const declaration = this.pipelinesService.declarationOf(pipeline);
      if (!this.declarations.isTriggeredBy(declaration, event.kind)) {
        this.logger.log(`Pipeline ${pipeline.name} is not triggered by ${event.kind}; skipping`);
        return { runId: null, pipelineId: pipeline.id, skipped: `not triggered by ${event.kind}` };
      }
      const run = await this.runsService.triggerRun(pipeline.id, event);
      return { runId: run.id, pipelineId: pipeline.id, status: run.status };
    } catch (err) {
      return rethrowDeclarationError(err);
    }
  }
}
