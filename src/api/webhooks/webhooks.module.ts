import { Module } from '@nestjs/common';
import { GitWebhookController } from './git-webhook.controller';
import { PipelinesModule } from '../pipelines/pipelines.module';
import { RunsModule } from '../runs/runs.module';
import { DeclarationModule } from '../../declaration/declaration.module';

@Module({
  imports: [PipelinesModule, RunsModule, DeclarationModule],
  controllers: [GitWebhookController],
})
export class WebhooksModule {}
