import { Module } from '@nestjs/common';
import { ConfigModule, ConfigType } from '@nestjs/config';
import { engineConfig } from '../config/engine.config';
import { DeclarationModule } from '../declaration/declaration.module';
import { CacheGateService } from './cache/cache-gate.service';
import { CACHE_STORE } from './cache/cache-store';
import { createCacheStore } from './cache/cache-store.factory';
import { EnvironmentProvisionerService } from './environment/environment-provisioner.service';
import { JobRunnerService } from './jobs/job-runner.service';
import { PipelineSchedulerService } from './scheduler/pipeline-scheduler.service';
import { ActionRegistryService } from './steps/actions/action-registry.service';
import { ACTION_HANDLERS } from './steps/actions/action.types';
import { CacheAction } from './steps/actions/cache.action';
import { CheckoutAction } from './steps/actions/checkout.action';
import { ToolchainAction } from './steps/actions/toolchain.action';
import { StepExecutorService } from './steps/step-executor.service';

@Module({
  imports: [ConfigModule.forFeature(engineConfig), DeclarationModule],
  providers: [
    CheckoutAction,
    ToolchainAction,
    CacheAction,
    {
      provide: ACTION_HANDLERS,
      useFactory: (checkout: CheckoutAction, toolchain: ToolchainAction, cache: CacheAction) => [
        checkout,
        toolchain,
        cache,
      ],
      inject: [CheckoutAction, ToolchainAction, CacheAction],
    },
    {
      provide: CACHE_STORE,
      useFactory: (config: ConfigType<typeof engineConfig>) => createCacheStore(config),
      inject: [engineConfig.KEY],
    },
    ActionRegistryService,
    EnvironmentProvisionerService,
    CacheGateService,
    StepExecutorService,
    JobRunnerService,
    PipelineSchedulerService,
  ],
  exports: [PipelineSchedulerService, ActionRegistryService, DeclarationModule],
})
export class EngineModule {}
