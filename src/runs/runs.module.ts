import { Module } from '@nestjs/common';
import { EngineModule } from '../engine/engine.module.js';
import { RunsController } from './runs.controller.js';
import { RunsService } from './runs.service.js';
import { DrizzleRunsRepository, RUNS_REPOSITORY } from './runs.repository.js';

@Module({
  imports: [EngineModule],
  controllers: [RunsController],
  providers: [
    RunsService,
    { provide: RUNS_REPOSITORY, useClass: DrizzleRunsRepository },
  ],
  exports: [RunsService],
})
export class RunsModule {}
