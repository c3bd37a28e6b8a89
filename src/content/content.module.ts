import { Global, Module } from '@nestjs/common';
import { EngineModule } from '../engine/engine.module.js';
import { ContentLoaderService } from './content-loader.service.js';
import { WorldGeneratorService } from './world-generator.service.js';

@Global()
@Module({
  imports: [EngineModule],
  providers: [ContentLoaderService, WorldGeneratorService],
  exports: [ContentLoaderService, WorldGeneratorService],
})
export class ContentModule {}
