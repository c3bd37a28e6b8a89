// world_v1 JSON 로드 + 월드 생성 (메모리 캐시)

import { Injectable, Logger, type OnModuleInit } from '@nestjs/common';
import { readFile } from 'fs/promises';
import { join } from 'path';
import { Rng } from '../engine/rng/rng.service.js';
import { GameConfigService } from '../config/game-config.service.js';
import { InternalError } from '../common/errors/game-errors.js';
import { WorldGeneratorService } from './world-generator.service.js';
import {
  FixedActionListSchema,
  NameTablesSchema,
  type World,
  type WorldContent,
} from './content.types.js';

export const CONTENT_DIR = join(process.cwd(), 'content', 'world_v1');

@Injectable()
export class ContentLoaderService implements OnModuleInit {
  private readonly logger = new Logger(ContentLoaderService.name);
  private content?: WorldContent;
  private world?: World;

  constructor(
    private readonly worldGenerator: WorldGeneratorService,
    private readonly config: GameConfigService,
  ) {}

  async onModuleInit() {
    await this.load();
  }

  async load(dir: string = CONTENT_DIR): Promise<World> {
    const [namesRaw, fixedActionsRaw] = await Promise.all([
      readFile(join(dir, 'names.json'), 'utf-8'),
      readFile(join(dir, 'fixed_actions.json'), 'utf-8'),
    ]);

    const content: WorldContent = {
      names: NameTablesSchema.parse(JSON.parse(namesRaw)),
      fixedActions: FixedActionListSchema.parse(JSON.parse(fixedActionsRaw)),
    };

    const { worldSeed, speciesCount } = this.config.get();
    const world = this.worldGenerator.generate(content, speciesCount, new Rng(worldSeed, 0));

    this.content = content;
    this.world = world;
    this.logger.log(
      `World generated (seed=${worldSeed}): ${world.species.length} species, ` +
        `${world.pool.actions.length} actions, padding ${world.pool.padding}`,
    );
    return world;
  }

  getContent(): WorldContent {
    if (!this.content) throw new InternalError('Content not loaded');
    return this.content;
  }

  getWorld(): World {
    if (!this.world) throw new InternalError('World not generated');
    return this.world;
  }
}
