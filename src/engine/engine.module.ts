import { Module } from '@nestjs/common';
import { RngService } from './rng/rng.service.js';
import { StatsService } from './stats/stats.service.js';
import { AlignmentService } from './alignment/alignment.service.js';
import { CharacterService } from './character/character.service.js';
import { ActionService } from './actions/action.service.js';
import { StatusService } from './status/status.service.js';
import { ExperienceService } from './experience/experience.service.js';
import { BattleService } from './battle/battle.service.js';
import { TurnOrderService } from './battle/turn-order.service.js';
import { EnemyAiService } from './battle/enemy-ai.service.js';

const providers = [
  // Layer 1
  RngService,
  // Layer 2
  StatsService,
  AlignmentService,
  CharacterService,
  // Layer 3
  ActionService,
  StatusService,
  ExperienceService,
  // Layer 4
  BattleService,
  TurnOrderService,
  EnemyAiService,
];

@Module({
  providers,
  exports: providers,
})
export class EngineModule {}
