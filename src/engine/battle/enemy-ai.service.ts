import { Injectable } from '@nestjs/common';
import type { ActionId, Character } from '../../db/types/index.js';
import type { Rng } from '../rng/rng.service.js';

@Injectable()
export class EnemyAiService {
  /** 배운 행동 중 무작위 1개. 배운 행동이 없으면 undefined (→ SKIP) */
  selectAction(enemy: Character, rng: Rng): ActionId | undefined {
    return rng.pick(enemy.attributes.actions);
  }
}
