import { Injectable } from '@nestjs/common';
import type { Action, Character } from '../../db/types/index.js';
import type { Rng } from '../rng/rng.service.js';
import { ActionService } from '../actions/action.service.js';
import { CharacterService } from '../character/character.service.js';

@Injectable()
export class TurnOrderService {
  constructor(
    private readonly actionService: ActionService,
    private readonly characterService: CharacterService,
  ) {}

  /**
   * 선공 판정:
   * 1. 행동 priority가 높은 쪽
   * 2. 동률이면 speed가 높은 쪽
   * 3. 그래도 동률이면 동전 던지기 (이 경우에만 RNG 소비)
   */
  playerFirst(
    player: Character,
    playerAction: Action,
    enemy: Character,
    enemyAction: Action,
    rng: Rng,
  ): boolean {
    const playerPriority = this.actionService.priority(playerAction);
    const enemyPriority = this.actionService.priority(enemyAction);
    if (playerPriority !== enemyPriority) return playerPriority > enemyPriority;

    const playerSpeed = this.characterService.priority(player);
    const enemySpeed = this.characterService.priority(enemy);
    if (playerSpeed !== enemySpeed) return playerSpeed > enemySpeed;

    return rng.coin();
  }
}
