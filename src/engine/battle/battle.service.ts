// 전투 턴 엔진: IN_PROGRESS / VICTORY / DEFEAT

import { Injectable } from '@nestjs/common';
import type {
  Action,
  ActionLog,
  Battle,
  BattleStatus,
  Character,
} from '../../db/types/index.js';
import type { Rng } from '../rng/rng.service.js';
import { CharacterService } from '../character/character.service.js';
import { StatusService } from '../status/status.service.js';
import { ExperienceService } from '../experience/experience.service.js';

export interface EndTurnResult {
  status: BattleStatus;
  logs: ActionLog;
}

@Injectable()
export class BattleService {
  constructor(
    private readonly characterService: CharacterService,
    private readonly statusService: StatusService,
    private readonly experienceService: ExperienceService,
  ) {}

  /** 두 캐릭터를 복사해 전투 동안 소유한다 */
  create(player: Character, enemy: Character): Battle {
    return {
      player: this.characterService.clone(player),
      enemy: this.characterService.clone(enemy),
    };
  }

  /** 양쪽 모두 0이면 DEFEAT 우선 */
  battleStatus(battle: Battle): BattleStatus {
    if (battle.player.state.health === 0) return 'DEFEAT';
    if (battle.enemy.state.health === 0) return 'VICTORY';
    return 'IN_PROGRESS';
  }

  playerTurn(battle: Battle, action: Action, rng: Rng): ActionLog {
    if (this.battleStatus(battle) !== 'IN_PROGRESS') return [];
    return this.statusService.takeTurn(action, battle.player, battle.enemy, rng);
  }

  enemyTurn(battle: Battle, action: Action, rng: Rng): ActionLog {
    if (this.battleStatus(battle) !== 'IN_PROGRESS') return [];
    return this.statusService.takeTurn(action, battle.enemy, battle.player, rng);
  }

  /** 승리 시 경험치 지급. refresh는 호출자 책임 */
  endTurn(battle: Battle, rng: Rng): EndTurnResult {
    const status = this.battleStatus(battle);
    switch (status) {
      case 'VICTORY': {
        const logs = [`Defeated ${battle.enemy.name}!`];
        const reward = this.experienceService.rewardFor(battle.enemy, battle.player);
        logs.push(...this.experienceService.gainExperience(battle.player, reward, rng));
        return { status, logs };
      }
      case 'DEFEAT':
        return { status, logs: [`${battle.player.name} died!`] };
      case 'IN_PROGRESS':
        this.statusService.cleanUp(battle.player);
        this.statusService.cleanUp(battle.enemy);
        return { status, logs: [] };
    }
  }
}
