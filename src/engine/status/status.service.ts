// 상태이상: 행동 전 STUN/BLEED 판정, 라운드 종료 시 DEFEND 해제

import { Injectable } from '@nestjs/common';
import type { Action, ActionLog, Character } from '../../db/types/index.js';
import type { Rng } from '../rng/rng.service.js';
import { ActionService } from '../actions/action.service.js';
import { CharacterService } from '../character/character.service.js';

@Injectable()
export class StatusService {
  constructor(
    private readonly actionService: ActionService,
    private readonly characterService: CharacterService,
  ) {}

  /**
   * 사용자 자신의 상태이상으로 행동을 감싼다.
   * - STUN(n): 1/(n+1) 확률로 회복 후 행동, 아니면 행동 불가
   * - BLEED(n): 행동 후 n 피해
   * STUN과 BLEED는 동시에 걸리지 않는다.
   */
  takeTurn(action: Action, user: Character, target: Character, rng: Rng): ActionLog {
    const stun = user.state.status.STUN;
    if (stun !== undefined) {
      if (rng.int(stun + 1) !== 0) {
        return [`${user.name} is stunned.`];
      }
      delete user.state.status.STUN;
      return [
        `${user.name} is no longer stunned.`,
        ...this.actionService.apply(action, user, target),
      ];
    }

    const bleed = user.state.status.BLEED;
    if (bleed !== undefined) {
      const logs = this.actionService.apply(action, user, target);
      this.characterService.dealDamage(user, bleed);
      logs.push(`${user.name} was hurt by bleed.`);
      return logs;
    }

    return this.actionService.apply(action, user, target);
  }

  /** 라운드 종료: DEFEND는 다음 라운드로 넘어가지 않는다 */
  cleanUp(character: Character): void {
    delete character.state.status.DEFEND;
  }
}
