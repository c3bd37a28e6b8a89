// 행동 디스패치: 공격/방어/출혈/기절/스킵

import { Injectable } from '@nestjs/common';
import {
  ALIGNMENT_LABEL,
  type Action,
  type ActionId,
  type ActionLog,
  type ActionPool,
  type AttackAction,
  type Character,
  type SkipAction,
} from '../../db/types/index.js';
import { AlignmentService } from '../alignment/alignment.service.js';
import { CharacterService } from '../character/character.service.js';

export const SKIP: SkipAction = { kind: 'SKIP' };

/** Defend는 같은 라운드의 공격보다 먼저 처리된다 */
const DEFEND_PRIORITY = 2;

@Injectable()
export class ActionService {
  constructor(
    private readonly alignmentService: AlignmentService,
    private readonly characterService: CharacterService,
  ) {}

  /** 범위 밖/정수가 아닌 id는 SKIP */
  resolve(pool: ActionPool, id: ActionId | undefined): Action {
    if (id === undefined || !Number.isInteger(id) || id < 0) return SKIP;
    return pool.actions[id] ?? SKIP;
  }

  /** 샘플링 가능한 id 개수 (padding 포함) */
  poolSize(pool: ActionPool): number {
    return pool.actions.length + pool.padding;
  }

  name(action: Action): string {
    return action.kind === 'SKIP' ? 'Skip' : action.name;
  }

  description(action: Action): string {
    switch (action.kind) {
      case 'ATTACK':
        return (
          `${ALIGNMENT_LABEL[action.alignment]}-aligned Attack with ${action.power} power.` +
          (action.priority > 0 ? '\nHas priority.' : '')
        );
      case 'FIXED_ATTACK':
        return `Attack for exactly ${action.power} damage.`;
      case 'DEFEND':
        return 'Defend against attacks.';
      case 'BLEED':
        return `Applies ${action.power} bleeding to the enemy.`;
      case 'STUN':
        return 'Stuns the enemy.';
      case 'SKIP':
        return 'User skips their next turn.';
    }
  }

  priority(action: Action): number {
    switch (action.kind) {
      case 'ATTACK':
        return action.priority;
      case 'DEFEND':
        return DEFEND_PRIORITY;
      default:
        return 0;
    }
  }

  apply(action: Action, user: Character, target: Character): ActionLog {
    switch (action.kind) {
      case 'ATTACK':
        return this.attack(action, user, target);
      case 'FIXED_ATTACK': {
        const logs = [`${user.name} used ${action.name}.`];
        if (this.characterService.hasStatus(target, 'DEFEND')) {
          logs.push(`${target.name} blocked ${user.name}'s attack.`);
        } else {
          this.characterService.dealDamage(target, action.power);
        }
        return logs;
      }
      case 'DEFEND':
        // 이미 방어 중이면 intensity 유지
        user.state.status.DEFEND = user.state.status.DEFEND ?? 0;
        return [`${user.name} is defending.`];
      case 'BLEED': {
        const logs = [`${user.name} used ${action.name}.`];
        if (this.characterService.hasStatus(target, 'STUN')) {
          logs.push(`But ${target.name} is stunned.`);
        } else {
          target.state.status.BLEED = (target.state.status.BLEED ?? 0) + action.power;
          logs.push(`${target.name} gained ${action.power} bleeding.`);
        }
        return logs;
      }
      case 'STUN': {
        const logs = [`${user.name} used ${action.name}.`];
        if (this.characterService.hasStatus(target, 'BLEED')) {
          logs.push(`But ${target.name} is bleeding.`);
        } else {
          target.state.status.STUN = (target.state.status.STUN ?? 0) + 1;
          logs.push(`${target.name} is stunned.`);
        }
        return logs;
      }
      case 'SKIP':
        return [`${user.name} used Skip.`];
    }
  }

  /**
   * damage = floor(levelFactor * power * statRatio * stab * eff / 5000) + 2
   * stab, eff는 ×10 정수. 나눗셈은 곱셈을 모두 마친 뒤 한 번만.
   */
  computeDamage(action: AttackAction, user: Character, target: Character): number {
    const levelFactor = Math.floor((2 * user.attributes.level) / 5) + 2;
    // 방어력 0은 1로 취급
    const statRatio = Math.floor(
      user.attributes.stats.attack / Math.max(1, target.attributes.stats.defense),
    );
    const stab = user.state.alignment === action.alignment ? 15 : 10;
    const eff = this.alignmentService.effectivenessFactor(
      action.alignment,
      target.state.alignment,
    );
    return (
      Math.floor((levelFactor * action.power * statRatio * stab * eff) / (50 * 10 * 10)) + 2
    );
  }

  private attack(action: AttackAction, user: Character, target: Character): ActionLog {
    const logs = [`${user.name} used ${action.name}.`];
    if (this.characterService.hasStatus(target, 'DEFEND')) {
      logs.push(`${target.name} blocked ${user.name}'s ${action.name}.`);
      return logs;
    }

    switch (this.alignmentService.effectiveness(action.alignment, target.state.alignment)) {
      case 'SUPER_EFFECTIVE':
        logs.push("It's very effective.");
        break;
      case 'NOT_VERY_EFFECTIVE':
        logs.push("It's not very effective.");
        break;
      case 'NEUTRAL':
        break;
    }

    this.characterService.dealDamage(target, this.computeDamage(action, user, target));
    return logs;
  }
}
