// 경험치/레벨업: 처치 보상 경험치, 레벨업 시 스탯 성장

import { Injectable } from '@nestjs/common';
import type { ActionLog, Character } from '../../db/types/index.js';
import type { Rng } from '../rng/rng.service.js';
import { SCALING_FACTOR, StatsService } from '../stats/stats.service.js';
import { GameConfigService } from '../../config/game-config.service.js';

export const BASE_EXPERIENCE = 31;
export const EXPERIENCE_TO_LEVEL = 100;

/** floor(log2(x)), x <= 0 이면 0 */
export function log2Floor(x: number): number {
  if (x <= 0) return 0;
  return 31 - Math.clz32(x);
}

@Injectable()
export class ExperienceService {
  constructor(
    private readonly statsService: StatsService,
    private readonly config: GameConfigService,
  ) {}

  /** 이 캐릭터를 쓰러뜨렸을 때의 경험치 가치 */
  experienceValue(character: Character): number {
    const { bst } = character.species;
    const { level } = character.attributes;
    if (level === 0 || bst === 0) return 0;

    const bstTerm = bst * log2Floor(bst + 1);
    const levelTerm = Math.floor(level / log2Floor(level + 1));
    return Math.floor((bstTerm * levelTerm) / BASE_EXPERIENCE);
  }

  /** 처치 보상: 플레이어 레벨로 나눔 (레벨 0은 1로 취급) */
  rewardFor(defeated: Character, winner: Character): number {
    return Math.floor(
      this.experienceValue(defeated) / Math.max(1, winner.attributes.level),
    );
  }

  gainExperience(character: Character, amount: number, rng: Rng): ActionLog {
    const logs = [`Gained ${amount} experience!`];
    const total = character.attributes.experience + amount;
    const levels = Math.floor(total / EXPERIENCE_TO_LEVEL);
    character.attributes.experience = total % EXPERIENCE_TO_LEVEL;
    character.attributes.level += levels;

    if (levels > 0) {
      // 기본(ONCE): 여러 레벨을 한 번에 올려도 성장은 1회분
      const times = this.config.get().statGrowthMode === 'PER_LEVEL' ? levels : 1;
      let growth = this.statsService.zero();
      for (let i = 0; i < times; i++) {
        growth = this.statsService.add(
          growth,
          this.statsService.scale(character.species.baseStats, SCALING_FACTOR, rng),
        );
      }
      character.attributes.stats = this.statsService.add(character.attributes.stats, growth);
      logs.push(`${character.name} grew to level ${character.attributes.level}!`);
      logs.push(`Stats increased by ${this.statsService.format(growth)}.`);
    }
    return logs;
  }

  /** species + level 기준으로 스탯을 다시 계산 (신규 캐릭터 생성용) */
  trainToLevel(character: Character, level: number, rng: Rng): void {
    character.attributes.level = level;
    character.attributes.experience = 0;
    character.attributes.stats = this.statsService.scale(
      character.species.baseStats,
      level * SCALING_FACTOR,
      rng,
    );
  }
}
