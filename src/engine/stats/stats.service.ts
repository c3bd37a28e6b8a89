// 스탯 벡터 연산: 성장 비율(실수) → 정수 스탯 분배

import { Injectable } from '@nestjs/common';
import { STAT_KEYS, type StatVector } from '../../db/types/index.js';
import type { Rng } from '../rng/rng.service.js';

/** 레벨업 1회당 분배되는 스탯 총량 */
export const SCALING_FACTOR = 100;

@Injectable()
export class StatsService {
  zero(): StatVector {
    return { health: 0, attack: 0, defense: 0, speed: 0 };
  }

  fromValues(
    health: number,
    attack: number,
    defense: number,
    speed: number,
  ): StatVector {
    return { health, attack, defense, speed };
  }

  add(a: StatVector, b: StatVector): StatVector {
    return {
      health: a.health + b.health,
      attack: a.attack + b.attack,
      defense: a.defense + b.defense,
      speed: a.speed + b.speed,
    };
  }

  total(v: StatVector): number {
    return v.health + v.attack + v.defense + v.speed;
  }

  /**
   * 비율 벡터를 합이 정확히 total인 정수 벡터로 변환.
   * 버림으로 생긴 부족분은 4개 인덱스 중 무작위(중복 허용)로 1씩 채운다.
   * 비율 합이 0 이하이면 균등 분배로 취급.
   */
  scale(ratios: StatVector, total: number, rng: Rng): StatVector {
    const target = Math.max(0, Math.floor(total));
    const sum = this.total(ratios);
    const weights: StatVector = sum > 0 ? ratios : this.fromValues(1, 1, 1, 1);
    const weightSum = sum > 0 ? sum : 4;

    const result = this.zero();
    for (const key of STAT_KEYS) {
      result[key] = Math.max(0, Math.floor((target * weights[key]) / weightSum));
    }

    let allocated = this.total(result);
    while (allocated < target) {
      result[STAT_KEYS[rng.int(STAT_KEYS.length)]] += 1;
      allocated++;
    }
    // 부동소수 오차로 초과한 경우 양수 성분에서 회수
    while (allocated > target) {
      const positive = STAT_KEYS.filter((key) => result[key] > 0);
      const key = rng.pick(positive);
      if (key === undefined) break;
      result[key] -= 1;
      allocated--;
    }

    return result;
  }

  format(v: StatVector): string {
    return STAT_KEYS.map((key) => `${key} +${v[key]}`).join(', ');
  }
}
