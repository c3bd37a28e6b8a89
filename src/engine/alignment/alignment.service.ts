// 속성 상성표: Rock > Scissors > Paper > Rock

import { Injectable } from '@nestjs/common';
import type { Alignment, Effectiveness } from '../../db/types/index.js';

/** [공격 속성][방어 속성] */
const EFFECTIVENESS_TABLE: Record<Alignment, Record<Alignment, Effectiveness>> = {
  ROCK: {
    ROCK: 'NEUTRAL',
    PAPER: 'NOT_VERY_EFFECTIVE',
    SCISSORS: 'SUPER_EFFECTIVE',
  },
  PAPER: {
    ROCK: 'SUPER_EFFECTIVE',
    PAPER: 'NEUTRAL',
    SCISSORS: 'NOT_VERY_EFFECTIVE',
  },
  SCISSORS: {
    ROCK: 'NOT_VERY_EFFECTIVE',
    PAPER: 'SUPER_EFFECTIVE',
    SCISSORS: 'NEUTRAL',
  },
};

/** 배율 ×10 정수 (0.5x → 5, 1x → 10, 2x → 20) */
const EFFECTIVENESS_FACTOR: Record<Effectiveness, number> = {
  SUPER_EFFECTIVE: 20,
  NOT_VERY_EFFECTIVE: 5,
  NEUTRAL: 10,
};

@Injectable()
export class AlignmentService {
  effectiveness(attacker: Alignment, defender: Alignment): Effectiveness {
    return EFFECTIVENESS_TABLE[attacker][defender];
  }

  effectivenessFactor(attacker: Alignment, defender: Alignment): number {
    return EFFECTIVENESS_FACTOR[this.effectiveness(attacker, defender)];
  }
}
