import type { Alignment } from './enums.js';

/** action pool(arena) 인덱스 */
export type ActionId = number;

export type AttackAction = {
  kind: 'ATTACK';
  name: string;
  power: number;
  alignment: Alignment;
  priority: number;
};

export type FixedAttackAction = { kind: 'FIXED_ATTACK'; name: string; power: number };
export type DefendAction = { kind: 'DEFEND'; name: string };
export type BleedAction = { kind: 'BLEED'; name: string; power: number };
export type StunAction = { kind: 'STUN'; name: string };
export type SkipAction = { kind: 'SKIP' };

export type Action =
  | AttackAction
  | FixedAttackAction
  | DefendAction
  | BleedAction
  | StunAction
  | SkipAction;

/** padding 구간의 id는 SKIP으로 해석된다 */
export type ActionPool = {
  actions: Action[];
  padding: number;
};

export type ActionLog = string[];
