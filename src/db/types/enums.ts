// Canonical Enums

export const ALIGNMENT = ['ROCK', 'PAPER', 'SCISSORS'] as const;
export type Alignment = (typeof ALIGNMENT)[number];

/** 로그/이름 표기용 */
export const ALIGNMENT_LABEL: Record<Alignment, string> = {
  ROCK: 'Rock',
  PAPER: 'Paper',
  SCISSORS: 'Scissors',
};

export type Status = 'DEFEND' | 'BLEED' | 'STUN';

export const EFFECTIVENESS = [
  'SUPER_EFFECTIVE',
  'NOT_VERY_EFFECTIVE',
  'NEUTRAL',
] as const;
export type Effectiveness = (typeof EFFECTIVENESS)[number];

export type BattleStatus = 'IN_PROGRESS' | 'VICTORY' | 'DEFEAT';

export const RUN_STATUS = ['RUN_MENU', 'RUN_BATTLE'] as const;
export type RunStatus = (typeof RUN_STATUS)[number];

export const STAT_GROWTH_MODE = ['ONCE', 'PER_LEVEL'] as const;
export type StatGrowthMode = (typeof STAT_GROWTH_MODE)[number];
