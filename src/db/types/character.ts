import type { Alignment, Status } from './enums.js';
import type { StatVector } from './stat-vector.js';
import type { ActionId } from './action.js';

export type Species = {
  name: string;
  /** base stat total */
  bst: number;
  baseStats: StatVector;
  alignment: Alignment;
};

/** Status → intensity (키가 없으면 비활성) */
export type StatusMap = Partial<Record<Status, number>>;

/** 전투 사이에도 유지되는 성장 정보 */
export type Attributes = {
  level: number;
  experience: number;
  stats: StatVector;
  actions: ActionId[];
};

/** 전투마다 refresh로 초기화 */
export type CharacterState = {
  alignment: Alignment;
  health: number;
  status: StatusMap;
};

export type Character = {
  name: string;
  species: Species;
  attributes: Attributes;
  state: CharacterState;
};

export type Battle = {
  player: Character;
  enemy: Character;
};
