import type { RunStatus } from './enums.js';
import type { Battle, Character } from './character.js';

export type RunRecord = {
  id: string;
  userId: string;
  status: RunStatus;
  seed: string;
  rngCursor: number;
  /** 상태 변경(전투 시작/턴)마다 1 증가. 동시 요청 검출용 */
  turnNo: number;
  player: Character;
  battle: Battle | null;
  battlesWon: number;
  defeats: number;
  startedAt: Date;
  updatedAt: Date;
};

export type NewRunRecord = Omit<RunRecord, 'id' | 'startedAt' | 'updatedAt'>;
