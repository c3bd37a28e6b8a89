// 월드 생성용 시드 데이터 타입 (world_v1 JSON 대응)

import { z } from 'zod';
import type { ActionPool, Species } from '../db/types/index.js';

export const NameTablesSchema = z.object({
  speciesSuffixes: z.array(z.string().min(1)).min(1),
  attackSuffixes: z.array(z.string().min(1)).min(1),
});
export type NameTables = z.infer<typeof NameTablesSchema>;

/** 무작위 공격 외에 항상 pool에 들어가는 고정 행동 */
export const FixedActionSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('FIXED_ATTACK'),
    name: z.string().min(1),
    power: z.number().int().min(0),
  }),
  z.object({ kind: z.literal('DEFEND'), name: z.string().min(1) }),
  z.object({
    kind: z.literal('BLEED'),
    name: z.string().min(1),
    power: z.number().int().min(0),
  }),
  z.object({ kind: z.literal('STUN'), name: z.string().min(1) }),
]);
export type FixedAction = z.infer<typeof FixedActionSchema>;

export const FixedActionListSchema = z.array(FixedActionSchema);

export type WorldContent = {
  names: NameTables;
  fixedActions: FixedAction[];
};

/** 서버 수명 동안 공유되는 읽기 전용 데이터 */
export type World = {
  species: Species[];
  pool: ActionPool;
};
