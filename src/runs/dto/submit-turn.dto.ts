import { z } from 'zod';

/** run.turnNo + 1 */
const expectedNextTurnNo = z.number().int().min(1);

export const SubmitTurnBodySchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('ACTION'),
    /** 플레이어가 배운 행동 목록의 인덱스 */
    actionIndex: z.number().int().min(0),
    expectedNextTurnNo,
  }),
  z.object({ type: z.literal('RUN_AWAY'), expectedNextTurnNo }),
]);

export type SubmitTurnBody = z.infer<typeof SubmitTurnBodySchema>;
