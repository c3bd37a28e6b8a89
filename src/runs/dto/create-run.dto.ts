import { z } from 'zod';

export const CreateRunBodySchema = z
  .object({
    /** 생략하면 서버가 생성 */
    seed: z.string().min(1).max(80).optional(),
  })
  .default({});

export type CreateRunBody = z.infer<typeof CreateRunBodySchema>;
