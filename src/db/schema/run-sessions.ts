import {
  index,
  integer,
  jsonb,
  pgTable,
  text,
  timestamp,
  uuid,
} from 'drizzle-orm/pg-core';
import { RUN_STATUS } from '../types/index.js';
import type { Battle, Character } from '../types/index.js';

export const runSessions = pgTable(
  'run_sessions',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    userId: text('user_id').notNull(),
    status: text('status', { enum: RUN_STATUS })
      .notNull()
      .default('RUN_MENU'),
    seed: text('seed').notNull(),
    rngCursor: integer('rng_cursor').notNull().default(0),
    turnNo: integer('turn_no').notNull().default(0),
    player: jsonb('player').$type<Character>().notNull(),
    battle: jsonb('battle').$type<Battle>(),
    battlesWon: integer('battles_won').notNull().default(0),
    defeats: integer('defeats').notNull().default(0),
    startedAt: timestamp('started_at').defaultNow().notNull(),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
  },
  (table) => [
    index('run_sessions_user_started_idx').on(table.userId, table.startedAt),
  ],
);
