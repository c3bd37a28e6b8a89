import { Inject, Injectable } from '@nestjs/common';
import { and, desc, eq } from 'drizzle-orm';
import { DB, type DrizzleDB } from '../db/drizzle.module.js';
import { runSessions } from '../db/schema/index.js';
import type { NewRunRecord, RunRecord } from '../db/types/index.js';
import { BattleConflictError } from '../common/errors/game-errors.js';

export const RUNS_REPOSITORY = Symbol('RUNS_REPOSITORY');

export interface RunsRepository {
  findById(id: string): Promise<RunRecord | undefined>;
  /** 가장 최근에 시작한 런 */
  findActiveByUser(userId: string): Promise<RunRecord | undefined>;
  insert(run: NewRunRecord): Promise<RunRecord>;
  /** 저장된 turnNo가 expectedTurnNo일 때만 반영, 아니면 BattleConflictError */
  update(run: RunRecord, expectedTurnNo: number): Promise<RunRecord>;
}

@Injectable()
export class DrizzleRunsRepository implements RunsRepository {
  constructor(@Inject(DB) private readonly db: DrizzleDB) {}

  async findById(id: string): Promise<RunRecord | undefined> {
    return this.db.query.runSessions.findFirst({
      where: eq(runSessions.id, id),
    });
  }

  async findActiveByUser(userId: string): Promise<RunRecord | undefined> {
    return this.db.query.runSessions.findFirst({
      where: eq(runSessions.userId, userId),
      orderBy: [desc(runSessions.startedAt)],
    });
  }

  async insert(run: NewRunRecord): Promise<RunRecord> {
    const [created] = await this.db.insert(runSessions).values(run).returning();
    return created;
  }

  async update(run: RunRecord, expectedTurnNo: number): Promise<RunRecord> {
    const [updated] = await this.db
      .update(runSessions)
      .set({
        status: run.status,
        rngCursor: run.rngCursor,
        turnNo: run.turnNo,
        player: run.player,
        battle: run.battle,
        battlesWon: run.battlesWon,
        defeats: run.defeats,
        updatedAt: new Date(),
      })
      .where(and(eq(runSessions.id, run.id), eq(runSessions.turnNo, expectedTurnNo)))
      .returning();
    if (!updated) {
      throw new BattleConflictError('TURN_CONFLICT', 'Run was updated concurrently', {
        runId: run.id,
        expectedTurnNo,
      });
    }
    return updated;
  }
}
