// 런 진행: 신규 런, 전투 시작, 턴 제출 (RNG cursor는 요청마다 저장)

import { Inject, Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import type {
  ActionId,
  ActionLog,
  BattleStatus,
  Character,
  RunRecord,
} from '../db/types/index.js';
import {
  BadRequestError,
  BattleConflictError,
  ForbiddenError,
  NotFoundError,
} from '../common/errors/game-errors.js';
import { GameConfigService } from '../config/game-config.service.js';
import { ContentLoaderService } from '../content/content-loader.service.js';
import { WorldGeneratorService } from '../content/world-generator.service.js';
import { type Rng, RngService } from '../engine/rng/rng.service.js';
import { CharacterService } from '../engine/character/character.service.js';
import { ActionService } from '../engine/actions/action.service.js';
import { ExperienceService } from '../engine/experience/experience.service.js';
import { BattleService } from '../engine/battle/battle.service.js';
import { TurnOrderService } from '../engine/battle/turn-order.service.js';
import { EnemyAiService } from '../engine/battle/enemy-ai.service.js';
import { RUNS_REPOSITORY, type RunsRepository } from './runs.repository.js';
import type { CreateRunBody } from './dto/create-run.dto.js';
import type { SubmitTurnBody } from './dto/submit-turn.dto.js';

export type ActionView = {
  id: ActionId;
  name: string;
  description: string;
  priority: number;
};

export type RunView = Omit<RunRecord, 'userId' | 'rngCursor'> & {
  knownActions: ActionView[];
};

export type TurnOutcome = BattleStatus | 'RAN_AWAY';

export type RunResult = {
  run: RunView;
  logs: ActionLog;
};

export type TurnResult = RunResult & { outcome: TurnOutcome };

@Injectable()
export class RunsService {
  private readonly logger = new Logger(RunsService.name);

  constructor(
    @Inject(RUNS_REPOSITORY) private readonly runs: RunsRepository,
    private readonly config: GameConfigService,
    private readonly content: ContentLoaderService,
    private readonly worldGenerator: WorldGeneratorService,
    private readonly rngService: RngService,
    private readonly characterService: CharacterService,
    private readonly actionService: ActionService,
    private readonly experienceService: ExperienceService,
    private readonly battleService: BattleService,
    private readonly turnOrder: TurnOrderService,
    private readonly enemyAi: EnemyAiService,
  ) {}

  async createRun(userId: string, body: CreateRunBody = {}): Promise<RunResult> {
    const seed = body.seed ?? randomUUID();
    const rng = this.rngService.create(seed);
    const player = this.recruit(this.config.get().startingLevel, rng);

    const run = await this.runs.insert({
      userId,
      status: 'RUN_MENU',
      seed,
      rngCursor: rng.cursor,
      turnNo: 0,
      player,
      battle: null,
      battlesWon: 0,
      defeats: 0,
    });
    this.logger.log(`Run ${run.id} created for ${userId}: ${player.name} (lv ${player.attributes.level})`);
    return { run: this.toView(run), logs: [] };
  }

  async getActiveRun(userId: string): Promise<RunView> {
    const run = await this.runs.findActiveByUser(userId);
    if (!run) throw new NotFoundError('No run found for user');
    return this.toView(run);
  }

  async getRun(runId: string, userId: string): Promise<RunView> {
    return this.toView(await this.loadOwned(runId, userId));
  }

  async startBattle(runId: string, userId: string): Promise<RunResult> {
    const run = await this.loadOwned(runId, userId);
    if (run.battle) {
      throw new BattleConflictError('BATTLE_IN_PROGRESS', 'A battle is already in progress');
    }

    const rng = this.rngService.restore({ seed: run.seed, cursor: run.rngCursor });
    const enemy = this.recruit(run.player.attributes.level, rng);
    run.battle = this.battleService.create(run.player, enemy);
    run.status = 'RUN_BATTLE';

    const saved = await this.save(run, rng);
    return { run: this.toView(saved), logs: [`${enemy.name} appeared!`] };
  }

  async submitTurn(runId: string, userId: string, body: SubmitTurnBody): Promise<TurnResult> {
    const run = await this.loadOwned(runId, userId);
    const battle = run.battle;
    if (!battle) {
      throw new BattleConflictError('NO_ACTIVE_BATTLE', 'No battle in progress');
    }

    const nextTurnNo = run.turnNo + 1;
    if (body.expectedNextTurnNo !== nextTurnNo) {
      throw new BattleConflictError('TURN_NO_MISMATCH', 'Turn number mismatch', {
        expected: nextTurnNo,
        received: body.expectedNextTurnNo,
      });
    }

    const rng = this.rngService.restore({ seed: run.seed, cursor: run.rngCursor });

    if (body.type === 'RUN_AWAY') {
      this.characterService.refresh(run.player);
      this.finishBattle(run);
      const saved = await this.save(run, rng);
      return {
        run: this.toView(saved),
        logs: [`${run.player.name} ran away.`],
        outcome: 'RAN_AWAY',
      };
    }

    const known = battle.player.attributes.actions;
    if (body.actionIndex >= known.length) {
      throw new BadRequestError(`actionIndex out of range: ${body.actionIndex}`, {
        knownActions: known.length,
      });
    }

    const { pool } = this.content.getWorld();
    const playerAction = this.actionService.resolve(pool, known[body.actionIndex]);
    const enemyAction = this.actionService.resolve(
      pool,
      this.enemyAi.selectAction(battle.enemy, rng),
    );

    const logs: ActionLog = [];
    if (this.turnOrder.playerFirst(battle.player, playerAction, battle.enemy, enemyAction, rng)) {
      logs.push(...this.battleService.playerTurn(battle, playerAction, rng));
      logs.push(...this.battleService.enemyTurn(battle, enemyAction, rng));
    } else {
      logs.push(...this.battleService.enemyTurn(battle, enemyAction, rng));
      logs.push(...this.battleService.playerTurn(battle, playerAction, rng));
    }

    const { status, logs: endLogs } = this.battleService.endTurn(battle, rng);
    logs.push(...endLogs);

    switch (status) {
      case 'VICTORY':
        run.player = battle.player;
        this.characterService.refresh(run.player);
        run.battlesWon += 1;
        this.finishBattle(run);
        break;
      case 'DEFEAT':
        run.player = this.recruit(this.config.get().startingLevel, rng);
        run.defeats += 1;
        this.finishBattle(run);
        break;
      case 'IN_PROGRESS':
        break;
    }

    const saved = await this.save(run, rng);
    if (status !== 'IN_PROGRESS') {
      this.logger.log(`Run ${run.id} battle ended: ${status}`);
    }
    return { run: this.toView(saved), logs, outcome: status };
  }

  /** 무작위 species/행동 + 레벨 기준 스탯, 체력 가득 */
  private recruit(level: number, rng: Rng): Character {
    const character = this.worldGenerator.sampleCharacter(this.content.getWorld(), rng);
    this.experienceService.trainToLevel(character, level, rng);
    this.characterService.refresh(character);
    return character;
  }

  private finishBattle(run: RunRecord): void {
    run.battle = null;
    run.status = 'RUN_MENU';
  }

  private async loadOwned(runId: string, userId: string): Promise<RunRecord> {
    const run = await this.runs.findById(runId);
    if (!run) throw new NotFoundError(`Run not found: ${runId}`);
    if (run.userId !== userId) throw new ForbiddenError('Run belongs to another user');
    return run;
  }

  /** 읽은 뒤 다른 요청이 먼저 저장했다면 repository가 거부한다 */
  private async save(run: RunRecord, rng: Rng): Promise<RunRecord> {
    const loadedTurnNo = run.turnNo;
    run.rngCursor = rng.cursor;
    run.turnNo = loadedTurnNo + 1;
    return this.runs.update(run, loadedTurnNo);
  }

  private toView(run: RunRecord): RunView {
    const { pool } = this.content.getWorld();
    const actor = run.battle?.player ?? run.player;
    return {
      id: run.id,
      status: run.status,
      seed: run.seed,
      turnNo: run.turnNo,
      player: run.player,
      battle: run.battle,
      battlesWon: run.battlesWon,
      defeats: run.defeats,
      startedAt: run.startedAt,
      updatedAt: run.updatedAt,
      knownActions: actor.attributes.actions.map((id) => {
        const action = this.actionService.resolve(pool, id);
        return {
          id,
          name: this.actionService.name(action),
          description: this.actionService.description(action),
          priority: this.actionService.priority(action),
        };
      }),
    };
  }
}
