// 서버 설정: .env 기본값 + 런타임 변경 지원

import { Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import { STAT_GROWTH_MODE } from '../db/types/index.js';

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  DATABASE_URL: z.string().default(''),
  JWT_SECRET: z.string().min(1).default('dev-secret'),
  NODE_ENV: z.string().default('development'),
  WORLD_SEED: z.string().min(1).default('world'),
  SPECIES_COUNT: z.coerce.number().int().min(1).max(10_000).default(351),
  STARTING_LEVEL: z.coerce.number().int().min(1).max(100).default(5),
  STAT_GROWTH_MODE: z.enum(STAT_GROWTH_MODE).default('ONCE'),
});

export type GameConfig = {
  port: number;
  databaseUrl: string;
  jwtSecret: string;
  nodeEnv: string;
  worldSeed: string;
  speciesCount: number;
  startingLevel: number;
  /** ONCE: 레벨업 호출당 성장 1회, PER_LEVEL: 오른 레벨 수만큼 */
  statGrowthMode: (typeof STAT_GROWTH_MODE)[number];
};

/** 런타임 변경 가능 항목: 다음 캐릭터 생성/레벨업부터 반영 */
export const GameConfigPatchSchema = z
  .object({
    startingLevel: z.number().int().min(1).max(100).optional(),
    statGrowthMode: z.enum(STAT_GROWTH_MODE).optional(),
  })
  .strict();
export type GameConfigPatch = z.infer<typeof GameConfigPatchSchema>;

/** 비밀값 제외 */
export type PublicGameConfig = Pick<
  GameConfig,
  'worldSeed' | 'speciesCount' | 'startingLevel' | 'statGrowthMode'
>;

export function parseGameConfig(env: Record<string, string | undefined>): GameConfig {
  const parsed = EnvSchema.parse(env);
  return {
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    jwtSecret: parsed.JWT_SECRET,
    nodeEnv: parsed.NODE_ENV,
    worldSeed: parsed.WORLD_SEED,
    speciesCount: parsed.SPECIES_COUNT,
    startingLevel: parsed.STARTING_LEVEL,
    statGrowthMode: parsed.STAT_GROWTH_MODE,
  };
}

@Injectable()
export class GameConfigService {
  private readonly logger = new Logger(GameConfigService.name);
  private config: GameConfig;

  constructor() {
    this.config = parseGameConfig(process.env);
  }

  get(): GameConfig {
    return this.config;
  }

  isProduction(): boolean {
    return this.config.nodeEnv === 'production';
  }

  getPublic(): PublicGameConfig {
    const { worldSeed, speciesCount, startingLevel, statGrowthMode } = this.config;
    return { worldSeed, speciesCount, startingLevel, statGrowthMode };
  }

  update(patch: GameConfigPatch): GameConfig {
    this.config = { ...this.config, ...patch };
    this.logger.log(`Game config updated: ${JSON.stringify(patch)}`);
    return this.config;
  }
}
