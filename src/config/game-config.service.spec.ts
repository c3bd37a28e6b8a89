import { GameConfigService, parseGameConfig } from './game-config.service.js';

describe('parseGameConfig', () => {
  it('빈 env → 기본값', () => {
    expect(parseGameConfig({})).toEqual({
      port: 3000,
      databaseUrl: '',
      jwtSecret: 'dev-secret',
      nodeEnv: 'development',
      worldSeed: 'world',
      speciesCount: 351,
      startingLevel: 5,
      statGrowthMode: 'ONCE',
    });
  });

  it('문자열 숫자를 변환한다', () => {
    const config = parseGameConfig({
      PORT: '8080',
      SPECIES_COUNT: '12',
      STARTING_LEVEL: '3',
      STAT_GROWTH_MODE: 'PER_LEVEL',
      WORLD_SEED: 'test-world',
    });
    expect(config.port).toBe(8080);
    expect(config.speciesCount).toBe(12);
    expect(config.startingLevel).toBe(3);
    expect(config.statGrowthMode).toBe('PER_LEVEL');
    expect(config.worldSeed).toBe('test-world');
  });

  it('잘못된 값은 거부', () => {
    expect(() => parseGameConfig({ STAT_GROWTH_MODE: 'TWICE' })).toThrow();
    expect(() => parseGameConfig({ STARTING_LEVEL: '0' })).toThrow();
  });
});

describe('GameConfigService', () => {
  it('update는 지정한 필드만 바꾼다', () => {
    const service = new GameConfigService();
    const before = service.get();

    const after = service.update({ statGrowthMode: 'PER_LEVEL' });

    expect(after.statGrowthMode).toBe('PER_LEVEL');
    expect(after.startingLevel).toBe(before.startingLevel);
    expect(service.get()).toBe(after);
  });
});
