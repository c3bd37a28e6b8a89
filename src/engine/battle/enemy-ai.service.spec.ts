import { EnemyAiService } from './enemy-ai.service.js';
import { CharacterService } from '../character/character.service.js';
import { Rng } from '../rng/rng.service.js';

describe('EnemyAiService', () => {
  const characterService = new CharacterService();
  const species = {
    name: 'fake',
    bst: 0,
    baseStats: { health: 0.25, attack: 0.25, defense: 0.25, speed: 0.25 },
    alignment: 'PAPER' as const,
  };
  let service: EnemyAiService;

  beforeEach(() => {
    service = new EnemyAiService();
  });

  it('배운 행동 중에서만 선택', () => {
    const enemy = characterService.fromSpeciesAndActions(species, [4, 8, 15, 16]);
    const rng = new Rng('ai-pick', 0);
    const seen = new Set<number | undefined>();
    for (let i = 0; i < 200; i++) {
      seen.add(service.selectAction(enemy, rng));
    }
    expect([...seen].sort((a, b) => (a ?? 0) - (b ?? 0))).toEqual([4, 8, 15, 16]);
  });

  it('배운 행동이 없으면 undefined', () => {
    const enemy = characterService.fromSpecies(species);
    expect(service.selectAction(enemy, new Rng('ai-empty', 0))).toBeUndefined();
  });
});
