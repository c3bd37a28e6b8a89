import { BattleService } from './battle.service.js';
import { ActionService } from '../actions/action.service.js';
import { AlignmentService } from '../alignment/alignment.service.js';
import { CharacterService } from '../character/character.service.js';
import { ExperienceService } from '../experience/experience.service.js';
import { StatsService } from '../stats/stats.service.js';
import { StatusService } from '../status/status.service.js';
import { Rng } from '../rng/rng.service.js';
import { GameConfigService } from '../../config/game-config.service.js';
import type { Action, Character } from '../../db/types/index.js';

const characterService = new CharacterService();

function makeCharacter(
  name: string,
  overrides: { level?: number; health?: number; attack?: number; defense?: number; bst?: number } = {},
): Character {
  const character = characterService.fromSpecies({
    name,
    bst: overrides.bst ?? 400,
    baseStats: { health: 0.25, attack: 0.25, defense: 0.25, speed: 0.25 },
    alignment: 'ROCK',
  });
  character.attributes.level = overrides.level ?? 5;
  character.attributes.stats = {
    health: overrides.health ?? 12,
    attack: overrides.attack ?? 12,
    defense: overrides.defense ?? 12,
    speed: 12,
  };
  characterService.refresh(character);
  return character;
}

const scissorsHit: Action = {
  kind: 'ATTACK',
  name: 'Scissors Chop',
  power: 30,
  alignment: 'SCISSORS',
  priority: 0,
};

describe('BattleService', () => {
  let service: BattleService;
  let rng: Rng;

  beforeEach(() => {
    const config = new GameConfigService();
    config.update({ statGrowthMode: 'ONCE' });
    const actionService = new ActionService(new AlignmentService(), characterService);
    service = new BattleService(
      characterService,
      new StatusService(actionService, characterService),
      new ExperienceService(new StatsService(), config),
    );
    rng = new Rng('test-battle', 0);
  });

  describe('create', () => {
    it('두 캐릭터를 복사해서 소유한다', () => {
      const player = makeCharacter('Hero');
      const enemy = makeCharacter('Enemy');
      const battle = service.create(player, enemy);

      battle.enemy.state.health = 1;
      expect(enemy.state.health).toBe(12);
      expect(battle.player).toEqual(player);
      expect(battle.player).not.toBe(player);
    });
  });

  describe('battleStatus', () => {
    it('양쪽 체력이 남아 있으면 IN_PROGRESS', () => {
      const battle = service.create(makeCharacter('Hero'), makeCharacter('Enemy'));
      expect(service.battleStatus(battle)).toBe('IN_PROGRESS');
    });

    it('적 체력 0 → VICTORY', () => {
      const battle = service.create(makeCharacter('Hero'), makeCharacter('Enemy'));
      battle.enemy.state.health = 0;
      expect(service.battleStatus(battle)).toBe('VICTORY');
    });

    it('플레이어 체력 0 → DEFEAT', () => {
      const battle = service.create(makeCharacter('Hero'), makeCharacter('Enemy'));
      battle.player.state.health = 0;
      expect(service.battleStatus(battle)).toBe('DEFEAT');
    });

    it('양쪽 모두 0이면 DEFEAT 우선', () => {
      const battle = service.create(makeCharacter('Hero'), makeCharacter('Enemy'));
      battle.player.state.health = 0;
      battle.enemy.state.health = 0;
      expect(service.battleStatus(battle)).toBe('DEFEAT');
    });
  });

  describe('playerTurn / enemyTurn', () => {
    it('플레이어 공격 → 적 체력 12 → 9', () => {
      const battle = service.create(makeCharacter('Hero'), makeCharacter('Enemy'));

      const logs = service.playerTurn(battle, scissorsHit, rng);

      expect(battle.enemy.state.health).toBe(9);
      expect(logs).toEqual(['Hero used Scissors Chop.', "It's not very effective."]);
    });

    it('적 공격은 플레이어를 대상으로', () => {
      const battle = service.create(makeCharacter('Hero'), makeCharacter('Enemy'));

      const logs = service.enemyTurn(battle, scissorsHit, rng);

      expect(battle.player.state.health).toBe(9);
      expect(battle.enemy.state.health).toBe(12);
      expect(logs[0]).toBe('Enemy used Scissors Chop.');
    });

    it('전투가 끝났으면 아무 일도 일어나지 않는다', () => {
      const battle = service.create(makeCharacter('Hero'), makeCharacter('Enemy'));
      battle.enemy.state.health = 0;

      expect(service.playerTurn(battle, scissorsHit, rng)).toEqual([]);
      expect(service.enemyTurn(battle, scissorsHit, rng)).toEqual([]);
      expect(battle.player.state.health).toBe(12);
    });

    it('행동 주체의 상태이상이 적용된다', () => {
      const battle = service.create(makeCharacter('Hero'), makeCharacter('Enemy'));
      battle.player.state.status.BLEED = 2;

      const logs = service.playerTurn(battle, scissorsHit, rng);

      expect(logs).toEqual([
        'Hero used Scissors Chop.',
        "It's not very effective.",
        'Hero was hurt by bleed.',
      ]);
      expect(battle.player.state.health).toBe(10);
      expect(battle.enemy.state.health).toBe(9);
    });
  });

  describe('endTurn', () => {
    it('VICTORY: 경험치 보상', () => {
      const battle = service.create(makeCharacter('Hero'), makeCharacter('Enemy'));
      battle.enemy.state.health = 0;

      const result = service.endTurn(battle, rng);

      expect(result).toEqual({
        status: 'VICTORY',
        logs: ['Defeated Enemy!', 'Gained 41 experience!'],
      });
      expect(battle.player.attributes.experience).toBe(41);
      expect(battle.player.attributes.level).toBe(5);
    });

    it('VICTORY: 레벨업과 스탯 성장', () => {
      const battle = service.create(makeCharacter('Hero'), makeCharacter('Enemy'));
      battle.player.attributes.experience = 80;
      battle.enemy.state.health = 0;

      const result = service.endTurn(battle, rng);

      expect(result.logs).toEqual([
        'Defeated Enemy!',
        'Gained 41 experience!',
        'Hero grew to level 6!',
        'Stats increased by health +25, attack +25, defense +25, speed +25.',
      ]);
      expect(battle.player.attributes.experience).toBe(21);
      expect(battle.player.attributes.stats.attack).toBe(37);
      // refresh 전이므로 현재 체력은 그대로
      expect(battle.player.state.health).toBe(12);
    });

    it('DEFEAT: 보상 없음', () => {
      const battle = service.create(makeCharacter('Hero'), makeCharacter('Enemy'));
      battle.player.state.health = 0;

      const result = service.endTurn(battle, rng);

      expect(result).toEqual({ status: 'DEFEAT', logs: ['Hero died!'] });
      expect(battle.player.attributes.experience).toBe(0);
    });

    it('IN_PROGRESS: 양쪽 DEFEND 해제, 나머지 상태 유지', () => {
      const battle = service.create(makeCharacter('Hero'), makeCharacter('Enemy'));
      battle.player.state.status = { DEFEND: 0, BLEED: 1 };
      battle.enemy.state.status = { DEFEND: 0, STUN: 2 };

      const result = service.endTurn(battle, rng);

      expect(result).toEqual({ status: 'IN_PROGRESS', logs: [] });
      expect(battle.player.state.status).toEqual({ BLEED: 1 });
      expect(battle.enemy.state.status).toEqual({ STUN: 2 });
    });

    it('VICTORY/DEFEAT에서는 DEFEND를 해제하지 않는다', () => {
      const battle = service.create(makeCharacter('Hero'), makeCharacter('Enemy'));
      battle.player.state.status = { DEFEND: 0 };
      battle.player.state.health = 0;

      service.endTurn(battle, rng);

      expect(battle.player.state.status).toEqual({ DEFEND: 0 });
    });
  });

  describe('한 라운드 흐름', () => {
    it('방어한 라운드의 공격은 막히고, 다음 라운드에는 통한다', () => {
      const battle = service.create(makeCharacter('Hero'), makeCharacter('Enemy'));
      const block: Action = { kind: 'DEFEND', name: 'Block' };

      service.enemyTurn(battle, block, rng);
      service.playerTurn(battle, scissorsHit, rng);
      service.endTurn(battle, rng);
      expect(battle.enemy.state.health).toBe(12);

      service.playerTurn(battle, scissorsHit, rng);
      expect(battle.enemy.state.health).toBe(9);
    });
  });
});
